/**
 * Affine transforms in homogeneous coordinates.
 *
 * 2D transforms are 3x3 and 3D transforms are 4x4 row-major matrices. They are
 * applied to points with a trailing w = 1 and a perspective divide.
 * Rotations are right-handed and counter-clockwise in their plane.
 */

import { mat3, mat4 } from 'gl-matrix';
import { DEFAULT_ANGLE_UNIT } from '../config';
import {
  DegenerateTransformError,
  InvalidArgumentError,
  ShapeMismatchError,
} from '../errors';
import type { Matrix, ReadonlyMatrix, ReadonlyVector, Vec2, Vec3 } from '../types';
import { toRadians } from '../utils/mathUtils';
import { matmul, matvec, shape } from './matrix';

/**
 * gl-matrix stores matrices column-major; element (row, col) lives at col * size + row
 */
const fromColumnMajor = (m: ArrayLike<number>, size: number): Matrix =>
  Array.from({ length: size }, (_, row) =>
    Array.from({ length: size }, (_, col) => m[col * size + row])
  );

// Plain arrays instead of mat3.create()/mat4.create() keep double precision
const buildMat3 = (fill: (out: number[]) => void): Matrix => {
  const out = new Array<number>(9).fill(0);
  fill(out);
  return fromColumnMajor(out, 3);
};

const buildMat4 = (fill: (out: number[]) => void): Matrix => {
  const out = new Array<number>(16).fill(0);
  fill(out);
  return fromColumnMajor(out, 4);
};

const requireTransformSize = (T: ReadonlyMatrix, size: number, fn: string): void => {
  const [rows, cols] = shape(T);
  if (rows !== size || cols !== size) {
    throw new ShapeMismatchError(
      `${fn}(): transform must be ${size}x${size} (got ${rows}x${cols})`
    );
  }
};

const applyHomogeneous = (T: ReadonlyMatrix, point: ReadonlyVector, fn: string): number[] => {
  const out = matvec(T, [...point, 1]);
  const w = out[out.length - 1];
  if (w === 0) {
    throw new DegenerateTransformError(`${fn}(): invalid transform (w=0)`);
  }
  return out.slice(0, -1).map((value) => value / w);
};

// ==================== 2D (3x3) ====================

export const translate2D = (tx: number, ty: number): Matrix =>
  buildMat3((out) => mat3.fromTranslation(out, [tx, ty]));

/**
 * Scale matrix; uniform when sy is omitted
 */
export const scale2D = (sx: number, sy: number = sx): Matrix =>
  buildMat3((out) => mat3.fromScaling(out, [sx, sy]));

export const rotate2D = (theta: number, unit: string = DEFAULT_ANGLE_UNIT): Matrix => {
  const rad = toRadians(theta, unit);
  return buildMat3((out) => mat3.fromRotation(out, rad));
};

/**
 * Apply a 3x3 transform to a 2D point (x, y)
 */
export const applyTransform2D = (T: ReadonlyMatrix, point: ReadonlyVector): Vec2 => {
  if (point.length !== 2) {
    throw new ShapeMismatchError(
      `applyTransform2D(): point must be (x, y) (got ${point.length} components)`
    );
  }
  requireTransformSize(T, 3, 'applyTransform2D');
  const [x, y] = applyHomogeneous(T, point, 'applyTransform2D');
  return [x, y];
};

// ==================== 3D (4x4) ====================

export const translate3D = (tx: number, ty: number, tz: number): Matrix =>
  buildMat4((out) => mat4.fromTranslation(out, [tx, ty, tz]));

/**
 * Scale matrix; sy and sz default to sx
 */
export const scale3D = (sx: number, sy: number = sx, sz: number = sx): Matrix =>
  buildMat4((out) => mat4.fromScaling(out, [sx, sy, sz]));

export const rotateX = (theta: number, unit: string = DEFAULT_ANGLE_UNIT): Matrix => {
  const rad = toRadians(theta, unit);
  return buildMat4((out) => mat4.fromXRotation(out, rad));
};

export const rotateY = (theta: number, unit: string = DEFAULT_ANGLE_UNIT): Matrix => {
  const rad = toRadians(theta, unit);
  return buildMat4((out) => mat4.fromYRotation(out, rad));
};

export const rotateZ = (theta: number, unit: string = DEFAULT_ANGLE_UNIT): Matrix => {
  const rad = toRadians(theta, unit);
  return buildMat4((out) => mat4.fromZRotation(out, rad));
};

/**
 * Apply a 4x4 transform to a 3D point (x, y, z)
 */
export const applyTransform3D = (T: ReadonlyMatrix, point: ReadonlyVector): Vec3 => {
  if (point.length !== 3) {
    throw new ShapeMismatchError(
      `applyTransform3D(): point must be (x, y, z) (got ${point.length} components)`
    );
  }
  requireTransformSize(T, 4, 'applyTransform3D');
  const [x, y, z] = applyHomogeneous(T, point, 'applyTransform3D');
  return [x, y, z];
};

// ==================== Composition ====================

/**
 * Product T1 * T2 * ... * Tn. Applied to a point, the last transform acts first.
 */
export const composeTransforms = (...transforms: ReadonlyMatrix[]): Matrix => {
  if (transforms.length === 0) {
    throw new InvalidArgumentError('composeTransforms(): at least one transform is required');
  }
  const [first, ...rest] = transforms;
  const [rows, cols] = shape(first);
  if (rows !== cols) {
    throw new ShapeMismatchError(
      `composeTransforms(): transforms must be square (got ${rows}x${cols})`
    );
  }
  return rest.reduce<Matrix>(
    (acc, T) => matmul(acc, T),
    first.map((row) => [...row])
  );
};
