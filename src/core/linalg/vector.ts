/**
 * Vector operations on plain number arrays
 */

import { vec3 } from 'gl-matrix';
import { DimensionMismatchError } from '../errors';
import type { ReadonlyVector, Vec3 } from '../types';

/**
 * Dot product of two vectors of equal length
 */
export const dot = (a: ReadonlyVector, b: ReadonlyVector): number => {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(
      `dot(): vectors must have the same length (${a.length} vs ${b.length})`
    );
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
};

/**
 * Cross product of two 3D vectors
 */
export const cross = (a: ReadonlyVector, b: ReadonlyVector): Vec3 => {
  if (a.length !== 3 || b.length !== 3) {
    throw new DimensionMismatchError(
      `cross(): only defined for 3D vectors (got ${a.length} and ${b.length})`
    );
  }
  // Plain array output keeps double precision (vec3.create() is Float32Array)
  const out: Vec3 = [0, 0, 0];
  vec3.cross(out, [a[0], a[1], a[2]], [b[0], b[1], b[2]]);
  return out;
};

/**
 * Euclidean length of a vector
 */
export const norm = (v: ReadonlyVector): number => Math.sqrt(dot(v, v));
