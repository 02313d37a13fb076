/**
 * Dense matrix construction, shape checks and products.
 * Matrices are row-major arrays of rows.
 */

import {
  DimensionMismatchError,
  InvalidArgumentError,
  InvalidShapeError,
} from '../errors';
import type { Matrix, ReadonlyMatrix, ReadonlyVector, Vector } from '../types';
import { dot } from './vector';

const isPositiveInteger = (n: number): boolean => Number.isInteger(n) && n > 0;

/**
 * Return [rows, cols] of a matrix, validating that it is non-empty and rectangular
 */
export const shape = (A: ReadonlyMatrix): [number, number] => {
  if (A.length === 0) {
    throw new InvalidShapeError('shape(): matrix must be a non-empty list of rows');
  }
  const cols = A[0].length;
  if (cols === 0) {
    throw new InvalidShapeError('shape(): matrix rows must be non-empty');
  }
  for (const row of A) {
    if (row.length !== cols) {
      throw new InvalidShapeError('shape(): matrix rows must all have the same length');
    }
  }
  return [A.length, cols];
};

export const isSquare = (A: ReadonlyMatrix): boolean => {
  const [rows, cols] = shape(A);
  return rows === cols;
};

/**
 * Create a rows x cols matrix filled with value
 */
export const zeros = (rows: number, cols: number, value: number = 0): Matrix => {
  if (!isPositiveInteger(rows) || !isPositiveInteger(cols)) {
    throw new InvalidShapeError(
      `zeros(): rows and cols must be positive integers (got ${rows}x${cols})`
    );
  }
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(value));
};

/**
 * Create an n x n identity matrix
 */
export const identity = (n: number): Matrix => {
  if (!isPositiveInteger(n)) {
    throw new InvalidShapeError(`identity(): n must be a positive integer (got ${n})`);
  }
  const I = zeros(n, n);
  for (let i = 0; i < n; i++) {
    I[i][i] = 1;
  }
  return I;
};

export const transpose = (A: ReadonlyMatrix): Matrix => {
  const [rows, cols] = shape(A);
  return Array.from({ length: cols }, (_, j) =>
    Array.from({ length: rows }, (_, i) => A[i][j])
  );
};

/**
 * Matrix product A * B
 */
export const matmul = (A: ReadonlyMatrix, B: ReadonlyMatrix): Matrix => {
  const [ar, ac] = shape(A);
  const [br, bc] = shape(B);
  if (ac !== br) {
    throw new DimensionMismatchError(
      `matmul(): inner dimensions do not match (${ar}x${ac} * ${br}x${bc})`
    );
  }
  const out = zeros(ar, bc);
  // i-k-j order walks B and out row by row
  for (let i = 0; i < ar; i++) {
    const outRow = out[i];
    for (let k = 0; k < ac; k++) {
      const aik = A[i][k];
      const bRow = B[k];
      for (let j = 0; j < bc; j++) {
        outRow[j] += aik * bRow[j];
      }
    }
  }
  return out;
};

/**
 * Matrix-vector product A * v
 */
export const matvec = (A: ReadonlyMatrix, v: ReadonlyVector): Vector => {
  const [, cols] = shape(A);
  if (v.length !== cols) {
    throw new DimensionMismatchError(
      `matvec(): vector length must equal matrix columns (${v.length} vs ${cols})`
    );
  }
  return A.map((row) => dot(row, v));
};

/**
 * Matrix with one row and one column removed
 */
export const minor = (A: ReadonlyMatrix, rowToRemove: number, colToRemove: number): Matrix => {
  const [rows, cols] = shape(A);
  if (!Number.isInteger(rowToRemove) || rowToRemove < 0 || rowToRemove >= rows) {
    throw new InvalidArgumentError(`minor(): row index ${rowToRemove} out of range [0, ${rows})`);
  }
  if (!Number.isInteger(colToRemove) || colToRemove < 0 || colToRemove >= cols) {
    throw new InvalidArgumentError(`minor(): column index ${colToRemove} out of range [0, ${cols})`);
  }
  if (rows < 2 || cols < 2) {
    throw new InvalidShapeError(`minor(): ${rows}x${cols} matrix has no non-empty minor`);
  }
  return A.filter((_, i) => i !== rowToRemove).map((row) =>
    row.filter((_, j) => j !== colToRemove)
  );
};

/**
 * Check that two matrices have the same shape and every element lies within tolerance
 */
export const matricesClose = (
  A: ReadonlyMatrix,
  B: ReadonlyMatrix,
  tolerance: number = 1e-9
): boolean => {
  const [ar, ac] = shape(A);
  const [br, bc] = shape(B);
  if (ar !== br || ac !== bc) return false;

  for (let i = 0; i < ar; i++) {
    for (let j = 0; j < ac; j++) {
      if (Math.abs(A[i][j] - B[i][j]) > tolerance) return false;
    }
  }
  return true;
};
