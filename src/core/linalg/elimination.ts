/**
 * Square-matrix routines built on Gaussian elimination with partial pivoting.
 *
 * All three work on a private copy of the input. The singular case differs on
 * purpose: det() reports it as 0, solve() and inverse() throw.
 */

import { LINALG_TOLERANCE } from '../config';
import { ShapeMismatchError, SingularMatrixError } from '../errors';
import type { Matrix, ReadonlyMatrix, ReadonlyVector, Vector } from '../types';
import { identity, shape } from './matrix';

const requireSquare = (A: ReadonlyMatrix, fn: string): number => {
  const [rows, cols] = shape(A);
  if (rows !== cols) {
    throw new ShapeMismatchError(`${fn}(): matrix must be square (got ${rows}x${cols})`);
  }
  return rows;
};

/**
 * Index of the row in [from, n) with the largest |M[row][col]|
 */
const findPivotRow = (M: Matrix, col: number, from: number): number => {
  let pivotRow = from;
  let maxAbs = Math.abs(M[from][col]);
  for (let r = from + 1; r < M.length; r++) {
    const value = Math.abs(M[r][col]);
    if (value > maxAbs) {
      maxAbs = value;
      pivotRow = r;
    }
  }
  return pivotRow;
};

const swapRows = (M: Matrix, a: number, b: number): void => {
  const tmp = M[a];
  M[a] = M[b];
  M[b] = tmp;
};

/**
 * Determinant of a square matrix. Returns 0 for a singular matrix.
 */
export const det = (A: ReadonlyMatrix): number => {
  const n = requireSquare(A, 'det');
  const M = A.map((row) => [...row]);

  let product = 1;
  let sign = 1;

  for (let col = 0; col < n; col++) {
    const pivotRow = findPivotRow(M, col, col);
    if (Math.abs(M[pivotRow][col]) < LINALG_TOLERANCE) {
      return 0;
    }

    if (pivotRow !== col) {
      swapRows(M, pivotRow, col);
      sign = -sign;
    }

    const pivot = M[col][col];
    product *= pivot;

    for (let r = col + 1; r < n; r++) {
      const factor = M[r][col] / pivot;
      if (Math.abs(factor) < LINALG_TOLERANCE) continue;
      for (let k = col; k < n; k++) {
        M[r][k] -= factor * M[col][k];
      }
    }
  }

  return sign * product;
};

/**
 * Solve A x = b for square A.
 * @throws SingularMatrixError when the system has no unique solution
 */
export const solve = (A: ReadonlyMatrix, b: ReadonlyVector): Vector => {
  const n = requireSquare(A, 'solve');
  if (b.length !== n) {
    throw new ShapeMismatchError(
      `solve(): b length must match A rows (${b.length} vs ${n})`
    );
  }

  // Augmented [A | b]
  const M = A.map((row, i) => [...row, b[i]]);

  for (let col = 0; col < n; col++) {
    const pivotRow = findPivotRow(M, col, col);
    if (Math.abs(M[pivotRow][col]) < LINALG_TOLERANCE) {
      throw new SingularMatrixError(
        'solve(): system has no unique solution (singular matrix)'
      );
    }
    if (pivotRow !== col) {
      swapRows(M, pivotRow, col);
    }

    const pivot = M[col][col];
    for (let j = col; j <= n; j++) {
      M[col][j] /= pivot;
    }

    for (let r = col + 1; r < n; r++) {
      const factor = M[r][col];
      if (Math.abs(factor) < LINALG_TOLERANCE) continue;
      for (let j = col; j <= n; j++) {
        M[r][j] -= factor * M[col][j];
      }
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    let sum = 0;
    for (let j = i + 1; j < n; j++) {
      sum += M[i][j] * x[j];
    }
    x[i] = M[i][n] - sum;
  }
  return x;
};

/**
 * Inverse of a square matrix via Gauss-Jordan elimination
 * @throws SingularMatrixError when the matrix is not invertible
 */
export const inverse = (A: ReadonlyMatrix): Matrix => {
  const n = requireSquare(A, 'inverse');
  const I = identity(n);

  // Augmented [A | I]
  const M = A.map((row, i) => [...row, ...I[i]]);
  const width = 2 * n;

  for (let col = 0; col < n; col++) {
    const pivotRow = findPivotRow(M, col, col);
    if (Math.abs(M[pivotRow][col]) < LINALG_TOLERANCE) {
      throw new SingularMatrixError('inverse(): matrix is singular (not invertible)');
    }
    if (pivotRow !== col) {
      swapRows(M, pivotRow, col);
    }

    const pivot = M[col][col];
    for (let j = 0; j < width; j++) {
      M[col][j] /= pivot;
    }

    // Full reduction: clear the column above and below the pivot
    for (let r = 0; r < n; r++) {
      if (r === col) continue;
      const factor = M[r][col];
      if (Math.abs(factor) < LINALG_TOLERANCE) continue;
      for (let j = 0; j < width; j++) {
        M[r][j] -= factor * M[col][j];
      }
    }
  }

  return M.map((row) => row.slice(n));
};
