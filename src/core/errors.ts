/**
 * Error taxonomy shared by every kitforge module.
 *
 * Each failure kind is its own class so callers can branch with `instanceof`;
 * `code` carries the same information for logs and serialized reports.
 */

export type KitforgeErrorCode =
  | 'INVALID_SHAPE'
  | 'DIMENSION_MISMATCH'
  | 'SHAPE_MISMATCH'
  | 'SINGULAR_MATRIX'
  | 'INVALID_UNIT'
  | 'DEGENERATE_TRANSFORM'
  | 'INVALID_ARGUMENT'
  | 'FILE_NOT_FOUND'
  | 'FILE_EXISTS';

export class KitforgeError extends Error {
  constructor(
    message: string,
    public readonly code: KitforgeErrorCode
  ) {
    super(message);
    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Malformed matrix: empty, ragged, or non-positive dimensions */
export class InvalidShapeError extends KitforgeError {
  constructor(message: string) {
    super(message, 'INVALID_SHAPE');
  }
}

/** Operand lengths disagree for an operation that needs them to agree */
export class DimensionMismatchError extends KitforgeError {
  constructor(message: string) {
    super(message, 'DIMENSION_MISMATCH');
  }
}

/** Square-matrix requirement violated, or wrong point arity for a transform */
export class ShapeMismatchError extends KitforgeError {
  constructor(message: string) {
    super(message, 'SHAPE_MISMATCH');
  }
}

export class SingularMatrixError extends KitforgeError {
  constructor(message: string) {
    super(message, 'SINGULAR_MATRIX');
  }
}

export class InvalidUnitError extends KitforgeError {
  constructor(public readonly unit: string) {
    super(`unit must be 'degrees' or 'radians', got '${unit}'`, 'INVALID_UNIT');
  }
}

/** Homogeneous divisor (w) came out as zero */
export class DegenerateTransformError extends KitforgeError {
  constructor(message: string) {
    super(message, 'DEGENERATE_TRANSFORM');
  }
}

export class InvalidArgumentError extends KitforgeError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
  }
}

export class FileNotFoundError extends KitforgeError {
  constructor(public readonly path: string) {
    super(`File not found: ${path}`, 'FILE_NOT_FOUND');
  }
}

export class FileExistsError extends KitforgeError {
  constructor(public readonly path: string) {
    super(`File already exists: ${path}`, 'FILE_EXISTS');
  }
}

export const isKitforgeError = (value: unknown): value is KitforgeError =>
  value instanceof KitforgeError;
