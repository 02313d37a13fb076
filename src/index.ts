/**
 * kitforge - a bundle of small, independent helpers
 *
 * @example
 * ```typescript
 * import { matrix, text } from 'kitforge';
 *
 * const x = matrix.solve([[2, 0], [0, 2]], [4, 6]); // [2, 3]
 * const p = matrix.applyTransform2D(matrix.translate2D(3, 4), [1, 1]); // [4, 5]
 * text.slugify('Hello, World!'); // 'hello-world'
 * ```
 */

// ===== Modules =====
export * as matrix from './core/linalg';
export * as math from './core/utils/mathUtils';
export * as randomx from './core/utils/randomUtils';
export * as text from './core/utils/textUtils';
export * as time from './core/utils/timeUtils';
export * as files from './core/utils/fileUtils';

// ===== Errors =====
export {
  KitforgeError,
  InvalidShapeError,
  DimensionMismatchError,
  ShapeMismatchError,
  SingularMatrixError,
  InvalidUnitError,
  DegenerateTransformError,
  InvalidArgumentError,
  FileNotFoundError,
  FileExistsError,
  isKitforgeError,
  type KitforgeErrorCode,
} from './core/errors';

// ===== Configuration =====
export {
  LINALG_TOLERANCE,
  DEFAULT_ANGLE_UNIT,
  DEFAULT_TIMER_LABEL,
  DEFAULT_NAME_LENGTH,
  DEFAULT_TOKEN_LENGTH,
  DEFAULT_TRUNCATE_SUFFIX,
  BENCHMARK_PRESETS,
  createBenchmarkConfig,
  type BenchmarkConfig,
  type BenchmarkPreset,
} from './core/config';

// ===== Types =====
export type {
  Vec2,
  Vec3,
  Vector,
  ReadonlyVector,
  Matrix,
  ReadonlyMatrix,
  AngleUnit,
} from './core/types';

export const VERSION = '0.1.0';
