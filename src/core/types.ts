/**
 * Shapes of the vectors and matrices the linear algebra and transform helpers
 * take and return.
 */

/** Result of applyTransform2D */
export type Vec2 = [number, number];

/** Result of cross() and applyTransform3D */
export type Vec3 = [number, number, number];

/**
 * Dense vector of arbitrary length
 */
export type Vector = number[];

/**
 * Vector accepted as input; never mutated by the library
 */
export type ReadonlyVector = readonly number[];

/**
 * Dense row-major matrix: one array per row, all rows of equal length
 */
export type Matrix = number[][];

/**
 * Matrix accepted as input; never mutated by the library
 */
export type ReadonlyMatrix = readonly (readonly number[])[];

/**
 * Angle unit accepted by trigonometry and rotation builders
 */
export type AngleUnit = 'degrees' | 'radians';
