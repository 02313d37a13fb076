/**
 * Linear algebra barrel exports
 */

export { dot, cross, norm } from './vector';

export {
  shape,
  isSquare,
  zeros,
  identity,
  transpose,
  matmul,
  matvec,
  minor,
  matricesClose,
} from './matrix';

export { det, solve, inverse } from './elimination';

export {
  translate2D,
  scale2D,
  rotate2D,
  applyTransform2D,
  translate3D,
  scale3D,
  rotateX,
  rotateY,
  rotateZ,
  applyTransform3D,
  composeTransforms,
} from './transforms';
