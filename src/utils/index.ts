/**
 * Utility exports
 */

export {
  computeBoundingBox,
  computeMeshBoundingBox,
  mergeBoundingBoxes,
  createBoundingBoxFromMinMax,
} from './geometry';
