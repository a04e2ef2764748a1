/**
 * Type exports
 */

// geometry
export type { Vec3Tuple, BoundingBox } from './geometry';

// meshes
export type { Mesh, VertexLayout } from './mesh';
export {
  VertexAttribute,
  VertexSpecification,
  POSITION_SIZE,
  NORMAL_SIZE,
  TEX_COORD_SIZE,
  computeVertexLayout,
} from './mesh';

// materials
export type { Color, Material } from './material';
export { createDefaultMaterial } from './material';
