/**
 * OBJ/MTL loader
 * Library entry - exports the public API
 */

// ============================================
// Types
// ============================================
export type {
  Vec3Tuple,
  BoundingBox,
  Mesh,
  VertexLayout,
  Color,
  Material,
} from './types';

export {
  VertexAttribute,
  VertexSpecification,
  POSITION_SIZE,
  NORMAL_SIZE,
  TEX_COORD_SIZE,
  computeVertexLayout,
  createDefaultMaterial,
} from './types';

// ============================================
// Errors & configuration
// ============================================
export { LoaderError, captureLoad } from './core/LoaderError';
export type { LoaderErrorKind, LoaderErrorOptions, LoadResult } from './core/LoaderError';
export { LoaderOptionsSchema, resolveLoaderOptions } from './core/config';
export type { LoaderOptions, LoaderOptionsInput } from './core/config';

// ============================================
// Core
// ============================================
export { StringSource, FileSource } from './core/CharSource';
export type { CharSource } from './core/CharSource';
export { Tokenizer } from './core/Tokenizer';
export type { Token, TokenEnd, TokenizerOptions } from './core/Tokenizer';
export { GrowableBuffer } from './core/GrowableBuffer';
export type { GrowableBufferOptions, NumericArray } from './core/GrowableBuffer';
export { OpenAddressingMap, createVertexHashMap, vertexRefKeyOps } from './core/VertexHashMap';
export type { KeyOps, VertexRef, VertexHashMap } from './core/VertexHashMap';

// ============================================
// Utils
// ============================================
export {
  computeBoundingBox,
  computeMeshBoundingBox,
  mergeBoundingBoxes,
  createBoundingBoxFromMinMax,
} from './utils';

// ============================================
// Loaders
// ============================================
export {
  OBJLoader,
  loadMeshes,
  loadMaterials,
  loadModel,
  parseMeshes,
  parseMaterials,
  freeMeshes,
  freeMaterials,
  findMaterial,
} from './loaders/OBJLoader';
export type { LoadedModel } from './loaders/OBJLoader';
export { OBJParser, parseVertexRef, resolveIndex } from './loaders/OBJParser';
export type { ParsedOBJData } from './loaders/OBJParser';
export { MTLParser } from './loaders/MTLParser';
