/**
 * Mesh types produced by the OBJ parser
 */

/**
 * Attributes a vertex can carry. A mesh's `attributes` is an OR of these.
 */
export enum VertexAttribute {
  Position = 1 << 0,
  Normal = 1 << 1,
  TexCoord = 1 << 2,
}

/** floats per position */
export const POSITION_SIZE = 3;
/** floats per normal */
export const NORMAL_SIZE = 3;
/** floats per texture coordinate */
export const TEX_COORD_SIZE = 2;

/**
 * The attribute combinations a face reference can spell out:
 * `v`, `v/vt`, `v//vn` and `v/vt/vn`
 */
export enum VertexSpecification {
  Position = VertexAttribute.Position,
  PositionTexCoord = VertexAttribute.Position | VertexAttribute.TexCoord,
  PositionNormal = VertexAttribute.Position | VertexAttribute.Normal,
  PositionTexCoordNormal = VertexAttribute.Position | VertexAttribute.TexCoord | VertexAttribute.Normal,
}

/**
 * A triangulated mesh using a single material.
 * Vertices are interleaved; every 3 indices form one triangle.
 */
export interface Mesh {
  /** bitfield of VertexAttribute */
  attributes: number;
  /** floats per vertex */
  vertexStride: number;
  /** float offset of each attribute within a vertex, null when absent */
  positionOffset: number | null;
  normalOffset: number | null;
  texCoordOffset: number | null;

  numVertices: number;
  vertices: Float32Array;

  numIndices: number;
  indices: Uint32Array;

  /** material name, resolved by the caller against a loaded material list */
  material: string;
}

/**
 * Stride and offsets for an attribute bitfield, in position, normal, tex coord order
 */
export interface VertexLayout {
  vertexStride: number;
  positionOffset: number | null;
  normalOffset: number | null;
  texCoordOffset: number | null;
}

export function computeVertexLayout(attributes: number): VertexLayout {
  let vertexStride = 0;
  let positionOffset: number | null = null;
  let normalOffset: number | null = null;
  let texCoordOffset: number | null = null;

  if (attributes & VertexAttribute.Position) {
    positionOffset = vertexStride;
    vertexStride += POSITION_SIZE;
  }
  if (attributes & VertexAttribute.Normal) {
    normalOffset = vertexStride;
    vertexStride += NORMAL_SIZE;
  }
  if (attributes & VertexAttribute.TexCoord) {
    texCoordOffset = vertexStride;
    vertexStride += TEX_COORD_SIZE;
  }

  return { vertexStride, positionOffset, normalOffset, texCoordOffset };
}
