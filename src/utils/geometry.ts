/**
 * Bounding box helpers for loaded meshes
 */

import type { BoundingBox, Mesh, Vec3Tuple } from '../types';

/**
 * Bounding box of packed positions
 * @param positions [x0, y0, z0, x1, y1, z1, ...]
 */
export function computeBoundingBox(positions: ArrayLike<number>): BoundingBox {
  return computeStridedBoundingBox(positions, Math.floor(positions.length / 3), 3, 0);
}

/**
 * Bounding box of a mesh's interleaved positions.
 * Meshes without positions or vertices get a zero box.
 */
export function computeMeshBoundingBox(mesh: Mesh): BoundingBox {
  if (mesh.positionOffset === null) {
    return createBoundingBoxFromMinMax([0, 0, 0], [0, 0, 0]);
  }
  return computeStridedBoundingBox(mesh.vertices, mesh.numVertices, mesh.vertexStride, mesh.positionOffset);
}

function computeStridedBoundingBox(
  data: ArrayLike<number>,
  count: number,
  stride: number,
  offset: number
): BoundingBox {
  if (count < 1) {
    return createBoundingBoxFromMinMax([0, 0, 0], [0, 0, 0]);
  }

  const min: Vec3Tuple = [data[offset], data[offset + 1], data[offset + 2]];
  const max: Vec3Tuple = [...min];

  for (let i = 1; i < count; i++) {
    const base = i * stride + offset;
    includePoint(min, max, data[base], data[base + 1], data[base + 2]);
  }

  return createBoundingBoxFromMinMax(min, max);
}

// grows min/max in place to contain the point
function includePoint(min: Vec3Tuple, max: Vec3Tuple, x: number, y: number, z: number): void {
  if (x < min[0]) min[0] = x;
  if (y < min[1]) min[1] = y;
  if (z < min[2]) min[2] = z;
  if (x > max[0]) max[0] = x;
  if (y > max[1]) max[1] = y;
  if (z > max[2]) max[2] = z;
}

/**
 * Union of several boxes, null for an empty list
 */
export function mergeBoundingBoxes(boxes: readonly BoundingBox[]): BoundingBox | null {
  if (boxes.length === 0) return null;

  const [first, ...rest] = boxes;
  const min: Vec3Tuple = [...first.min];
  const max: Vec3Tuple = [...first.max];

  for (const box of rest) {
    includePoint(min, max, ...box.min);
    includePoint(min, max, ...box.max);
  }

  return createBoundingBoxFromMinMax(min, max);
}

/**
 * Fills in center and bounding sphere radius for a min/max pair
 */
export function createBoundingBoxFromMinMax(min: Vec3Tuple, max: Vec3Tuple): BoundingBox {
  const extent: Vec3Tuple = [max[0] - min[0], max[1] - min[1], max[2] - min[2]];

  return {
    min,
    max,
    center: [min[0] + extent[0] / 2, min[1] + extent[1] / 2, min[2] + extent[2] / 2],
    radius: Math.hypot(...extent) / 2,
  };
}
