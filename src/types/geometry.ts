/**
 * Shared geometry types
 */

/**
 * 3D vector as a tuple
 */
export type Vec3Tuple = [number, number, number];

/**
 * Axis-aligned bounding box with its bounding sphere
 */
export interface BoundingBox {
  /** minimum corner */
  min: Vec3Tuple;
  /** maximum corner */
  max: Vec3Tuple;
  /** box center */
  center: Vec3Tuple;
  /** bounding sphere radius (half the diagonal) */
  radius: number;
}
