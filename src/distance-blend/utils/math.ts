/**
 * World Distance Blend - Math Utilities
 * Vector helpers for distance sampling.
 *
 * @module distance-blend/utils/math
 */

import type { Vec3 } from '../types';

/**
 * Construct a point.
 */
export function vec3(x: number, y: number, z: number = 0): Vec3 {
  return { x, y, z };
}

/**
 * Component-wise a - b.
 */
export function sub3(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

/**
 * Euclidean length.
 */
export function length3(v: Vec3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

/**
 * Length in the XY plane, ignoring z.
 */
export function length2D(v: Vec3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

/**
 * Distance between two points, optionally planar.
 */
export function distanceBetween(a: Vec3, b: Vec3, planar: boolean): number {
  const diff = sub3(a, b);
  return planar ? length2D(diff) : length3(diff);
}
