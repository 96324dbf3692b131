/**
 * World Distance Blend - Math Utilities Tests
 * @module distance-blend/__tests__/math
 */

import { describe, it, expect } from 'vitest';
import { vec3, sub3, length3, length2D, distanceBetween } from '../utils/math';

describe('math utilities', () => {
  describe('vec3', () => {
    it('defaults z to 0', () => {
      expect(vec3(1, 2)).toEqual({ x: 1, y: 2, z: 0 });
    });
  });

  describe('sub3', () => {
    it('subtracts component-wise', () => {
      expect(sub3(vec3(5, 7, 9), vec3(1, 2, 3))).toEqual({ x: 4, y: 5, z: 6 });
    });
  });

  describe('length3', () => {
    it('returns euclidean length', () => {
      expect(length3(vec3(3, 4, 12))).toBe(13);
    });

    it('returns 0 for the zero vector', () => {
      expect(length3(vec3(0, 0, 0))).toBe(0);
    });
  });

  describe('length2D', () => {
    it('ignores z', () => {
      expect(length2D(vec3(3, 4, 12))).toBe(5);
    });
  });

  describe('distanceBetween', () => {
    it('measures full 3D distance when not planar', () => {
      expect(distanceBetween(vec3(0, 0, 0), vec3(3, 4, 12), false)).toBe(13);
    });

    it('measures planar distance when planar', () => {
      expect(distanceBetween(vec3(0, 0, 0), vec3(3, 4, 12), true)).toBe(5);
    });

    it('is symmetric', () => {
      const a = vec3(1, -2, 3);
      const b = vec3(-4, 6, 0);
      expect(distanceBetween(a, b, false)).toBe(distanceBetween(b, a, false));
    });
  });
});
