/**
 * World Distance Blend - Source Base Class
 *
 * @module distance-blend
 */

import type { BlendSource, BlendWeightRecord, Vec3 } from './types';
import { createDefaultBlendWeight } from './types';

/**
 * Convenience base for blend sources.
 *
 * Holds the record the subsystem hands back after each recomputation and
 * reports a scalar of 1. Override `getBlendScalar` to change how much blend
 * weight a source has (e.g. scale by a light's current intensity).
 */
export abstract class DistanceBlendSource implements BlendSource {
  blendWeight: BlendWeightRecord;

  constructor() {
    this.blendWeight = createDefaultBlendWeight(this);
  }

  abstract getPosition(): Vec3;

  getBlendScalar(): number {
    return 1;
  }
}
