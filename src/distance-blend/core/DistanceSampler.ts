/**
 * World Distance Blend - Distance Sampler
 * Measures each source's distance to the target point in one pass.
 *
 * @module distance-blend/core
 */

import type { BlendSource, Vec3 } from '../types';
import { createBlendError } from '../../core/blendErrors';
import { distanceBetween } from '../utils/math';

/**
 * Raw per-source measurement, before any bias is applied.
 */
export interface DistanceSample<S extends BlendSource = BlendSource> {
  readonly source: S;
  readonly distance: number;
  readonly scalar: number;
}

/**
 * Result of sampling every registered source.
 */
export interface DistanceSampleSet<S extends BlendSource = BlendSource> {
  readonly samples: DistanceSample<S>[];
  readonly totalDistance: number;
}

export interface DistanceSamplerOptions {
  /** Throw BLEND_ERR_SOURCE_DESTROYED for sources reporting dead */
  debugChecks?: boolean;
}

/**
 * DistanceSampler reads scalar and position from each source, in
 * registration order, and accumulates the total distance.
 */
export class DistanceSampler {
  private debugChecks: boolean;

  constructor(options: DistanceSamplerOptions = {}) {
    this.debugChecks = options.debugChecks ?? false;
  }

  /**
   * Sample all sources against `targetPoint`.
   * `planar` measures in the XY plane, ignoring z.
   */
  sample<S extends BlendSource>(
    sources: Iterable<S>,
    targetPoint: Vec3,
    planar: boolean
  ): DistanceSampleSet<S> {
    const samples: DistanceSample<S>[] = [];
    let totalDistance = 0;

    for (const source of sources) {
      // Not validated unless debug checks are on: registered sources are
      // required to stay alive until unregistered.
      if (this.debugChecks && source.isAlive && !source.isAlive()) {
        throw createBlendError('BLEND_ERR_SOURCE_DESTROYED', `index ${samples.length}`);
      }

      const scalar = source.getBlendScalar();
      const distance = distanceBetween(targetPoint, source.getPosition(), planar);

      totalDistance += distance;
      samples.push({ source, distance, scalar });
    }

    return { samples, totalDistance };
  }
}

/**
 * Create distance sampler.
 */
export function createDistanceSampler(options?: DistanceSamplerOptions): DistanceSampler {
  return new DistanceSampler(options);
}
