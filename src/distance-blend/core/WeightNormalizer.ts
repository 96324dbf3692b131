/**
 * World Distance Blend - Weight Normalizer
 * Converts distances and scalars into a distribution summing to 1.0.
 *
 * @module distance-blend/core
 */

import type { BlendSource, BlendWeightRecord } from '../types';
import { DEFAULT_BLEND_CONFIG } from '../types';
import type { DistanceSampleSet } from './DistanceSampler';
import { createBlendError } from '../../core/blendErrors';

/**
 * Which floor was applied.
 * - `distance`: a zero or NaN distance was replaced by minDistance for the bias division
 * - `precursor`: a non-positive or non-finite bias * scalar was replaced by
 *   minPrecursorWeight times the largest usable precursor
 */
export type BlendClampKind = 'distance' | 'precursor';

export interface BlendClampNotice {
  readonly kind: BlendClampKind;
  /** Position of the source in registration order */
  readonly index: number;
  readonly value: number;
  readonly clampedTo: number;
}

export interface WeightNormalizerOptions {
  /** Stand-in divisor for a zero distance; 0 disables */
  minDistance?: number;

  /** Fraction of the largest precursor given to unusable ones; 0 disables */
  minPrecursorWeight?: number;

  /** Throw BLEND_ERR_NON_FINITE_WEIGHT for NaN/infinite results */
  debugChecks?: boolean;

  /** Called for every applied floor */
  onClamp?: (notice: BlendClampNotice) => void;
}

/**
 * WeightNormalizer turns sampled distances into blend weight records.
 *
 * For N sources with distances d and scalars s, avg = sum(d) / N:
 *   bias      = avg / d        (1.0 at the average distance, > 1 when closer)
 *   precursor = bias * s
 *   scaled    = precursor / min(precursor)
 *   weight    = scaled / sum(scaled)
 *
 * Positive finite inputs are never altered, so scaling every scalar by the
 * same factor leaves the weights unchanged. A zero distance or a
 * zero/negative scalar is replaced as described on the options; with both
 * disabled it produces infinities or flipped signs.
 */
export class WeightNormalizer {
  private minDistance: number;
  private minPrecursorWeight: number;
  private debugChecks: boolean;
  private onClamp: ((notice: BlendClampNotice) => void) | null;

  constructor(options: WeightNormalizerOptions = {}) {
    this.minDistance = options.minDistance ?? DEFAULT_BLEND_CONFIG.minDistance;
    this.minPrecursorWeight = options.minPrecursorWeight ?? DEFAULT_BLEND_CONFIG.minPrecursorWeight;
    this.debugChecks = options.debugChecks ?? false;
    this.onClamp = options.onClamp ?? null;
  }

  /**
   * Compute records in sample order. Empty input yields an empty array.
   */
  normalize(sampleSet: DistanceSampleSet): BlendWeightRecord[] {
    const { samples, totalDistance } = sampleSet;
    const count = samples.length;
    if (count === 0) return [];

    const averageDistance = totalDistance / count;

    // Precursor weights from relativity to average distance and runtime scaling
    const biases = new Array<number>(count);
    const precursors = new Array<number>(count);
    let highest = 0;

    for (let i = 0; i < count; i++) {
      const { distance, scalar } = samples[i];

      let divisor = distance;
      if (this.minDistance > 0 && !(divisor > 0)) {
        this.notifyClamp('distance', i, divisor, this.minDistance);
        divisor = this.minDistance;
      }

      const bias = averageDistance / divisor;
      const precursor = bias * scalar;

      biases[i] = bias;
      precursors[i] = precursor;
      if (isUsablePrecursor(precursor) && precursor > highest) {
        highest = precursor;
      }
    }

    // Unusable precursors become a fraction of the strongest usable one
    let lowest = Infinity;
    for (let i = 0; i < count; i++) {
      if (this.minPrecursorWeight > 0 && !isUsablePrecursor(precursors[i])) {
        const floor = highest > 0 ? highest * this.minPrecursorWeight : this.minPrecursorWeight;
        this.notifyClamp('precursor', i, precursors[i], floor);
        precursors[i] = floor;
      }
      if (precursors[i] < lowest) {
        lowest = precursors[i];
      }
    }

    // Scale relative to the lowest entry, then to a total of 1.0
    let scaledSum = 0;
    for (let i = 0; i < count; i++) {
      precursors[i] /= lowest;
      scaledSum += precursors[i];
    }

    const records: BlendWeightRecord[] = new Array(count);
    for (let i = 0; i < count; i++) {
      const blendWeight = precursors[i] / scaledSum;

      if (this.debugChecks && !Number.isFinite(blendWeight)) {
        throw createBlendError(
          'BLEND_ERR_NON_FINITE_WEIGHT',
          `index ${i}: distance ${samples[i].distance}, scalar ${samples[i].scalar}`
        );
      }

      records[i] = {
        source: samples[i].source,
        blendWeight,
        distanceBias: biases[i],
        scalar: samples[i].scalar,
        distance: samples[i].distance,
      };
    }

    return records;
  }

  private notifyClamp(kind: BlendClampKind, index: number, value: number, clampedTo: number): void {
    if (this.onClamp) {
      this.onClamp({ kind, index, value, clampedTo });
    }
  }
}

function isUsablePrecursor(value: number): boolean {
  return value > 0 && Number.isFinite(value);
}

/**
 * Hand each source a copy of its record.
 */
export function applyBlendWeights(records: readonly BlendWeightRecord[]): void {
  for (const record of records) {
    const source: BlendSource = record.source;
    source.blendWeight = { ...record };
  }
}

/**
 * Create weight normalizer.
 */
export function createWeightNormalizer(options?: WeightNormalizerOptions): WeightNormalizer {
  return new WeightNormalizer(options);
}
