/**
 * World Distance Blend - Result Cache
 * Current frame's weights plus the last non-empty result.
 *
 * @module distance-blend/core
 */

import type { BlendWeightRecord, BlendWeightsResult } from '../types';

const EMPTY: readonly BlendWeightRecord[] = Object.freeze([]);

/**
 * Holds the output of the most recent recomputation.
 *
 * Each commit replaces the stored array, so arrays already handed to
 * callers are never modified afterwards.
 */
export class ResultCache {
  private current: readonly BlendWeightRecord[] = EMPTY;

  /** Most recent non-empty commit; never cleared by an empty one */
  private lastValid: readonly BlendWeightRecord[] = EMPTY;

  /**
   * Store a freshly computed set of records.
   */
  commit(records: BlendWeightRecord[]): void {
    this.current = records.length > 0 ? Object.freeze(records) : EMPTY;
    if (this.current.length > 0) {
      this.lastValid = this.current;
    }
  }

  /**
   * Drop the current records (last valid ones are kept).
   */
  invalidate(): void {
    this.current = EMPTY;
  }

  /**
   * Current records; valid when non-empty.
   */
  getCurrent(): BlendWeightsResult {
    return { weights: this.current, valid: this.current.length > 0 };
  }

  /**
   * Current records, reported invalid regardless of content.
   */
  getCurrentInvalid(): BlendWeightsResult {
    return { weights: this.current, valid: false };
  }

  /**
   * Last non-empty records; valid when there has been one.
   */
  getLastValid(): BlendWeightsResult {
    return { weights: this.lastValid, valid: this.lastValid.length > 0 };
  }
}

/**
 * Create empty result cache.
 */
export function createResultCache(): ResultCache {
  return new ResultCache();
}
