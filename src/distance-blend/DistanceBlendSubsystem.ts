/**
 * World Distance Blend - Subsystem
 * Per-frame blend weights for registered sources relative to one target.
 *
 * @module distance-blend
 */

import type {
  BlendSource,
  BlendTarget,
  BlendWeightRecord,
  BlendWeightsResult,
  DistanceBlendConfig,
} from './types';
import { SourceRegistry, createSourceRegistry } from './registry/SourceRegistry';
import { FrameGate } from './core/FrameGate';
import { TargetBinding, resolveTargetPoint } from './core/TargetBinding';
import { DistanceSampler, createDistanceSampler } from './core/DistanceSampler';
import {
  WeightNormalizer,
  createWeightNormalizer,
  applyBlendWeights,
  type BlendClampNotice,
} from './core/WeightNormalizer';
import { ResultCache, createResultCache } from './core/ResultCache';
import { parseDistanceBlendConfig, type DistanceBlendConfigInput } from '../schemas/blendConfigSchema';
import { BlendConsoleLogger } from '../core/blendLogger';
import { createBlendError, isBlendError, logBlendError } from '../core/blendErrors';

/**
 * DistanceBlendSubsystem tracks blend sources and answers "how much does each
 * source contribute right now" for one target.
 *
 * The first `getBlendWeights` call in a frame recomputes; later calls with the
 * same frame return the cached records. The frame counter is supplied by the
 * caller. Assigning a different target drops the cached records so the next
 * query recomputes even within the same frame.
 *
 * Single-threaded. Sources must be unregistered before they are destroyed.
 * Subclass per effect domain (lighting, fog, audio ambience) to get one
 * independent set of sources and target each.
 */
export class DistanceBlendSubsystem<
  S extends BlendSource = BlendSource,
  T extends BlendTarget = BlendTarget,
> {
  /** Validated configuration */
  private config: DistanceBlendConfig;

  /** Registered sources, in registration order */
  private registry: SourceRegistry<S>;

  /** Weak reference to the target */
  private target = new TargetBinding<T>();

  /** Frame of the last recomputation */
  private frameGate = new FrameGate();

  /** Distance measurement */
  private sampler: DistanceSampler;

  /** Bias and normalization math */
  private normalizer: WeightNormalizer;

  /** Current and last valid records */
  private cache: ResultCache;

  /** Logger owned by this subsystem */
  private logger: BlendConsoleLogger;

  constructor(config?: DistanceBlendConfigInput) {
    this.logger = new BlendConsoleLogger();
    this.config = parseConfigOrReport(config, this.logger);
    this.logger.setEnabled(this.config.logging);
    this.logger.setLogLevel(this.config.logLevel);

    this.registry = createSourceRegistry<S>();
    this.sampler = createDistanceSampler({ debugChecks: this.config.debugChecks });
    this.normalizer = createWeightNormalizer({
      minDistance: this.config.minDistance,
      minPrecursorWeight: this.config.minPrecursorWeight,
      debugChecks: this.config.debugChecks,
      onClamp: (notice) => this.onClamp(notice),
    });
    this.cache = createResultCache();
  }

  // ==========================================================================
  // TARGET
  // ==========================================================================

  /**
   * Assign the entity distances are measured from. Null clears it.
   * Camera-like targets (with `getViewPoint`) use their view point.
   */
  assignBlendTarget(newTarget: T | null): void {
    const changed = this.target.assign(newTarget);
    if (changed) {
      this.cache.invalidate();
      this.frameGate.reset();
      this.logger.verbose(newTarget ? 'Blend target assigned' : 'Blend target cleared');
    }
  }

  /**
   * Currently assigned target (null if none or collected).
   */
  getBlendTarget(): T | null {
    return this.target.get();
  }

  // ==========================================================================
  // SOURCES
  // ==========================================================================

  /**
   * Register a source. Registering twice has no effect.
   */
  registerBlendSource(source: S): void {
    if (this.registry.register(source)) {
      this.logger.verbose(`Registered source (${this.registry.size} total)`);
    }
  }

  /**
   * Unregister a source. Unknown sources are ignored.
   */
  unregisterBlendSource(source: S): void {
    if (this.registry.unregister(source)) {
      this.logger.verbose(`Unregistered source (${this.registry.size} total)`);
    }
  }

  /**
   * Registered sources, in registration order.
   */
  getBlendSources(): readonly S[] {
    return this.registry.toArray();
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /**
   * Blend weights for `frame`, recomputing if this is the first query of
   * the frame.
   *
   * `valid` is false when there is no live target or no registered source;
   * use `getLastValidBlendWeights` as the fallback in that case.
   *
   * `distanceXY` only matters on the recomputing call: a later call in the
   * same frame gets the cached records whatever it passes.
   */
  getBlendWeights(frame: number, distanceXY: boolean = this.config.distanceXY): BlendWeightsResult {
    if (this.config.debugChecks && !(Number.isSafeInteger(frame) && frame >= 0)) {
      throw logBlendError(createBlendError('BLEND_ERR_INVALID_FRAME', String(frame)), undefined, this.logger);
    }

    const target = this.target.resolve();
    if (!target) {
      return this.cache.getCurrentInvalid();
    }

    if (this.frameGate.shouldRecompute(frame)) {
      this.recompute(frame, target, distanceXY);
    }

    return this.cache.getCurrent();
  }

  /**
   * Records of the most recent non-empty computation. Never recomputes.
   * `valid` is false until a computation has produced records.
   */
  getLastValidBlendWeights(): BlendWeightsResult {
    return this.cache.getLastValid();
  }

  /**
   * Frame of the last recomputation, FRAME_NEVER if none since the
   * last target change.
   */
  getLastUpdateFrame(): number {
    return this.frameGate.lastFrame;
  }

  /**
   * Effective configuration.
   */
  getConfig(): Readonly<DistanceBlendConfig> {
    return this.config;
  }

  /**
   * Logger (for enabling output at runtime).
   */
  getLogger(): BlendConsoleLogger {
    return this.logger;
  }

  // ==========================================================================
  // RECOMPUTATION
  // ==========================================================================

  private recompute(frame: number, target: T, distanceXY: boolean): void {
    const records = this.computeRecords(target, distanceXY);

    // Stamped only after a complete computation
    this.frameGate.stamp(frame);
    this.cache.commit(records);
    applyBlendWeights(records);

    if (this.logger.isVerbose()) {
      this.logger.verbose(`Frame ${frame}: ${records.length} weights (${distanceXY ? 'XY' : 'XYZ'})`);
      this.logger.table(formatBlendWeights(records));
    }
  }

  private computeRecords(target: T, distanceXY: boolean): BlendWeightRecord[] {
    try {
      const targetPoint = resolveTargetPoint(target);
      const sampleSet = this.sampler.sample(this.registry, targetPoint, distanceXY);
      return this.normalizer.normalize(sampleSet);
    } catch (error) {
      if (isBlendError(error)) {
        logBlendError(error, undefined, this.logger);
      }
      throw error;
    }
  }

  private onClamp(notice: BlendClampNotice): void {
    this.logger.verbose(
      `Clamped ${notice.kind} of source ${notice.index}: ${notice.value} -> ${notice.clampedTo}`
    );
  }
}

/**
 * Parse configuration, logging a rejected one even with logging off.
 */
function parseConfigOrReport(
  config: DistanceBlendConfigInput | undefined,
  logger: BlendConsoleLogger
): DistanceBlendConfig {
  try {
    return parseDistanceBlendConfig(config);
  } catch (error) {
    if (isBlendError(error)) {
      logger.setEnabled(true);
      logBlendError(error, undefined, logger);
    }
    throw error;
  }
}

/**
 * Flatten records into rows for console tables.
 */
export function formatBlendWeights(
  records: readonly BlendWeightRecord[]
): Array<{ weight: number; bias: number; scalar: number; distance: number }> {
  return records.map((r) => ({
    weight: r.blendWeight,
    bias: r.distanceBias,
    scalar: r.scalar,
    distance: r.distance,
  }));
}

/**
 * Create distance blend subsystem.
 */
export function createDistanceBlendSubsystem<
  S extends BlendSource = BlendSource,
  T extends BlendTarget = BlendTarget,
>(config?: DistanceBlendConfigInput): DistanceBlendSubsystem<S, T> {
  return new DistanceBlendSubsystem<S, T>(config);
}
