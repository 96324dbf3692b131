/**
 * World Distance Blend
 *
 * Per-frame blend weights for spatially placed sources relative to a moving
 * target, so effects can be cross-faded by relative distance:
 * - Sources closer than the average distance get a larger share
 * - Per-source scalars scale each share at runtime
 * - Weights always sum to 1.0
 * - One computation per frame, shared by every caller in that frame
 * - The last non-empty result stays available as a fallback
 *
 * @module distance-blend
 *
 * @example
 * ```typescript
 * import { createDistanceBlendSubsystem, DistanceBlendSource, FrameCounter, vec3 } from './distance-blend';
 *
 * class FogVolume extends DistanceBlendSource {
 *   constructor(private readonly at: Vec3, private readonly density: number) { super(); }
 *   getPosition() { return this.at; }
 *   getBlendScalar() { return this.density; }
 * }
 *
 * const fog = createDistanceBlendSubsystem<FogVolume>();
 * fog.registerBlendSource(new FogVolume(vec3(0, 0), 1));
 * fog.registerBlendSource(new FogVolume(vec3(40, 0), 0.5));
 * fog.assignBlendTarget(camera);
 *
 * const frames = new FrameCounter();
 * const { weights, valid } = fog.getBlendWeights(frames.advance());
 * const mix = valid ? weights : fog.getLastValidBlendWeights().weights;
 * ```
 */

// Types
export type {
  Vec3,
  BlendScalarProvider,
  Positioned,
  BlendSource,
  BlendWeightRecord,
  BlendTarget,
  BlendWeightsResult,
  BlendLogLevel,
  DistanceBlendConfig,
} from './types';

// Constants
export { DEFAULT_BLEND_CONFIG, FRAME_NEVER, createDefaultBlendWeight } from './types';

// Main subsystem
export {
  DistanceBlendSubsystem,
  createDistanceBlendSubsystem,
  formatBlendWeights,
} from './DistanceBlendSubsystem';
export { DistanceBlendSource } from './DistanceBlendSource';

// Registry
export { SourceRegistry, createSourceRegistry } from './registry/SourceRegistry';

// Core modules
export {
  FrameGate,
  FrameCounter,
  TargetBinding,
  resolveTargetPoint,
  DistanceSampler,
  createDistanceSampler,
  WeightNormalizer,
  createWeightNormalizer,
  applyBlendWeights,
  ResultCache,
  createResultCache,
} from './core';
export type {
  DistanceSample,
  DistanceSampleSet,
  DistanceSamplerOptions,
  BlendClampKind,
  BlendClampNotice,
  WeightNormalizerOptions,
} from './core';

// Utils
export * from './utils/math';
