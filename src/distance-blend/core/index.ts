/**
 * World Distance Blend - Core Modules
 *
 * @module distance-blend/core
 */

export { FrameGate, FrameCounter } from './FrameGate';
export { TargetBinding, resolveTargetPoint } from './TargetBinding';
export { DistanceSampler, createDistanceSampler } from './DistanceSampler';
export type { DistanceSample, DistanceSampleSet, DistanceSamplerOptions } from './DistanceSampler';
export { WeightNormalizer, createWeightNormalizer, applyBlendWeights } from './WeightNormalizer';
export type { BlendClampKind, BlendClampNotice, WeightNormalizerOptions } from './WeightNormalizer';
export { ResultCache, createResultCache } from './ResultCache';
