/**
 * World Distance Blend
 *
 * Distance-based blend weights for cross-fading spatial effects.
 *
 * @example
 * import { createDistanceBlendSubsystem } from 'world-distance-blend';
 * import { parseDistanceBlendConfig } from 'world-distance-blend';
 *
 * @module world-distance-blend
 */

// ============ Engine ============
export * from './distance-blend';

// ============ Configuration ============
export {
  BlendLogLevelSchema,
  DistanceBlendConfigSchema,
  PartialDistanceBlendConfigSchema,
  BLEND_ENV_KEYS,
  validateDistanceBlendConfig,
  parseDistanceBlendConfig,
  getDefaultBlendConfig,
  loadDistanceBlendConfigFromEnv,
} from './schemas/blendConfigSchema';
export type {
  ValidatedDistanceBlendConfig,
  DistanceBlendConfigInput,
  ValidationResult,
} from './schemas/blendConfigSchema';

// ============ Errors & Logging ============
export {
  BLEND_ERROR_CATALOG,
  BlendError,
  createBlendError,
  getBlendErrorDef,
  logBlendError,
  isBlendError,
} from './core/blendErrors';
export type { BlendErrorCode, BlendErrorDef, BlendErrorSeverity } from './core/blendErrors';
export { BlendConsoleLogger, blendLogger } from './core/blendLogger';
