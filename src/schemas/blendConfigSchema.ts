/**
 * Zod Schemas for Distance Blend Configuration
 *
 * Validates subsystem configuration coming from code or the environment.
 * Missing fields fall back to DEFAULT_BLEND_CONFIG; invalid fields are
 * rejected with a BLEND_ERR_INVALID_CONFIG error listing every issue.
 *
 * @module schemas/blendConfigSchema
 */

import { z } from 'zod';
import { createBlendError } from '../core/blendErrors';
import { DEFAULT_BLEND_CONFIG, type DistanceBlendConfig } from '../distance-blend/types';

// ============ Schemas ============

export const BlendLogLevelSchema = z.enum(['verbose', 'normal', 'errors']);

/**
 * Full configuration
 */
export const DistanceBlendConfigSchema = z.object({
  distanceXY: z.boolean(),
  minDistance: z.number().finite().min(0),
  minPrecursorWeight: z.number().finite().min(0),
  debugChecks: z.boolean(),
  logging: z.boolean(),
  logLevel: BlendLogLevelSchema,
});

/**
 * Configuration as accepted from callers: every field optional, no unknown keys
 */
export const PartialDistanceBlendConfigSchema = DistanceBlendConfigSchema.partial().strict();

// ============ Type Inference ============

export type ValidatedDistanceBlendConfig = z.infer<typeof DistanceBlendConfigSchema>;
export type DistanceBlendConfigInput = z.infer<typeof PartialDistanceBlendConfigSchema>;

// ============ Validation Helpers ============

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  error?: z.ZodError;
  issues?: string[];
}

/**
 * Validate a configuration, filling defaults, with detailed error reporting.
 */
export function validateDistanceBlendConfig(data: unknown): ValidationResult<DistanceBlendConfig> {
  const result = PartialDistanceBlendConfigSchema.safeParse(data ?? {});

  if (!result.success) {
    return {
      success: false,
      error: result.error,
      issues: result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      ),
    };
  }

  const d = result.data;
  const defaults = getDefaultBlendConfig();

  return {
    success: true,
    data: {
      distanceXY: d.distanceXY ?? defaults.distanceXY,
      minDistance: d.minDistance ?? defaults.minDistance,
      minPrecursorWeight: d.minPrecursorWeight ?? defaults.minPrecursorWeight,
      debugChecks: d.debugChecks ?? defaults.debugChecks,
      logging: d.logging ?? defaults.logging,
      logLevel: d.logLevel ?? defaults.logLevel,
    },
  };
}

/**
 * Parse a configuration or throw BLEND_ERR_INVALID_CONFIG.
 */
export function parseDistanceBlendConfig(data: unknown): DistanceBlendConfig {
  const result = validateDistanceBlendConfig(data);
  if (!result.success || !result.data) {
    throw createBlendError('BLEND_ERR_INVALID_CONFIG', result.issues?.join('; '));
  }
  return result.data;
}

/**
 * Get default configuration.
 */
export function getDefaultBlendConfig(): DistanceBlendConfig {
  return { ...DEFAULT_BLEND_CONFIG };
}

// ============ Environment ============

/** Environment variables read by loadDistanceBlendConfigFromEnv */
export const BLEND_ENV_KEYS = {
  debug: 'DISTANCE_BLEND_DEBUG',
  logLevel: 'DISTANCE_BLEND_LOG_LEVEL',
  distanceXY: 'DISTANCE_BLEND_XY',
} as const;

function parseEnvFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return undefined;
}

/**
 * Build a configuration from environment variables.
 *
 * - DISTANCE_BLEND_DEBUG=true enables debug checks
 * - DISTANCE_BLEND_LOG_LEVEL=verbose|normal|errors enables logging at that level
 * - DISTANCE_BLEND_XY=false switches to full 3D distance
 *
 * Unrecognized flag values are ignored; an unknown log level is rejected.
 */
export function loadDistanceBlendConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): DistanceBlendConfig {
  const input: Record<string, unknown> = {};

  const debug = parseEnvFlag(env[BLEND_ENV_KEYS.debug]);
  if (debug !== undefined) input.debugChecks = debug;

  const logLevel = env[BLEND_ENV_KEYS.logLevel];
  if (logLevel !== undefined && logLevel !== '') {
    input.logging = true;
    input.logLevel = logLevel.trim().toLowerCase();
  }

  const distanceXY = parseEnvFlag(env[BLEND_ENV_KEYS.distanceXY]);
  if (distanceXY !== undefined) input.distanceXY = distanceXY;

  return parseDistanceBlendConfig(input);
}
