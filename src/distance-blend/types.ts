/**
 * World Distance Blend - Core Type Definitions
 *
 * @module distance-blend
 */

// ============================================================================
// GEOMETRY
// ============================================================================

/**
 * World-space point or offset.
 * `z` is the vertical axis; planar distance ignores it.
 */
export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

// ============================================================================
// SOURCES
// ============================================================================

/**
 * Capability to report a runtime weighting factor (e.g. light intensity).
 * The default behaviour belongs to the source, not to the engine.
 */
export interface BlendScalarProvider {
  getBlendScalar(): number;
}

/**
 * Anything with a world position.
 */
export interface Positioned {
  getPosition(): Vec3;
}

/**
 * A spatially placed contributor to the blend.
 *
 * Sources are identified by object identity. A registered source must stay
 * valid for as long as it is registered: the engine reads it every frame
 * without checking. Unregister before destroying.
 */
export interface BlendSource extends BlendScalarProvider, Positioned {
  /** Copy of the record computed for this source on the last recomputation */
  blendWeight: BlendWeightRecord;

  /** Liveness, consulted only when debug checks are enabled */
  isAlive?(): boolean;
}

/**
 * Per-source snapshot written once per recomputation.
 */
export interface BlendWeightRecord {
  /** Source this record belongs to */
  readonly source: BlendSource;

  /** Final computed result; the records of one computation sum to 1.0 */
  readonly blendWeight: number;

  /**
   * Higher bias means closer to the target.
   * 1.0 when the source sits exactly at the average distance.
   */
  readonly distanceBias: number;

  /** Runtime scaling reported by the source */
  readonly scalar: number;

  /** How far from the target */
  readonly distance: number;
}

/**
 * Record a source holds before its first recomputation.
 */
export function createDefaultBlendWeight(source: BlendSource): BlendWeightRecord {
  return {
    source,
    blendWeight: 0,
    distanceBias: 1,
    scalar: 1,
    distance: 0,
  };
}

// ============================================================================
// TARGET
// ============================================================================

/**
 * The entity that distances are measured from.
 *
 * A camera-like target exposes `getViewPoint`, which is used in place of its
 * own position (a camera rig's actor location is rarely where the lens is).
 */
export interface BlendTarget extends Positioned {
  getViewPoint?(): Vec3;

  /** A target reporting false is treated as absent */
  isAlive?(): boolean;
}

// ============================================================================
// QUERY RESULTS
// ============================================================================

export interface BlendWeightsResult {
  /** Read-only snapshot; later recomputations replace it rather than mutate it */
  readonly weights: readonly BlendWeightRecord[];

  /** True when `weights` holds data */
  readonly valid: boolean;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export type BlendLogLevel = 'verbose' | 'normal' | 'errors';

/**
 * Distance blend subsystem configuration.
 */
export interface DistanceBlendConfig {
  /** Measure distance in the XY plane only, default true */
  distanceXY: boolean;

  /** Stand-in divisor for a zero distance when computing bias, default 1e-4 */
  minDistance: number;

  /** Fraction of the largest bias * scalar given to non-positive ones, default 1e-6 */
  minPrecursorWeight: number;

  /** Assert caller contracts on the hot path, default false */
  debugChecks: boolean;

  /** Enable console logging */
  logging: boolean;

  /** Console log level */
  logLevel: BlendLogLevel;
}

export const DEFAULT_BLEND_CONFIG: DistanceBlendConfig = {
  distanceXY: true,
  minDistance: 1e-4,
  minPrecursorWeight: 1e-6,
  debugChecks: false,
  logging: false,
  logLevel: 'normal',
};

// ============================================================================
// FRAME STAMPS
// ============================================================================

/** Frame stamp meaning "never computed" */
export const FRAME_NEVER = -1;
