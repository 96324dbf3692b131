/**
 * World Distance Blend - Centralized Error Types
 *
 * Error codes with titles and hints. The per-frame path has no recoverable
 * error channel; these surface configuration problems and, when debug checks
 * are on, caller contract violations.
 */

import { blendLogger, type BlendConsoleLogger } from './blendLogger';

/** Error severity levels */
export type BlendErrorSeverity = 'warning' | 'error' | 'fatal';

/** BLEND_ERR error codes */
export type BlendErrorCode =
  // Configuration errors
  | 'BLEND_ERR_INVALID_CONFIG'
  // Contract violations (debug checks)
  | 'BLEND_ERR_SOURCE_DESTROYED'
  | 'BLEND_ERR_INVALID_FRAME'
  | 'BLEND_ERR_NON_FINITE_WEIGHT';

/** Error definition with human-readable messages */
export interface BlendErrorDef {
  code: BlendErrorCode;
  title: string;
  body: string;
  hint?: string;
  severity: BlendErrorSeverity;
}

/** Error catalog mapping codes to definitions */
export const BLEND_ERROR_CATALOG: Record<BlendErrorCode, Omit<BlendErrorDef, 'code'>> = {
  BLEND_ERR_INVALID_CONFIG: {
    title: 'Invalid Configuration',
    body: 'The distance blend configuration failed validation.',
    hint: 'Check the listed fields against their documented ranges.',
    severity: 'error',
  },

  BLEND_ERR_SOURCE_DESTROYED: {
    title: 'Destroyed Source Still Registered',
    body: 'A blend source reported itself dead while still registered.',
    hint: 'Call unregisterBlendSource before destroying a source.',
    severity: 'fatal',
  },
  BLEND_ERR_INVALID_FRAME: {
    title: 'Invalid Frame Counter',
    body: 'The frame counter must be a non-negative safe integer.',
    hint: 'Pass the host frame counter, not a timestamp in seconds.',
    severity: 'fatal',
  },
  BLEND_ERR_NON_FINITE_WEIGHT: {
    title: 'Non-Finite Blend Weight',
    body: 'A computed blend weight is NaN or infinite.',
    hint: 'A source returned a non-finite position or scalar.',
    severity: 'fatal',
  },
};

/**
 * Get full error definition by code
 */
export function getBlendErrorDef(code: BlendErrorCode): BlendErrorDef {
  const def = BLEND_ERROR_CATALOG[code];
  return { code, ...def };
}

/**
 * Create a blend error object for throwing
 */
export function createBlendError(
  code: BlendErrorCode,
  details?: string
): BlendError {
  const def = getBlendErrorDef(code);
  return new BlendError(code, def.title, def.body, def.hint, def.severity, details);
}

/**
 * BlendError class - extends Error with structured info
 */
export class BlendError extends Error {
  readonly code: BlendErrorCode;
  readonly title: string;
  readonly body: string;
  readonly hint?: string;
  readonly severity: BlendErrorSeverity;
  readonly details?: string;

  constructor(
    code: BlendErrorCode,
    title: string,
    body: string,
    hint?: string,
    severity: BlendErrorSeverity = 'error',
    details?: string
  ) {
    super(`${code}: ${title}`);
    this.name = 'BlendError';
    this.code = code;
    this.title = title;
    this.body = body;
    this.hint = hint;
    this.severity = severity;
    this.details = details;
  }

  /**
   * Get formatted message for console (with code)
   */
  toConsoleMessage(): string {
    let msg = `[${this.code}] ${this.title}: ${this.body}`;
    if (this.details) msg += ` (${this.details})`;
    if (this.hint) msg += ` Hint: ${this.hint}`;
    return msg;
  }
}

/**
 * Log a blend error through the given logger (module logger by default)
 */
export function logBlendError(
  error: BlendError | BlendErrorCode,
  details?: string,
  logger: BlendConsoleLogger = blendLogger
): BlendError {
  const blendError = typeof error === 'string'
    ? createBlendError(error, details)
    : error;

  if (blendError.severity === 'warning') {
    logger.warn(blendError.toConsoleMessage());
  } else {
    logger.error(blendError.toConsoleMessage());
  }

  return blendError;
}

/**
 * Type guard for BlendError
 */
export function isBlendError(error: unknown): error is BlendError {
  return error instanceof BlendError;
}
