/**
 * Error taxonomy for batch runs
 *
 * Only ConfigError and ResourceError end a run. Everything else is folded
 * into the failing combination's result.
 *
 * Usage:
 *   throw new ConfigError('Invalid configuration', { issues });
 *   throw new ResourceError('Cannot create output directory', { path });
 */

// =============================================================================
// ERROR CODES
// =============================================================================

export enum ErrorCode {
  CONFIG = 'CONFIG',
  RESOURCE = 'RESOURCE',
  COMBINATION = 'COMBINATION',
  TOLERANCE = 'TOLERANCE',
  TIMEOUT = 'TIMEOUT',
}

// =============================================================================
// BASE CLASS
// =============================================================================

export class SweepError extends Error {
  public readonly code: ErrorCode;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(message: string, code: ErrorCode, context: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date().toISOString();
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// SUBCLASSES
// =============================================================================

/** Malformed or missing configuration. Fatal. */
export class ConfigError extends SweepError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.CONFIG, context);
  }
}

/** Output directory or engine connection unavailable. Fatal. */
export class ResourceError extends SweepError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.RESOURCE, context);
  }
}

/** Parameterization, meshing or save failed for one combination. */
export class CombinationError extends SweepError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.COMBINATION, context);
  }
}

/** Meshing failed while error_tolerance is "continue". */
export class ToleranceError extends SweepError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.TOLERANCE, context);
  }
}

/** A combination or external job ran past its allotted time. */
export class TimeoutError extends SweepError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.TIMEOUT, { ...context, timeoutMs });
    this.timeoutMs = timeoutMs;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function isFatal(err: unknown): err is ConfigError | ResourceError {
  return err instanceof ConfigError || err instanceof ResourceError;
}

/**
 * Reduce any thrown value to the { type, message } pair stored in results.
 */
export function describeError(err: unknown): { type: string; message: string } {
  if (err instanceof Error) {
    return { type: err.name, message: err.message };
  }
  return { type: 'Error', message: String(err) };
}
