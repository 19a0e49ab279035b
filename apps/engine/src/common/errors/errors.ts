/**
 * Engine Errors - Custom error types for ranking and team detection
 *
 * Provides structured error handling with:
 * - Specific error types for different failure modes
 * - Error codes for programmatic handling
 * - Contextual information for debugging
 *
 * Filtered data (unknown nation codes, isolated players, low activity) is
 * never an error. Only slice-fatal and malformed-input conditions get a type.
 *
 * @module common/errors
 */

/**
 * Base error for all engine errors
 */
export abstract class RankingError extends Error {
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
    };
  }
}

/**
 * Invalid input data error
 */
export class InvalidInputError extends RankingError {
  readonly code = "INVALID_INPUT";
  readonly field: string | undefined;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
    this.field = field;
  }
}

/**
 * No nation recorded a decided game in the slice, so k and CF are undefined
 */
export class ConfidenceFactorUndefinedError extends RankingError {
  readonly code = "CONFIDENCE_FACTOR_UNDEFINED";
  readonly gameMode: string;

  constructor(gameMode: string, context?: Record<string, unknown>) {
    super(
      `Confidence factor is undefined for game mode "${gameMode}": no nation has recorded games`,
      { ...context, gameMode },
    );
    this.gameMode = gameMode;
  }
}

/**
 * Nation has no recorded games in the slice
 */
export class NationNotFoundError extends RankingError {
  readonly code = "NATION_NOT_FOUND";
  readonly countryCode: string;
  readonly gameMode: string;

  constructor(countryCode: string, gameMode: string) {
    super(`Nation ${countryCode} has no recorded games in game mode "${gameMode}"`, {
      countryCode,
      gameMode,
    });
    this.countryCode = countryCode;
    this.gameMode = gameMode;
  }
}

/**
 * Slice computation failed for a reason other than the above
 */
export class SliceComputationError extends RankingError {
  readonly code = "SLICE_COMPUTATION_FAILED";
  readonly gameMode: string;

  constructor(gameMode: string, cause: unknown) {
    super(
      `Computation failed for game mode "${gameMode}": ${cause instanceof Error ? cause.message : String(cause)}`,
      { gameMode },
    );
    this.gameMode = gameMode;
  }
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E extends RankingError = RankingError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Create a success result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Create a failure result
 */
export function err<E extends RankingError>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isErr<T, E extends RankingError>(
  result: Result<T, E>,
): result is { success: false; error: E } {
  return !result.success;
}

/**
 * Unwrap result or throw
 */
export function unwrap<T, E extends RankingError>(result: Result<T, E>): T {
  if (result.success) {
    return result.data;
  }
  throw result.error;
}
