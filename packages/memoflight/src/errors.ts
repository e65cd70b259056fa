/**
 * memoflight/errors
 *
 * Errors raised by the cache engine itself. Failures of the wrapped
 * computation are never wrapped: they reach callers exactly as thrown.
 *
 * @example
 * ```typescript
 * import { isFlightCancelledError } from 'memoflight';
 *
 * try {
 *   await cache.callAsync(loadReport, reportId);
 * } catch (error) {
 *   if (isFlightCancelledError(error)) {
 *     // the work was thrown away by invalidateAsync() or clear()
 *   }
 *   throw error;
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";
import type { CacheKey } from "./normalize";

// =============================================================================
// Error Types
// =============================================================================

/**
 * Thrown by `createMemoCache` when an option is invalid.
 *
 * @example
 * ```typescript
 * const error = new CacheConfigError({
 *   option: 'maxSize',
 *   value: 0,
 *   reason: 'must be a positive integer',
 * });
 * console.log(error.message); // "CacheConfigError: Invalid maxSize (0) - must be a positive integer"
 * ```
 */
export class CacheConfigError extends TaggedError("CacheConfigError") {
  /** Name of the rejected option */
  readonly option: string;
  /** The value that was passed */
  readonly value: unknown;
  /** Why the value was rejected */
  readonly reason: string;

  constructor(props: { option: string; value: unknown; reason: string }) {
    super(
      `CacheConfigError: Invalid ${props.option} (${String(props.value)}) - ${props.reason}`
    );
    this.option = props.option;
    this.value = props.value;
    this.reason = props.reason;
  }
}

/**
 * Why an in-flight computation was abandoned.
 */
export type CancelReason = "invalidated" | "cleared";

/**
 * Delivered to every participant of a flight that was cancelled by
 * `invalidateAsync()` or `clear()` before it settled.
 *
 * @example
 * ```typescript
 * const error = new FlightCancelledError({ key: 'k', reason: 'cleared' });
 * console.log(error.message); // "FlightCancelledError: In-flight computation for k was cleared"
 * ```
 */
export class FlightCancelledError extends TaggedError("FlightCancelledError") {
  /** Key of the abandoned flight */
  readonly key: CacheKey;
  readonly reason: CancelReason;

  constructor(props: { key: CacheKey; reason: CancelReason }) {
    super(
      `FlightCancelledError: In-flight computation for ${props.key} was ${props.reason}`
    );
    this.key = props.key;
    this.reason = props.reason;
  }
}

/**
 * Union of the errors the engine raises on its own.
 */
export type MemoflightError = CacheConfigError | FlightCancelledError;

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a CacheConfigError.
 */
export function isCacheConfigError(error: unknown): error is CacheConfigError {
  return TaggedError.isTaggedError(error) && error._tag === "CacheConfigError";
}

/**
 * Check if an error is a FlightCancelledError.
 */
export function isFlightCancelledError(
  error: unknown
): error is FlightCancelledError {
  return (
    TaggedError.isTaggedError(error) && error._tag === "FlightCancelledError"
  );
}

/**
 * Check if an error was raised by the engine rather than by a computation.
 */
export function isMemoflightError(error: unknown): error is MemoflightError {
  return isCacheConfigError(error) || isFlightCancelledError(error);
}
