/**
 * memoflight
 *
 * Memoizing cache engine: LRU eviction, lazy TTL expiry, and single-flight
 * deduplication of concurrent asynchronous calls.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createMemoCache } from 'memoflight';
 *
 * const cache = createMemoCache<Report>({ maxSize: 100, ttl: '10m' });
 * const getReport = cache.wrapAsync((id: string) => buildReport(id));
 *
 * await Promise.all([getReport('q3'), getReport('q3')]); // one build
 * ```
 *
 * ## Entry Points
 *
 * - `memoflight` - Cache engine, key normalization, errors, durations
 * - `memoflight/testing` - Test clock and deferred helpers
 */

// =============================================================================
// Cache engine
// =============================================================================

export {
  type CallMode,
  type MemoCacheEvent,
  type MemoCacheConfig,
  type MemoCacheInfo,
  type MemoizedSync,
  type MemoizedAsync,
  type MemoCache,
  createMemoCache,
} from "./cache";

// =============================================================================
// Building blocks
// =============================================================================

export { type KeyPart, type CacheKey, normalize, makeKey } from "./normalize";

export {
  type StoreEntry,
  type StoreLookup,
  type StoreEviction,
  type BoundedStoreOptions,
  type BoundedStore,
  createBoundedStore,
} from "./store";

export { type FlightState, type Flight, createFlight } from "./flight";

// =============================================================================
// Errors
// =============================================================================

export {
  type TaggedErrorBase,
  type TaggedErrorOptions,
  type TagOf,
  type ErrorByTag,
  TaggedError,
} from "./tagged-error";

export {
  type CancelReason,
  type MemoflightError,
  CacheConfigError,
  FlightCancelledError,
  isCacheConfigError,
  isFlightCancelledError,
  isMemoflightError,
} from "./errors";

// =============================================================================
// Durations
// =============================================================================

export {
  type DurationInput,
  Duration,
  millis,
  seconds,
  minutes,
  hours,
  days,
  toMillis,
  isDuration,
  parse as parseDuration,
  resolveMillis,
} from "./duration";
