/**
 * memoflight/cache
 *
 * Memoizing cache engine with LRU eviction, lazy TTL expiry and
 * single-flight deduplication for asynchronous callers.
 *
 * @example
 * ```typescript
 * import { createMemoCache } from 'memoflight';
 *
 * const cache = createMemoCache<User>({ maxSize: 500, ttl: '5m' });
 *
 * // Blocking path: computes on miss, no deduplication
 * const user = cache.call(loadUserFromMemory, userId);
 *
 * // Async path: concurrent identical calls share one computation
 * const [a, b] = await Promise.all([
 *   cache.callAsync(fetchUser, userId),
 *   cache.callAsync(fetchUser, userId), // joins the first flight
 * ]);
 *
 * cache.info(); // { hits, misses, size, maxSize, ttl, inflight }
 * ```
 *
 * ## Concurrency
 *
 * Every bookkeeping step (store access, in-flight registry, counters) runs
 * synchronously and never spans an `await`, so the event loop serializes
 * both call paths over one store. User computations always run outside
 * those steps.
 */

import { resolveMillis, type DurationInput } from "./duration";
import {
  CacheConfigError,
  FlightCancelledError,
  type CancelReason,
} from "./errors";
import { createFlight, type Flight } from "./flight";
import { makeKey, type CacheKey } from "./normalize";
import { createBoundedStore, type StoreLookup } from "./store";

// =============================================================================
// Types
// =============================================================================

/**
 * Which executor produced an event.
 */
export type CallMode = "sync" | "async";

/**
 * Lifecycle events emitted through `onEvent`.
 */
export type MemoCacheEvent =
  | { type: "cache_hit"; key: CacheKey; mode: CallMode; ts: number }
  | { type: "cache_miss"; key: CacheKey; mode: CallMode; ts: number }
  | { type: "cache_expire"; key: CacheKey; ts: number }
  | { type: "cache_set"; key: CacheKey; size: number; ts: number }
  | { type: "cache_evict"; key: CacheKey; ts: number }
  | { type: "cache_invalidate"; key: CacheKey; removed: boolean; ts: number }
  | { type: "cache_clear"; entries: number; cancelled: number; ts: number }
  | { type: "flight_start"; key: CacheKey; ts: number }
  | { type: "flight_join"; key: CacheKey; waiters: number; ts: number }
  | {
      type: "flight_settle";
      key: CacheKey;
      /** `discarded` when the flight had been cancelled before it settled */
      outcome: "ok" | "error" | "discarded";
      durationMs: number;
      ts: number;
    }
  | {
      type: "flight_cancel";
      key: CacheKey;
      reason: CancelReason;
      waiters: number;
      ts: number;
    };

/**
 * Cache configuration.
 */
export interface MemoCacheConfig {
  /**
   * Maximum number of stored results.
   * @default 128
   */
  maxSize?: number;

  /**
   * Age at which a stored result is treated as absent.
   * Accepts milliseconds, a Duration, or shorthand like "30s" or "5m".
   */
  ttl?: DurationInput;

  /**
   * Monotonic time source in milliseconds.
   * @default performance.now
   */
  clock?: () => number;

  /**
   * Receives cache and flight lifecycle events.
   */
  onEvent?: (event: MemoCacheEvent) => void;
}

/**
 * Snapshot returned by `info()`.
 */
export interface MemoCacheInfo {
  hits: number;
  misses: number;
  size: number;
  maxSize: number;
  /** TTL in milliseconds, or undefined when entries never expire */
  ttl: number | undefined;
  /** Async computations currently in flight */
  inflight: number;
}

/**
 * A function routed through `call`.
 */
export interface MemoizedSync<Args extends unknown[], V> {
  (...args: Args): V;
  /** Drop the stored result for these arguments */
  invalidate(...args: Args): boolean;
}

/**
 * A function routed through `callAsync`.
 */
export interface MemoizedAsync<Args extends unknown[], V> {
  (...args: Args): Promise<V>;
  /** Drop the stored result for these arguments and cancel their flight */
  invalidate(...args: Args): Promise<boolean>;
}

/**
 * Memoizing cache engine.
 */
export interface MemoCache<V> {
  /**
   * Return the stored result for `args`, or compute it with `fn` and store
   * it. Concurrent callers are not deduplicated. Errors thrown by `fn`
   * propagate unchanged and nothing is stored.
   */
  call<Args extends unknown[]>(fn: (...args: Args) => V, ...args: Args): V;

  /**
   * Like `call`, but concurrent calls for the same arguments share one
   * computation and all observe its single outcome.
   */
  callAsync<Args extends unknown[]>(
    fn: (...args: Args) => V | PromiseLike<V>,
    ...args: Args
  ): Promise<V>;

  /** Wrap `fn` so every call goes through `call` */
  wrap<Args extends unknown[]>(fn: (...args: Args) => V): MemoizedSync<Args, V>;

  /** Wrap `fn` so every call goes through `callAsync` */
  wrapAsync<Args extends unknown[]>(
    fn: (...args: Args) => V | PromiseLike<V>
  ): MemoizedAsync<Args, V>;

  /** Remove the stored result for `args`; in-flight work is untouched */
  invalidate(...args: unknown[]): boolean;

  /**
   * Remove the stored result for `args` and cancel a live flight for them.
   * Resolves true if either existed.
   */
  invalidateAsync(...args: unknown[]): Promise<boolean>;

  /** Empty the store, reset counters and cancel every live flight */
  clear(): void;

  /** Read-only statistics snapshot */
  info(): MemoCacheInfo;
}

/**
 * Registry record for one async computation.
 */
interface InFlight<V> {
  cell: Flight<V>;
  startedAt: number;
  waiters: number;
}

// =============================================================================
// Helpers
// =============================================================================

const DEFAULT_MAX_SIZE = 128;

function validateMaxSize(maxSize: number): number {
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new CacheConfigError({
      option: "maxSize",
      value: maxSize,
      reason: "must be a positive integer",
    });
  }
  return maxSize;
}

function validateTtl(ttl: DurationInput | undefined): number | undefined {
  if (ttl === undefined) return undefined;

  const ms = resolveMillis(ttl);
  if (ms === undefined) {
    throw new CacheConfigError({
      option: "ttl",
      value: ttl,
      reason: 'expected milliseconds, a Duration, or a string like "30s"',
    });
  }
  if (!(ms > 0)) {
    throw new CacheConfigError({
      option: "ttl",
      value: ttl,
      reason: "must be a positive duration",
    });
  }
  return ms;
}

// =============================================================================
// createMemoCache()
// =============================================================================

/**
 * Create a memoizing cache engine.
 *
 * The engine keys results by arguments alone, so two functions routed
 * through the same engine share one key space. Give each function its own
 * engine unless that sharing is intended.
 *
 * @throws CacheConfigError when `maxSize` or `ttl` is invalid
 *
 * @example
 * ```typescript
 * const cache = createMemoCache<number>({ maxSize: 2 });
 * const square = (n: number) => n * n;
 *
 * cache.call(square, 1); // miss
 * cache.call(square, 1); // hit
 * cache.call(square, 2); // miss
 * cache.call(square, 3); // miss, evicts the entry for 1
 * cache.call(square, 1); // miss again
 * ```
 */
export function createMemoCache<V = unknown>(
  config: MemoCacheConfig = {}
): MemoCache<V> {
  const maxSize = validateMaxSize(config.maxSize ?? DEFAULT_MAX_SIZE);
  const ttlMs = validateTtl(config.ttl);
  const clock = config.clock ?? (() => performance.now());
  const onEvent = config.onEvent;

  const store = createBoundedStore<CacheKey, V>({ maxSize, ttlMs });
  const inflight = new Map<CacheKey, InFlight<V>>();
  let hits = 0;
  let misses = 0;

  const emit = (event: MemoCacheEvent): void => {
    if (!onEvent) return;
    try {
      onEvent(event);
    } catch (e) {
      console.error("memoflight: onEvent listener threw an error:", e);
    }
  };

  /**
   * Consult the store, counting a hit and reporting expiry.
   */
  function lookup(key: CacheKey, mode: CallMode): StoreLookup<V> {
    const result = store.get(key, clock());
    if (result.found) {
      hits++;
      emit({ type: "cache_hit", key, mode, ts: Date.now() });
    } else if (result.expired) {
      emit({ type: "cache_expire", key, ts: Date.now() });
    }
    return result;
  }

  function recordMiss(key: CacheKey, mode: CallMode): void {
    misses++;
    emit({ type: "cache_miss", key, mode, ts: Date.now() });
  }

  function write(key: CacheKey, value: V): void {
    const evicted = store.put(key, value, clock());
    emit({ type: "cache_set", key, size: store.size, ts: Date.now() });
    if (evicted) {
      emit({ type: "cache_evict", key: evicted.key, ts: Date.now() });
    }
  }

  /**
   * Deregister a live flight and reject it with a cancellation.
   */
  function cancelFlight(key: CacheKey, reason: CancelReason): boolean {
    const flight = inflight.get(key);
    if (!flight) return false;

    inflight.delete(key);
    emit({
      type: "flight_cancel",
      key,
      reason,
      waiters: flight.waiters,
      ts: Date.now(),
    });
    flight.cell.reject(new FlightCancelledError({ key, reason }));
    return true;
  }

  /**
   * Run the owner's computation and settle its flight. Never rejects: every
   * outcome is delivered through the flight cell. A flight that is no longer
   * registered was cancelled, so its late outcome is dropped.
   */
  async function runFlight(
    key: CacheKey,
    flight: InFlight<V>,
    compute: () => V | PromiseLike<V>
  ): Promise<void> {
    let value: V;
    try {
      value = await compute();
    } catch (error) {
      const current = inflight.get(key) === flight;
      emit({
        type: "flight_settle",
        key,
        outcome: current ? "error" : "discarded",
        durationMs: clock() - flight.startedAt,
        ts: Date.now(),
      });
      if (current) {
        inflight.delete(key);
        flight.cell.reject(error);
      }
      return;
    }

    const current = inflight.get(key) === flight;
    if (current) {
      write(key, value);
      inflight.delete(key);
    }
    emit({
      type: "flight_settle",
      key,
      outcome: current ? "ok" : "discarded",
      durationMs: clock() - flight.startedAt,
      ts: Date.now(),
    });
    if (current) {
      flight.cell.resolve(value);
    }
  }

  function call<Args extends unknown[]>(
    fn: (...args: Args) => V,
    ...args: Args
  ): V {
    const key = makeKey(args);
    const hit = lookup(key, "sync");
    if (hit.found) return hit.value;

    recordMiss(key, "sync");
    const value = fn(...args);
    write(key, value);
    return value;
  }

  async function callAsync<Args extends unknown[]>(
    fn: (...args: Args) => V | PromiseLike<V>,
    ...args: Args
  ): Promise<V> {
    const key = makeKey(args);
    const hit = lookup(key, "async");
    if (hit.found) return hit.value;

    const existing = inflight.get(key);
    if (existing) {
      existing.waiters++;
      emit({
        type: "flight_join",
        key,
        waiters: existing.waiters,
        ts: Date.now(),
      });
      return existing.cell.promise;
    }

    recordMiss(key, "async");
    const flight: InFlight<V> = {
      cell: createFlight<V>(),
      startedAt: clock(),
      waiters: 0,
    };
    inflight.set(key, flight);
    emit({ type: "flight_start", key, ts: Date.now() });

    // The owner observes the flight's outcome like any waiter, including
    // a cancellation that lands while its computation is still running.
    const [, value] = await Promise.all([
      runFlight(key, flight, () => fn(...args)),
      flight.cell.promise,
    ]);
    return value;
  }

  function invalidate(...args: unknown[]): boolean {
    const key = makeKey(args);
    const removed = store.remove(key);
    emit({ type: "cache_invalidate", key, removed, ts: Date.now() });
    return removed;
  }

  async function invalidateAsync(...args: unknown[]): Promise<boolean> {
    const key = makeKey(args);
    const removed = store.remove(key);
    const cancelled = cancelFlight(key, "invalidated");
    emit({ type: "cache_invalidate", key, removed, ts: Date.now() });
    return removed || cancelled;
  }

  return {
    call,
    callAsync,

    wrap<Args extends unknown[]>(
      fn: (...args: Args) => V
    ): MemoizedSync<Args, V> {
      const memoized = (...args: Args): V => call(fn, ...args);
      memoized.invalidate = (...args: Args): boolean => invalidate(...args);
      return memoized;
    },

    wrapAsync<Args extends unknown[]>(
      fn: (...args: Args) => V | PromiseLike<V>
    ): MemoizedAsync<Args, V> {
      const memoized = (...args: Args): Promise<V> => callAsync(fn, ...args);
      memoized.invalidate = (...args: Args): Promise<boolean> =>
        invalidateAsync(...args);
      return memoized;
    },

    invalidate,
    invalidateAsync,

    clear(): void {
      const entries = store.size;
      store.clear();
      hits = 0;
      misses = 0;

      let cancelled = 0;
      for (const key of Array.from(inflight.keys())) {
        if (cancelFlight(key, "cleared")) cancelled++;
      }
      emit({ type: "cache_clear", entries, cancelled, ts: Date.now() });
    },

    info(): MemoCacheInfo {
      return {
        hits,
        misses,
        size: store.size,
        maxSize,
        ttl: ttlMs,
        inflight: inflight.size,
      };
    },
  };
}
