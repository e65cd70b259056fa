/**
 * memoflight/store
 *
 * Bounded, recency-ordered key/value store with lazy TTL expiry.
 * A `Map` keeps insertion order, so deleting and re-inserting a key moves it
 * to the most-recently-used end and the first key is always the LRU one.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * A stored value and the monotonic time it was written.
 */
export interface StoreEntry<V> {
  value: V;
  timestamp: number;
}

/**
 * Result of a store lookup. `expired` tells a stale entry (now removed)
 * apart from a key that was never there.
 */
export type StoreLookup<V> =
  | { found: true; value: V }
  | { found: false; expired: boolean };

/**
 * An entry pushed out by a write that overflowed the store.
 */
export interface StoreEviction<K, V> {
  key: K;
  value: V;
}

export interface BoundedStoreOptions {
  /** Maximum number of entries; must be a positive integer */
  maxSize: number;
  /** Age in milliseconds at which an entry counts as absent */
  ttlMs?: number;
}

/**
 * Bounded store interface.
 */
export interface BoundedStore<K, V> {
  /** Look up a key, promoting it on a fresh hit */
  get(key: K, now: number): StoreLookup<V>;
  /** Insert or overwrite at the MRU end, evicting the LRU entry on overflow */
  put(key: K, value: V, now: number): StoreEviction<K, V> | undefined;
  /** Remove a key; reports whether it was present */
  remove(key: K): boolean;
  clear(): void;
  /** Keys from least to most recently used */
  keys(): K[];
  readonly size: number;
  readonly maxSize: number;
  readonly ttlMs: number | undefined;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a bounded LRU store.
 *
 * @example
 * ```typescript
 * const store = createBoundedStore<string, number>({ maxSize: 2 });
 *
 * store.put('a', 1, 0);
 * store.put('b', 2, 0);
 * store.get('a', 0);      // promotes 'a'
 * store.put('c', 3, 0);   // evicts 'b'
 * store.keys();           // ['a', 'c']
 * ```
 */
export function createBoundedStore<K, V>(
  options: BoundedStoreOptions
): BoundedStore<K, V> {
  const { maxSize, ttlMs } = options;
  const entries = new Map<K, StoreEntry<V>>();

  function isExpired(entry: StoreEntry<V>, now: number): boolean {
    return ttlMs !== undefined && now - entry.timestamp >= ttlMs;
  }

  return {
    get(key: K, now: number): StoreLookup<V> {
      const entry = entries.get(key);
      if (!entry) {
        return { found: false, expired: false };
      }

      entries.delete(key);
      if (isExpired(entry, now)) {
        return { found: false, expired: true };
      }

      entries.set(key, entry);
      return { found: true, value: entry.value };
    },

    put(key: K, value: V, now: number): StoreEviction<K, V> | undefined {
      entries.delete(key);
      entries.set(key, { value, timestamp: now });

      // One write overflows by at most one entry
      if (entries.size <= maxSize) return undefined;

      const oldest = entries.entries().next();
      if (oldest.done) return undefined;

      const [oldestKey, oldestEntry] = oldest.value;
      entries.delete(oldestKey);
      return { key: oldestKey, value: oldestEntry.value };
    },

    remove(key: K): boolean {
      return entries.delete(key);
    },

    clear(): void {
      entries.clear();
    },

    keys(): K[] {
      return Array.from(entries.keys());
    },

    get size(): number {
      return entries.size;
    },

    maxSize,
    ttlMs,
  };
}
