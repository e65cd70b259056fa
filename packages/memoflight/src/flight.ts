/**
 * memoflight/flight
 *
 * A one-shot result cell shared by every caller waiting on the same
 * computation. The first `resolve` or `reject` wins; later calls are ignored
 * and report `false`.
 */

// =============================================================================
// Types
// =============================================================================

export type FlightState = "pending" | "fulfilled" | "rejected";

/**
 * Broadcastable one-shot cell.
 */
export interface Flight<T> {
  /** Settles once with the cell's single outcome */
  readonly promise: Promise<T>;
  readonly state: FlightState;
  /** Fulfil the cell. Returns false if it had already settled. */
  resolve(value: T): boolean;
  /** Reject the cell. Returns false if it had already settled. */
  reject(reason: unknown): boolean;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a pending flight.
 *
 * @example
 * ```typescript
 * const flight = createFlight<number>();
 *
 * const a = flight.promise;
 * const b = flight.promise;
 * flight.resolve(42);   // both a and b resolve to 42
 * flight.reject(err);   // false - already settled
 * ```
 */
export function createFlight<T>(): Flight<T> {
  let state: FlightState = "pending";
  let settle:
    | { resolve: (value: T) => void; reject: (reason: unknown) => void }
    | undefined;

  const promise = new Promise<T>((resolve, reject) => {
    settle = { resolve, reject };
  });

  return {
    promise,

    get state(): FlightState {
      return state;
    },

    resolve(value: T): boolean {
      if (state !== "pending") return false;
      state = "fulfilled";
      settle?.resolve(value);
      return true;
    },

    reject(reason: unknown): boolean {
      if (state !== "pending") return false;
      state = "rejected";
      settle?.reject(reason);
      return true;
    },
  };
}
