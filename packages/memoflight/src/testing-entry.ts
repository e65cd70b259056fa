/**
 * memoflight/testing
 *
 * Deterministic clock and deferred helpers for testing code that uses the
 * cache engine.
 *
 * @example
 * ```typescript
 * import { createTestClock, createDeferred } from 'memoflight/testing';
 * ```
 */

export {
  createTestClock,
  createDeferred,
  type Deferred,
} from "./testing";
