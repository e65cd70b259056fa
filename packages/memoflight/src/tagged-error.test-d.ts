/**
 * Type tests for tagged-error.ts
 * Checked by `tsc --noEmit` alongside the sources.
 */
import { expectType } from "tsd";
import type { TagOf, ErrorByTag } from "./tagged-error";
import type {
  CancelReason,
  CacheConfigError,
  FlightCancelledError,
  MemoflightError,
} from "./errors";

// =============================================================================
// TagOf
// =============================================================================

declare const tag: TagOf<MemoflightError>;
expectType<"CacheConfigError" | "FlightCancelledError">(tag);

declare const cancelledTag: TagOf<FlightCancelledError>;
expectType<"FlightCancelledError">(cancelledTag);

// =============================================================================
// ErrorByTag
// =============================================================================

declare const cancelled: ErrorByTag<MemoflightError, "FlightCancelledError">;
expectType<FlightCancelledError>(cancelled);
expectType<CancelReason>(cancelled.reason);

declare const config: ErrorByTag<MemoflightError, "CacheConfigError">;
expectType<CacheConfigError>(config);
expectType<string>(config.option);
