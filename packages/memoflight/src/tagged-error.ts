/**
 * memoflight/tagged-error
 *
 * Base classes for errors that carry a `_tag` discriminant, so callers can
 * narrow on `error._tag` instead of chains of `instanceof` checks.
 *
 * @example
 * ```typescript
 * class StaleRead extends TaggedError("StaleRead") {
 *   constructor(readonly key: string) {
 *     super(`StaleRead: ${key}`);
 *   }
 * }
 *
 * const error = new StaleRead("user:1");
 * error._tag; // "StaleRead"
 * TaggedError.isTaggedError(error); // true
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Shape shared by every tagged error instance.
 */
export interface TaggedErrorBase<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

/**
 * Options forwarded to the native `Error` constructor.
 */
export interface TaggedErrorOptions {
  cause?: unknown;
}

/**
 * Extract the tag literal from a tagged error type.
 */
export type TagOf<E> = E extends TaggedErrorBase<infer Tag> ? Tag : never;

/**
 * Pick the member of a tagged error union with the given tag.
 */
export type ErrorByTag<E, Tag extends string> = Extract<E, { _tag: Tag }>;

// =============================================================================
// Implementation
// =============================================================================

function createTaggedErrorClass<Tag extends string>(tag: Tag) {
  return class extends Error implements TaggedErrorBase<Tag> {
    readonly _tag: Tag = tag;

    constructor(message: string, options?: TaggedErrorOptions) {
      super(message, options);
      this.name = tag;
    }
  };
}

/**
 * Check whether a value is an `Error` carrying a string `_tag`.
 */
function isTaggedError(value: unknown): value is TaggedErrorBase {
  return (
    value instanceof Error && "_tag" in value && typeof value._tag === "string"
  );
}

/**
 * Create a base class for a tagged error.
 *
 * Subclasses declare their own fields and build the message themselves; the
 * base only fixes `_tag`, `name` and the optional `cause`.
 */
export const TaggedError = Object.assign(createTaggedErrorClass, {
  isTaggedError,
});
