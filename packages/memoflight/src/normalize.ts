/**
 * memoflight/normalize
 *
 * Reduce call arguments to a canonical key. Structurally equal arguments map
 * to equal keys, whatever the insertion order of mappings or sets.
 *
 * Recognized shapes:
 *
 * | Input | Normalized as |
 * |---|---|
 * | string, number, bigint, boolean, null, undefined | tagged scalar |
 * | `Date` | epoch milliseconds |
 * | `ArrayBuffer` and its views (`Uint8Array`, `Buffer`, ...) | hex bytes |
 * | array | ordered sequence |
 * | `Set` | sorted sequence |
 * | `Map`, plain object | mapping sorted by normalized key |
 * | class instance with own enumerable fields | record of its fields |
 * | anything else | textual representation |
 *
 * The textual fallback loses precision: two distinct values with the same
 * `String()` form produce the same key.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Canonical, JSON-serializable form of a value.
 */
export type KeyPart = string | number | boolean | null | readonly KeyPart[];

/**
 * Identity of a call inside one cache engine.
 */
export type CacheKey = string;

// =============================================================================
// Helpers
// =============================================================================

const CIRCULAR: KeyPart = ["circular"];

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Impose a total order on normalized parts by their serialized form.
 */
function sortParts(parts: KeyPart[]): KeyPart[] {
  return parts
    .map((part) => ({ part, text: JSON.stringify(part) }))
    .sort((a, b) => compareText(a.text, b.text))
    .map(({ part }) => part);
}

function toHex(bytes: Uint8Array): string {
  let hex = "";
  for (const byte of bytes) {
    hex += byte.toString(16).padStart(2, "0");
  }
  return hex;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Name of the constructor an instance claims. The prototype chain may carry no
 * `constructor`, or one that was overwritten with something else.
 */
function constructorName(value: object): string {
  const ctor: unknown = value.constructor;
  return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "Object";
}

function describeObject(value: object): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

// =============================================================================
// Implementation
// =============================================================================

function normalizeFields(
  value: object,
  ancestors: Set<object>
): KeyPart[] {
  return sortParts(
    Object.entries(value).map(([field, fieldValue]): KeyPart => [
      ["str", field],
      normalizeValue(fieldValue, ancestors),
    ])
  );
}

function normalizeObject(value: object, ancestors: Set<object>): KeyPart {
  if (value instanceof Date) {
    return ["date", String(value.getTime())];
  }

  if (value instanceof ArrayBuffer) {
    return ["bytes", toHex(new Uint8Array(value))];
  }

  if (ArrayBuffer.isView(value)) {
    return [
      "bytes",
      toHex(new Uint8Array(value.buffer, value.byteOffset, value.byteLength)),
    ];
  }

  if (Array.isArray(value)) {
    return ["seq", value.map((item: unknown) => normalizeValue(item, ancestors))];
  }

  if (value instanceof Set) {
    return [
      "set",
      sortParts(
        Array.from(value, (item: unknown) => normalizeValue(item, ancestors))
      ),
    ];
  }

  if (value instanceof Map) {
    return [
      "map",
      sortParts(
        Array.from(value, ([entryKey, entryValue]: [unknown, unknown]): KeyPart => [
          normalizeValue(entryKey, ancestors),
          normalizeValue(entryValue, ancestors),
        ])
      ),
    ];
  }

  if (isPlainObject(value)) {
    return ["map", normalizeFields(value, ancestors)];
  }

  const fields = normalizeFields(value, ancestors);
  if (fields.length > 0) {
    return ["record", constructorName(value), fields];
  }

  return ["repr", describeObject(value)];
}

function normalizeValue(value: unknown, ancestors: Set<object>): KeyPart {
  switch (typeof value) {
    case "string":
      return ["str", value];
    case "number":
      // String(-0) is "0", and NaN / Infinity survive JSON this way
      return ["num", String(value)];
    case "bigint":
      return ["big", value.toString()];
    case "boolean":
      return ["bool", value];
    case "undefined":
      return ["undef"];
    case "symbol":
      return ["repr", value.toString()];
    case "function":
      return ["repr", `[Function ${value.name || "anonymous"}]`];
  }

  if (value === null) return ["null"];

  if (ancestors.has(value)) return CIRCULAR;
  ancestors.add(value);
  try {
    return normalizeObject(value, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Normalize a single value to its canonical form.
 *
 * @example
 * ```typescript
 * normalize({ a: 1, b: 2 }); // same as normalize({ b: 2, a: 1 })
 * normalize(new Set([3, 1])); // same as normalize(new Set([1, 3]))
 * normalize([1, 2]);          // differs from normalize([2, 1])
 * ```
 */
export function normalize(value: unknown): KeyPart {
  return normalizeValue(value, new Set());
}

/**
 * Derive the cache key for a call.
 *
 * Positional arguments keep their order. Named arguments, when a call site
 * has them, form a mapping, so their binding order never changes the key.
 */
export function makeKey(
  args: readonly unknown[],
  named: Readonly<Record<string, unknown>> = {}
): CacheKey {
  return JSON.stringify([normalize(args), normalize(named)]);
}
