/**
 * memoflight/duration
 *
 * Millisecond durations with explicit units, so a `ttl` is never ambiguous.
 *
 * @example
 * ```typescript
 * import { Duration, toMillis } from 'memoflight';
 *
 * toMillis(Duration.minutes(5)); // 300000
 * Duration.parse('1h30m');       // { _tag: 'Duration', millis: 5400000 }
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * A length of time, stored in milliseconds.
 */
export interface Duration {
  readonly _tag: "Duration";
  readonly millis: number;
}

/**
 * Anything accepted where a duration is expected: a `Duration`, a number of
 * milliseconds, or a shorthand string such as `"500ms"`, `"30s"`, `"5m"`,
 * `"1h30m"` or `"2d"`.
 */
export type DurationInput = Duration | number | string;

// =============================================================================
// Constructors
// =============================================================================

const MS_PER_UNIT = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
} as const;

type DurationUnit = keyof typeof MS_PER_UNIT;

export function millis(ms: number): Duration {
  return { _tag: "Duration", millis: ms };
}

export function seconds(s: number): Duration {
  return millis(s * MS_PER_UNIT.s);
}

export function minutes(m: number): Duration {
  return millis(m * MS_PER_UNIT.m);
}

export function hours(h: number): Duration {
  return millis(h * MS_PER_UNIT.h);
}

export function days(d: number): Duration {
  return millis(d * MS_PER_UNIT.d);
}

// =============================================================================
// Conversion
// =============================================================================

export function toMillis(duration: Duration): number {
  return duration.millis;
}

export function isDuration(value: unknown): value is Duration {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    value._tag === "Duration" &&
    "millis" in value &&
    typeof value.millis === "number"
  );
}

function isUnit(value: string): value is DurationUnit {
  return Object.hasOwn(MS_PER_UNIT, value);
}

/**
 * Parse a shorthand duration string. Segments may be combined (`"1h30m"`)
 * and separated by whitespace. Returns `undefined` for anything else.
 */
export function parse(input: string): Duration | undefined {
  const text = input.trim().toLowerCase();
  if (text === "") return undefined;

  const segment = /(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)\s*/y;
  let total = 0;
  let offset = 0;

  while (offset < text.length) {
    segment.lastIndex = offset;
    const match = segment.exec(text);
    if (!match) return undefined;
    const [whole, amount, unit] = match;
    if (amount === undefined || unit === undefined || !isUnit(unit)) {
      return undefined;
    }
    total += Number(amount) * MS_PER_UNIT[unit];
    offset += whole.length;
  }

  return millis(total);
}

/**
 * Resolve any `DurationInput` to milliseconds, or `undefined` when a string
 * cannot be parsed.
 */
export function resolveMillis(input: DurationInput): number | undefined {
  if (typeof input === "number") return input;
  if (typeof input === "string") return parse(input)?.millis;
  return input.millis;
}

/**
 * Namespace-style access to the duration helpers.
 */
export const Duration = {
  millis,
  seconds,
  minutes,
  hours,
  days,
  toMillis,
  isDuration,
  parse,
} as const;
