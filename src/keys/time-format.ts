/**
 * Date-time values and their key encodings: epoch counters, RFC 3339
 * variants and custom token layouts.
 */

import { type Result, ok, err } from "../types/common.js";
import { type KeyError, createKeyError } from "../types/errors.js";

/**
 * An instant with nanosecond precision and the UTC offset it is displayed in.
 * `Date` values are accepted wherever a Timestamp is, with offset 0.
 */
export interface Timestamp {
  readonly epochNanoseconds: bigint;
  readonly offsetMinutes: number;
}

/** A value the temporal encodings accept. */
export type TemporalValue = Date | Timestamp;

/** Epoch counter resolutions. */
export type EpochUnit = "unix" | "unixmilli" | "unixnano";

/** Named RFC 3339 layouts. */
export type NamedLayout = "rfc3339" | "rfc3339fixed" | "rfc3339nano";

export const EPOCH_UNITS: readonly EpochUnit[] = ["unix", "unixmilli", "unixnano"];

export const NAMED_LAYOUTS: readonly NamedLayout[] = [
  "rfc3339",
  "rfc3339fixed",
  "rfc3339nano",
];

const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;

const floorDiv = (a: bigint, b: bigint): bigint => {
  const q = a / b;
  return a % b !== 0n && a < 0n ? q - 1n : q;
};

const floorMod = (a: bigint, b: bigint): bigint => ((a % b) + b) % b;

/**
 * Creates a Timestamp.
 *
 * @example
 * ```ts
 * createTimestamp(1_700_000_000_123_456_789n, 120); // 2023-11-15T00:13:20.123456789+02:00
 * ```
 */
export const createTimestamp = (
  epochNanoseconds: bigint,
  offsetMinutes = 0,
): Timestamp => Object.freeze({ epochNanoseconds, offsetMinutes });

/** Converts a Date (millisecond precision) to a Timestamp. */
export const timestampFromDate = (date: Date, offsetMinutes = 0): Timestamp =>
  createTimestamp(BigInt(date.getTime()) * NANOS_PER_MILLI, offsetMinutes);

const isTimestamp = (value: unknown): value is Timestamp =>
  typeof value === "object" &&
  value !== null &&
  "epochNanoseconds" in value &&
  typeof value.epochNanoseconds === "bigint" &&
  "offsetMinutes" in value &&
  typeof value.offsetMinutes === "number";

const invalidOffset = (value: Timestamp): KeyError =>
  createKeyError(
    "conversion",
    "InvalidFieldValue",
    `Timestamp offset must be a whole number of minutes, got ${value.offsetMinutes}`,
  );

/**
 * Normalizes a temporal runtime value, or returns an `InvalidFieldValue`
 * error when the value is neither a valid Date nor a Timestamp.
 */
export const toTimestamp = (value: unknown): Result<Timestamp, KeyError> => {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return err(
        createKeyError("conversion", "InvalidFieldValue", "Invalid Date value"),
      );
    }
    return ok(timestampFromDate(value));
  }
  if (isTimestamp(value)) {
    return Number.isInteger(value.offsetMinutes) ? ok(value) : err(invalidOffset(value));
  }
  return err(
    createKeyError(
      "conversion",
      "InvalidFieldValue",
      `Expected a Date or Timestamp, got ${typeof value}`,
    ),
  );
};

/** Re-expresses a timestamp in UTC; the instant is unchanged. */
export const toUtc = (value: Timestamp): Timestamp =>
  createTimestamp(value.epochNanoseconds, 0);

/** Returns the epoch counter for a unit, flooring toward negative infinity. */
export const epochValue = (value: Timestamp, unit: EpochUnit): bigint => {
  switch (unit) {
    case "unix":
      return floorDiv(value.epochNanoseconds, NANOS_PER_SECOND);
    case "unixmilli":
      return floorDiv(value.epochNanoseconds, NANOS_PER_MILLI);
    case "unixnano":
      return value.epochNanoseconds;
  }
};

interface CalendarFields {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly nanosecond: bigint;
  readonly offsetMinutes: number;
}

const calendarFields = (value: Timestamp): Result<CalendarFields, KeyError> => {
  if (!Number.isInteger(value.offsetMinutes)) return err(invalidOffset(value));
  const localMillis =
    floorDiv(value.epochNanoseconds, NANOS_PER_MILLI) +
    BigInt(value.offsetMinutes) * 60_000n;
  const date = new Date(Number(localMillis));
  if (Number.isNaN(date.getTime())) {
    return err(
      createKeyError(
        "conversion",
        "InvalidFieldValue",
        `Timestamp ${value.epochNanoseconds}ns is outside the supported calendar range`,
      ),
    );
  }
  return ok({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    nanosecond: floorMod(value.epochNanoseconds, NANOS_PER_SECOND),
    offsetMinutes: value.offsetMinutes,
  });
};

const two = (n: number): string => String(n).padStart(2, "0");

const formatYear = (year: number, width: number): string =>
  year < 0
    ? `-${String(-year).padStart(width, "0")}`
    : String(year).padStart(width, "0");

const formatOffset = (offsetMinutes: number): string => {
  if (offsetMinutes === 0) return "Z";
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  return `${sign}${two(Math.floor(abs / 60))}:${two(abs % 60)}`;
};

const fraction = (nanosecond: bigint): string =>
  nanosecond.toString().padStart(9, "0");

const formatRfc3339 = (fields: CalendarFields, layout: NamedLayout): string => {
  const base =
    `${formatYear(fields.year, 4)}-${two(fields.month)}-${two(fields.day)}` +
    `T${two(fields.hour)}:${two(fields.minute)}:${two(fields.second)}`;

  let frac = "";
  if (layout === "rfc3339fixed") {
    frac = `.${fraction(fields.nanosecond)}`;
  } else if (layout === "rfc3339nano" && fields.nanosecond !== 0n) {
    frac = `.${fraction(fields.nanosecond).replace(/0+$/, "")}`;
  }

  return base + frac + formatOffset(fields.offsetMinutes);
};

const TOKEN_LETTERS: ReadonlySet<string> = new Set(["y", "M", "d", "H", "m", "s", "S", "X"]);

const formatToken = (
  letter: string,
  count: number,
  fields: CalendarFields,
): string => {
  const numeric = (n: number): string => (count >= 2 ? two(n) : String(n));
  switch (letter) {
    case "y":
      if (count === 2) return two(((fields.year % 100) + 100) % 100);
      return formatYear(fields.year, count);
    case "M":
      return numeric(fields.month);
    case "d":
      return numeric(fields.day);
    case "H":
      return numeric(fields.hour);
    case "m":
      return numeric(fields.minute);
    case "s":
      return numeric(fields.second);
    case "S":
      return fraction(fields.nanosecond).slice(0, Math.min(count, 9));
    default:
      return formatOffset(fields.offsetMinutes);
  }
};

/**
 * Formats calendar fields with a token layout.
 *
 * Tokens: `yyyy` year, `yy` two-digit year, `MM` month, `dd` day, `HH` hour,
 * `mm` minute, `ss` second, `S` to `SSSSSSSSS` fractional second digits,
 * `X` offset (`Z` or `±HH:MM`). Single letters print without zero padding.
 * Text between single quotes is literal (`''` is a quote); any other
 * character is copied.
 */
const formatCustom = (fields: CalendarFields, layout: string): string => {
  let out = "";
  let i = 0;
  while (i < layout.length) {
    const ch = layout.charAt(i);

    if (ch === "'") {
      const close = layout.indexOf("'", i + 1);
      if (close === i + 1) {
        out += "'";
        i += 2;
        continue;
      }
      const end = close === -1 ? layout.length : close;
      out += layout.slice(i + 1, end);
      i = end + 1;
      continue;
    }

    if (TOKEN_LETTERS.has(ch)) {
      let count = 1;
      while (layout.charAt(i + count) === ch) count++;
      out += formatToken(ch, count, fields);
      i += count;
      continue;
    }

    out += ch;
    i++;
  }
  return out;
};

const isNamedLayout = (layout: string): layout is NamedLayout =>
  NAMED_LAYOUTS.some((named) => named === layout);

/**
 * Formats a timestamp with a named RFC 3339 layout or a custom token layout.
 *
 * @example
 * ```ts
 * const t = createTimestamp(1_700_000_000_120_000_000n);
 * formatTimestamp(t, "rfc3339");      // "2023-11-14T22:13:20Z"
 * formatTimestamp(t, "rfc3339nano");  // "2023-11-14T22:13:20.12Z"
 * formatTimestamp(t, "rfc3339fixed"); // "2023-11-14T22:13:20.120000000Z"
 * formatTimestamp(t, "yyyyMMdd");     // "20231114"
 * ```
 */
export const formatTimestamp = (
  value: Timestamp,
  layout: string,
): Result<string, KeyError> => {
  const fields = calendarFields(value);
  if (!fields.success) return fields;
  return ok(
    isNamedLayout(layout)
      ? formatRfc3339(fields.data, layout)
      : formatCustom(fields.data, layout),
  );
};
