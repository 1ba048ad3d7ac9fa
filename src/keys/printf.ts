/**
 * Single-directive printf formatting for width specs such as `%020d` or
 * `%012.2f`.
 *
 * A width spec holds exactly one directive, optionally surrounded by
 * literal text (`%%` is a literal percent sign).
 */

import { type Result, ok, err } from "../types/common.js";
import { type KeyError, createKeyError } from "../types/errors.js";

/** Conversion verbs accepted in a width spec. */
export type PrintfVerb = "d" | "s" | "f" | "F" | "e" | "E" | "x" | "X" | "o" | "v";

/** A parsed printf directive. */
export interface PrintfDirective {
  readonly prefix: string;
  readonly suffix: string;
  readonly leftAlign: boolean;
  readonly plus: boolean;
  readonly space: boolean;
  readonly zero: boolean;
  readonly width: number | undefined;
  readonly precision: number | undefined;
  readonly verb: PrintfVerb;
}

const DIRECTIVE_REGEX = /%(%|([-+ 0#]*)(\d+)?(?:\.(\d*))?([a-zA-Z]?))/g;

const VERBS: ReadonlySet<string> = new Set<PrintfVerb>([
  "d", "s", "f", "F", "e", "E", "x", "X", "o", "v",
]);

const invalidSpec = (spec: string, reason: string): KeyError =>
  createKeyError(
    "conversion",
    "InvalidWidthSpec",
    `Invalid width spec "${spec}": ${reason}`,
  );

const isVerb = (value: string): value is PrintfVerb => VERBS.has(value);

/**
 * Parses a width spec into its single directive.
 *
 * @example
 * ```ts
 * parsePrintfSpec("%020d");
 * // => { success: true, data: { zero: true, width: 20, verb: "d", ... } }
 * ```
 */
export const parsePrintfSpec = (
  spec: string,
): Result<PrintfDirective, KeyError> => {
  let directive: PrintfDirective | undefined;
  let text = "";

  let lastIndex = 0;
  for (const match of spec.matchAll(DIRECTIVE_REGEX)) {
    const start = match.index ?? 0;
    text += spec.slice(lastIndex, start);
    lastIndex = start + match[0].length;

    if (match[1] === "%") {
      text += "%";
      continue;
    }

    const verb = match[5] ?? "";
    if (!isVerb(verb)) {
      return err(
        invalidSpec(
          spec,
          verb === "" ? "missing verb" : `unsupported verb "%${verb}"`,
        ),
      );
    }
    if (directive !== undefined) {
      return err(invalidSpec(spec, "only one directive is allowed"));
    }

    const flags = match[2] ?? "";
    if (flags.includes("#")) {
      return err(invalidSpec(spec, 'the "#" flag is not supported'));
    }
    const precision = match[4];
    directive = {
      prefix: text,
      suffix: "",
      leftAlign: flags.includes("-"),
      plus: flags.includes("+"),
      space: flags.includes(" "),
      zero: flags.includes("0"),
      width: match[3] !== undefined ? Number(match[3]) : undefined,
      precision:
        precision === undefined ? undefined : Number(precision === "" ? "0" : precision),
      verb,
    };
    text = "";
  }

  if (directive === undefined) {
    return err(invalidSpec(spec, "no directive found"));
  }

  return ok(
    Object.freeze({ ...directive, suffix: text + spec.slice(lastIndex) }),
  );
};

const isNumericVerb = (verb: PrintfVerb): boolean => verb !== "s" && verb !== "v";

const toInteger = (value: unknown): bigint | undefined => {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  return undefined;
};

const toFloat = (value: unknown): number | undefined => {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "bigint") return Number(value);
  return undefined;
};

/**
 * Formats a non-negative number in fixed notation. `toFixed` switches to
 * exponent notation from 1e21, where every float is an integer.
 */
const toFixedDigits = (magnitude: number, precision: number): string =>
  magnitude < 1e21
    ? magnitude.toFixed(precision)
    : BigInt(magnitude).toString() + (precision > 0 ? "." + "0".repeat(precision) : "");

/** Formats a number in C exponent style: at least two exponent digits. */
const toExponent = (value: number, precision: number): string => {
  const [mantissa, exponent = "+0"] = value.toExponential(precision).split("e");
  const sign = exponent.startsWith("-") ? "-" : "+";
  const digits = exponent.replace(/^[+-]/, "").padStart(2, "0");
  return `${mantissa}e${sign}${digits}`;
};

/** Returns the unsigned body of a numeric value and whether it is negative. */
const formatNumericBody = (
  directive: PrintfDirective,
  value: unknown,
): { readonly negative: boolean; readonly body: string } | undefined => {
  switch (directive.verb) {
    case "d":
    case "x":
    case "X":
    case "o": {
      const integer = toInteger(value);
      if (integer === undefined) return undefined;
      const negative = integer < 0n;
      const magnitude = negative ? -integer : integer;
      const radix = directive.verb === "d" ? 10 : directive.verb === "o" ? 8 : 16;
      let body = magnitude.toString(radix);
      if (directive.verb === "X") body = body.toUpperCase();
      if (directive.precision !== undefined) {
        body = body.padStart(directive.precision, "0");
      }
      return { negative, body };
    }
    case "f":
    case "F":
    case "e":
    case "E": {
      const float = toFloat(value);
      if (float === undefined) return undefined;
      const negative = float < 0 || Object.is(float, -0);
      const magnitude = Math.abs(float);
      const precision = directive.precision ?? 6;
      let body =
        directive.verb === "f" || directive.verb === "F"
          ? toFixedDigits(magnitude, precision)
          : toExponent(magnitude, precision);
      if (directive.verb === "E") body = body.toUpperCase();
      return { negative, body };
    }
    default:
      return undefined;
  }
};

const formatText = (directive: PrintfDirective, value: unknown): string => {
  const text =
    value instanceof Date ? value.toISOString() : String(value);
  return directive.precision !== undefined
    ? text.slice(0, directive.precision)
    : text;
};

const pad = (
  directive: PrintfDirective,
  sign: string,
  body: string,
  zeroAllowed: boolean,
): string => {
  const width = directive.width ?? 0;
  const length = sign.length + body.length;
  if (length >= width) return sign + body;
  const fill = width - length;
  if (directive.leftAlign) return sign + body + " ".repeat(fill);
  if (directive.zero && zeroAllowed) return sign + "0".repeat(fill) + body;
  return " ".repeat(fill) + sign + body;
};

/**
 * Applies a parsed directive to a single value.
 *
 * Integer verbs take safe integers or bigints; float verbs take finite
 * numbers or bigints; `%s` and `%v` take anything.
 */
export const formatPrintf = (
  directive: PrintfDirective,
  value: unknown,
): Result<string, KeyError> => {
  if (!isNumericVerb(directive.verb)) {
    const text = formatText(directive, value);
    return ok(directive.prefix + pad(directive, "", text, true) + directive.suffix);
  }

  const numeric = formatNumericBody(directive, value);
  if (numeric === undefined) {
    return err(
      createKeyError(
        "conversion",
        "InvalidFieldValue",
        `Cannot format ${typeof value} value with "%${directive.verb}"`,
      ),
    );
  }

  const sign = numeric.negative
    ? "-"
    : directive.plus
      ? "+"
      : directive.space
        ? " "
        : "";
  // An explicit integer precision disables zero padding.
  const zeroAllowed = !(
    directive.precision !== undefined &&
    (directive.verb === "d" || directive.verb === "x" || directive.verb === "X" || directive.verb === "o")
  );

  return ok(
    directive.prefix + pad(directive, sign, numeric.body, zeroAllowed) + directive.suffix,
  );
};

/** Parses and applies a width spec in one step. */
export const sprintf = (spec: string, value: unknown): Result<string, KeyError> => {
  const parsed = parsePrintfSpec(spec);
  if (!parsed.success) return parsed;
  return formatPrintf(parsed.data, value);
};
