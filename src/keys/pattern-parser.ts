/**
 * Runtime parsing of key patterns.
 *
 * Parses pattern strings like `"ORDER#{tenant}#{createdAt:utc:unixnano:%020d}"`
 * into a list of literal segments and field references.
 */

import { type Result, ok, err } from "../types/common.js";
import { type KeyError, createKeyError } from "../types/errors.js";
import type { KeyAttributeType } from "../types/table.js";

/** A literal text segment in a parsed pattern. */
export interface LiteralSegment {
  readonly type: "literal";
  readonly value: string;
}

/**
 * A field reference segment (`{path:modifier:%spec}`) in a parsed pattern.
 *
 * `modifiers` keeps the order written in the pattern; the last entry is the
 * primary encoding format and earlier entries are pre-transforms (`utc`).
 */
export interface FieldRefSegment {
  readonly type: "field";
  readonly path: string;
  readonly modifiers: readonly string[];
  readonly widthSpec?: string | undefined;
}

export type PatternSegment = LiteralSegment | FieldRefSegment;

/** A fully parsed, immutable key pattern. */
export interface PatternSpec {
  readonly raw: string;
  readonly attributeKind: KeyAttributeType;
  readonly segments: readonly PatternSegment[];
}

const FIELD_REF_REGEX = /\{([^{}]*)\}/g;

const literal = (value: string): LiteralSegment =>
  Object.freeze({ type: "literal" as const, value });

const findStrayBrace = (text: string): number => {
  const open = text.indexOf("{");
  const close = text.indexOf("}");
  if (open === -1) return close;
  if (close === -1) return open;
  return Math.min(open, close);
};

/**
 * Splits the inside of a `{...}` reference into path, modifiers and width spec.
 *
 * Only the last colon-separated token may be a width spec; a `%` token in
 * any other position is kept as a modifier.
 */
const parseFieldRef = (
  ref: string,
  offset: number,
): Result<FieldRefSegment, KeyError> => {
  const tokens = ref.split(":");
  const path = tokens[0] ?? "";

  const components = path.split(".");
  const emptyAt = components.findIndex((c) => c === "");
  if (emptyAt !== -1) {
    return err(
      createKeyError(
        "parse",
        "InvalidFieldPath",
        `Invalid field path "${path}": empty component at position ${emptyAt}`,
        { offset, path },
      ),
    );
  }

  const rest = tokens.slice(1);
  const last = rest[rest.length - 1];
  if (last !== undefined && last.startsWith("%")) {
    return ok(
      Object.freeze({
        type: "field" as const,
        path,
        modifiers: Object.freeze(rest.slice(0, -1)),
        widthSpec: last,
      }),
    );
  }

  return ok(
    Object.freeze({
      type: "field" as const,
      path,
      modifiers: Object.freeze(rest),
    }),
  );
};

/**
 * Parses a key pattern into literal and field reference segments.
 *
 * There is no escape for literal braces: any `{` or `}` that is not part of a
 * well-formed reference fails with `UnbalancedBrace`.
 *
 * @param raw - A pattern (e.g. `"USER#{id}"`) or a constant (e.g. `"PROFILE"`)
 * @param attributeKind - The key attribute type the pattern produces
 * @returns A frozen {@link PatternSpec}, or the first error found
 *
 * @example
 * ```ts
 * parsePattern("USER#{id}")
 * // => { success: true, data: { raw: "USER#{id}", attributeKind: "S",
 * //      segments: [{ type: "literal", value: "USER#" },
 * //                 { type: "field", path: "id", modifiers: [] }] } }
 * ```
 */
export const parsePattern = (
  raw: string,
  attributeKind: KeyAttributeType = "S",
): Result<PatternSpec, KeyError> => {
  if (raw === "") {
    return err(
      createKeyError("parse", "EmptyPattern", "Pattern cannot be empty", {
        offset: 0,
      }),
    );
  }

  const segments: PatternSegment[] = [];
  let lastIndex = 0;

  for (const match of raw.matchAll(FIELD_REF_REGEX)) {
    const start = match.index ?? 0;
    const gap = raw.slice(lastIndex, start);
    const stray = findStrayBrace(gap);
    if (stray !== -1) {
      return err(unbalancedBrace(raw, lastIndex + stray));
    }
    if (gap !== "") segments.push(literal(gap));

    const ref = match[1] ?? "";
    if (ref === "") {
      return err(
        createKeyError(
          "parse",
          "EmptyFieldReference",
          `Empty field reference at position ${start}`,
          { offset: start },
        ),
      );
    }

    const parsed = parseFieldRef(ref, start);
    if (!parsed.success) return parsed;
    segments.push(parsed.data);

    lastIndex = start + match[0].length;
  }

  const tail = raw.slice(lastIndex);
  const stray = findStrayBrace(tail);
  if (stray !== -1) {
    return err(unbalancedBrace(raw, lastIndex + stray));
  }
  if (tail !== "") segments.push(literal(tail));

  return ok(
    Object.freeze({
      raw,
      attributeKind,
      segments: Object.freeze(segments),
    }),
  );
};

const unbalancedBrace = (raw: string, offset: number): KeyError =>
  createKeyError(
    "parse",
    "UnbalancedBrace",
    `Unbalanced "${raw.charAt(offset)}" at position ${offset}; literal braces are not supported in patterns`,
    { offset },
  );
