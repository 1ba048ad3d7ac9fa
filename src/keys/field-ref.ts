/**
 * Derived queries over parsed patterns and their field references.
 */

import type { FieldRefSegment, PatternSpec } from "./pattern-parser.js";

/** The pre-transform modifier that normalizes a date-time to UTC. */
export const UTC_MODIFIER = "utc";

/**
 * Returns the path of a field reference split on dots.
 * For `"user.id"`, returns `["user", "id"]`.
 */
export const fieldPath = (ref: FieldRefSegment): readonly string[] =>
  ref.path.split(".");

/**
 * Returns a parameter name for a field reference: the last path component.
 * For `"user.id"`, returns `"id"`.
 */
export const parameterName = (ref: FieldRefSegment): string => {
  const path = fieldPath(ref);
  return path[path.length - 1] ?? ref.path;
};

/** Returns the primary encoding format (last modifier), if any. */
export const primaryFormat = (ref: FieldRefSegment): string | undefined =>
  ref.modifiers[ref.modifiers.length - 1];

/** Returns true if the reference's modifier chain contains `modifier`. */
export const hasModifier = (ref: FieldRefSegment, modifier: string): boolean =>
  ref.modifiers.includes(modifier);

/**
 * Returns true if a printf width spec zero-pads (e.g. `%020d`).
 * A bare `%0` does not count.
 */
export const hasZeroPadding = (widthSpec: string | undefined): boolean =>
  widthSpec !== undefined && widthSpec.startsWith("%0") && widthSpec.length > 2;

/** Returns true if the pattern has no field references. */
export const isConstant = (spec: PatternSpec): boolean =>
  spec.segments.length === 1 && spec.segments[0]?.type === "literal";

/**
 * Returns the literal text before the first field reference.
 * For `"ORDER#{id}"`, returns `"ORDER#"`; for `"{id}"`, returns `""`.
 * A constant pattern returns the whole constant.
 */
export const leadingLiteralPrefix = (spec: PatternSpec): string => {
  const first = spec.segments[0];
  return first?.type === "literal" ? first.value : "";
};

/** Returns all field references in pattern order. */
export const fieldRefs = (spec: PatternSpec): readonly FieldRefSegment[] =>
  spec.segments.filter(
    (segment): segment is FieldRefSegment => segment.type === "field",
  );

/**
 * Returns all field paths in pattern order.
 * For `"ORDER#{tenant}#{id}"`, returns `["tenant", "id"]`.
 */
export const fieldPaths = (spec: PatternSpec): readonly string[] =>
  fieldRefs(spec).map((ref) => ref.path);
