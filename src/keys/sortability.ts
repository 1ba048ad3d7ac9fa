/**
 * Static checks that a sort-key encoding collates in value order.
 *
 * The checks are advisory: they describe the problem and a fix, and never
 * fail compilation.
 */

import type { FieldRefSegment, PatternSpec } from "./pattern-parser.js";
import {
  UTC_MODIFIER,
  fieldRefs,
  hasModifier,
  hasZeroPadding,
  primaryFormat,
} from "./field-ref.js";
import {
  type FieldTypes,
  type SemanticType,
  isFloatType,
  isIntegerType,
  isTemporalType,
} from "./semantic-types.js";
import type { EpochUnit } from "./time-format.js";

/** The unsafe condition a diagnostic reports. */
export type SortabilityCondition =
  | "UnpaddedInteger"
  | "UnpaddedFloat"
  | "UnpaddedEpoch"
  | "VariableWidthTimestamp"
  | "ZonedFixedTimestamp";

export interface SortabilityDiagnostic {
  /** The entity (or other owner) whose sort key was checked. */
  readonly entity: string;
  /** The field path of the offending reference. */
  readonly field: string;
  readonly semanticType: SemanticType;
  readonly condition: SortabilityCondition;
  /** One line: why the encoding does not sort. */
  readonly cause: string;
  /** One line: what to write instead. */
  readonly fix: string;
}

const EPOCH_DIGITS: Readonly<
  Record<EpochUnit, { readonly before: number; readonly padding: string }>
> = {
  unix: { before: 9, padding: "%011d" },
  unixmilli: { before: 12, padding: "%014d" },
  unixnano: { before: 18, padding: "%020d" },
};

const diagnostic = (
  ref: FieldRefSegment,
  semanticType: SemanticType,
  entity: string,
  condition: SortabilityCondition,
  cause: string,
  fix: string,
): SortabilityDiagnostic =>
  Object.freeze({ entity, field: ref.path, semanticType, condition, cause, fix });

/**
 * Checks one field reference used in sort-key position.
 *
 * @param ref - A parsed field reference
 * @param semanticType - The field's semantic type
 * @param entity - A label for the owning entity, used in the rendered warning
 * @returns A diagnostic when the encoding does not sort in value order
 *
 * @example
 * ```ts
 * checkSortSafety(countRef, "int", "Order");
 * // => { condition: "UnpaddedInteger", field: "count", semanticType: "int", ... }
 * ```
 */
export const checkSortSafety = (
  ref: FieldRefSegment,
  semanticType: SemanticType,
  entity: string,
): SortabilityDiagnostic | undefined => {
  const padded = hasZeroPadding(ref.widthSpec);

  if (isIntegerType(semanticType) && !padded) {
    return diagnostic(
      ref,
      semanticType,
      entity,
      "UnpaddedInteger",
      `${semanticType} without padding: string comparison treats "9" > "10"`,
      "Use a number sort key, or add zero-padding: {field:%020d}",
    );
  }

  if (isFloatType(semanticType) && !padded) {
    const spec = ref.widthSpec ?? primaryFormat(ref) ?? "";
    return diagnostic(
      ref,
      semanticType,
      entity,
      "UnpaddedFloat",
      `${semanticType} format "${spec}" has no total width padding`,
      "Specify a total width: {field:%020.2f}",
    );
  }

  if (!isTemporalType(semanticType)) return undefined;

  const format = primaryFormat(ref);
  switch (format) {
    case "unix":
    case "unixmilli":
    case "unixnano": {
      if (padded) return undefined;
      const { before, padding } = EPOCH_DIGITS[format];
      return diagnostic(
        ref,
        semanticType,
        entity,
        "UnpaddedEpoch",
        `"${format}" timestamps change digit count at 2001-09-09 (${before} digits before, ${before + 1} after)`,
        `Add padding: {field:${format}:${padding}}`,
      );
    }
    case "rfc3339":
      return diagnostic(
        ref,
        semanticType,
        entity,
        "VariableWidthTimestamp",
        '"rfc3339" has variable-width offsets (Z vs +05:30) and sorts by local time',
        "Use unix, unixmilli or unixnano with padding, or {field:utc:rfc3339fixed}",
      );
    case "rfc3339nano":
      return diagnostic(
        ref,
        semanticType,
        entity,
        "VariableWidthTimestamp",
        '"rfc3339nano" strips trailing zeros, so its length varies',
        "Use unix, unixmilli or unixnano with padding, or {field:utc:rfc3339fixed}",
      );
    case "rfc3339fixed":
      if (hasModifier(ref, UTC_MODIFIER)) return undefined;
      return diagnostic(
        ref,
        semanticType,
        entity,
        "ZonedFixedTimestamp",
        '"rfc3339fixed" without :utc still orders differing offsets wrongly ("...+05:00" > "...Z")',
        "Normalize to UTC: {field:utc:rfc3339fixed}",
      );
    default:
      return undefined;
  }
};

/**
 * Checks every field reference of a sort-key pattern. References whose
 * field has no entry in `fieldTypes` are skipped.
 */
export const checkPatternSortSafety = (
  spec: PatternSpec,
  fieldTypes: FieldTypes,
  entity: string,
): readonly SortabilityDiagnostic[] => {
  const diagnostics: SortabilityDiagnostic[] = [];
  for (const ref of fieldRefs(spec)) {
    const semanticType = fieldTypes[ref.path];
    if (semanticType === undefined) continue;
    const found = checkSortSafety(ref, semanticType, entity);
    if (found !== undefined) diagnostics.push(found);
  }
  return Object.freeze(diagnostics);
};

/**
 * Renders a diagnostic as a two-line warning.
 *
 * @example
 * ```ts
 * formatDiagnostic(d);
 * // 'warning: Order sort key field "count" (int): int without padding: ...\n  fix: Use a number sort key, ...'
 * ```
 */
export const formatDiagnostic = (d: SortabilityDiagnostic): string =>
  `warning: ${d.entity} sort key field "${d.field}" (${d.semanticType}): ${d.cause}\n` +
  `  fix: ${d.fix}`;
