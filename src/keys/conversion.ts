/**
 * Type-aware conversion of field references into key encodings.
 *
 * The result is an expression tree describing how to turn a field's value
 * into its key text. The same tree serves callers that hold a named input
 * (a `param` source) and callers that hold a whole record (a `field` source);
 * only the leaf differs.
 */

import { type Result, ok, err } from "../types/common.js";
import { type KeyError, createKeyError } from "../types/errors.js";
import type { FieldRefSegment } from "./pattern-parser.js";
import {
  UTC_MODIFIER,
  fieldPath,
  hasModifier,
  parameterName,
  primaryFormat,
} from "./field-ref.js";
import {
  type SemanticType,
  isFloatType,
  isIntegerType,
  isTemporalType,
  isTextType,
} from "./semantic-types.js";
import { parsePrintfSpec } from "./printf.js";
import { type EpochUnit, EPOCH_UNITS } from "./time-format.js";

/** Where a field's raw value comes from. */
export type ValueSource =
  | { readonly kind: "param"; readonly name: string }
  | { readonly kind: "field"; readonly path: readonly string[] };

/**
 * A conversion expression.
 *
 * - `source`: the raw value (identity for text)
 * - `utc`: a date-time re-expressed in UTC
 * - `epoch`: a date-time as an integer epoch counter
 * - `printf`: width/precision formatting with a printf spec
 * - `decimal`: canonical unpadded base-10 integer
 * - `timestamp`: a date-time formatted with a named or custom layout
 * - `stringify`: best-effort string for types without a dedicated encoding
 */
export type ConversionExpression =
  | { readonly kind: "source"; readonly source: ValueSource }
  | { readonly kind: "utc"; readonly operand: ConversionExpression }
  | {
      readonly kind: "epoch";
      readonly unit: EpochUnit;
      readonly operand: ConversionExpression;
    }
  | {
      readonly kind: "printf";
      readonly spec: string;
      readonly operand: ConversionExpression;
    }
  | { readonly kind: "decimal"; readonly operand: ConversionExpression }
  | {
      readonly kind: "timestamp";
      readonly layout: string;
      readonly operand: ConversionExpression;
    }
  | { readonly kind: "stringify"; readonly operand: ConversionExpression };

/** The conversion chosen for one field reference and semantic type. */
export interface ConversionDescriptor {
  readonly expression: ConversionExpression;
  /** Integer-to-text support is needed (`decimal`). */
  readonly requiresNumericLibrary: boolean;
  /** Calendar formatting support is needed (`timestamp`). */
  readonly requiresTemporalLibrary: boolean;
  /** Printf-style formatting support is needed (`printf`, `stringify`). */
  readonly requiresFormatter: boolean;
}

/** Creates a `param` value source named after the reference's last path component. */
export const paramSource = (ref: FieldRefSegment): ValueSource =>
  Object.freeze({ kind: "param" as const, name: parameterName(ref) });

/** Creates a `field` value source for the reference's full path. */
export const fieldSource = (ref: FieldRefSegment): ValueSource =>
  Object.freeze({ kind: "field" as const, path: fieldPath(ref) });

const node = <E extends ConversionExpression>(expression: E): E =>
  Object.freeze(expression);

const collectKinds = (
  expression: ConversionExpression,
  kinds: Set<ConversionExpression["kind"]>,
): Set<ConversionExpression["kind"]> => {
  kinds.add(expression.kind);
  return expression.kind === "source"
    ? kinds
    : collectKinds(expression.operand, kinds);
};

const describe = (expression: ConversionExpression): ConversionDescriptor => {
  const kinds = collectKinds(expression, new Set());
  return Object.freeze({
    expression,
    requiresNumericLibrary: kinds.has("decimal"),
    requiresTemporalLibrary: kinds.has("timestamp"),
    requiresFormatter: kinds.has("printf") || kinds.has("stringify"),
  });
};

const withPrintf = (
  ref: FieldRefSegment,
  spec: string,
  operand: ConversionExpression,
): Result<ConversionExpression, KeyError> => {
  const parsed = parsePrintfSpec(spec);
  if (!parsed.success) {
    return err(
      createKeyError("conversion", parsed.error.code, parsed.error.message, {
        path: ref.path,
      }),
    );
  }
  return ok(node({ kind: "printf", spec, operand }));
};

const isEpochUnit = (format: string): format is EpochUnit =>
  EPOCH_UNITS.some((unit) => unit === format);

const convertTemporal = (
  ref: FieldRefSegment,
  semanticType: SemanticType,
  source: ConversionExpression,
): Result<ConversionExpression, KeyError> => {
  const format = primaryFormat(ref);
  if (format === undefined || format === UTC_MODIFIER) {
    return err(
      createKeyError(
        "conversion",
        "MissingTemporalFormat",
        `Field "${ref.path}" of type ${semanticType} requires an explicit format ` +
          "(e.g. {field:unix}, {field:unixmilli}, {field:unixnano}, {field:rfc3339}, " +
          "{field:utc:rfc3339fixed}, or {field:yyyy-MM-dd})",
        { path: ref.path },
      ),
    );
  }

  const time = hasModifier(ref, UTC_MODIFIER)
    ? node({ kind: "utc", operand: source })
    : source;

  if (isEpochUnit(format)) {
    const counter = node({ kind: "epoch", unit: format, operand: time });
    return ref.widthSpec !== undefined
      ? withPrintf(ref, ref.widthSpec, counter)
      : ok(node({ kind: "decimal", operand: counter }));
  }

  return ok(node({ kind: "timestamp", layout: format, operand: time }));
};

const convertExpression = (
  ref: FieldRefSegment,
  semanticType: SemanticType,
  source: ConversionExpression,
): Result<ConversionExpression, KeyError> => {
  if (isTextType(semanticType)) {
    return ref.widthSpec !== undefined
      ? withPrintf(ref, ref.widthSpec, source)
      : ok(source);
  }

  if (isIntegerType(semanticType)) {
    return ref.widthSpec !== undefined
      ? withPrintf(ref, ref.widthSpec, source)
      : ok(node({ kind: "decimal", operand: source }));
  }

  if (isFloatType(semanticType)) {
    const spec = ref.widthSpec ?? primaryFormat(ref);
    if (spec === undefined) {
      return err(
        createKeyError(
          "conversion",
          "MissingFloatFormat",
          `Field "${ref.path}" of type ${semanticType} requires an explicit format ` +
            "(e.g. {field:%.2f} or {field:%020.2f})",
          { path: ref.path },
        ),
      );
    }
    return withPrintf(ref, spec, source);
  }

  if (isTemporalType(semanticType)) {
    return convertTemporal(ref, semanticType, source);
  }

  return ok(node({ kind: "stringify", operand: source }));
};

/**
 * Chooses the encoding of a field reference for its semantic type.
 *
 * @param ref - A parsed field reference
 * @param semanticType - The field's type as reported by the schema provider
 * @param source - Where the raw value comes from
 * @returns The conversion descriptor, or `MissingFloatFormat`,
 *   `MissingTemporalFormat` or `InvalidWidthSpec`
 *
 * @example
 * ```ts
 * convertFieldRef(ref, "int64", { kind: "param", name: "seq" });
 * // for {seq:%020d}:
 * // => expression { kind: "printf", spec: "%020d",
 * //                 operand: { kind: "source", source: { kind: "param", name: "seq" } } }
 * ```
 */
export const convertFieldRef = (
  ref: FieldRefSegment,
  semanticType: SemanticType,
  source: ValueSource,
): Result<ConversionDescriptor, KeyError> => {
  const converted = convertExpression(
    ref,
    semanticType,
    node({ kind: "source", source }),
  );
  return converted.success ? ok(describe(converted.data)) : converted;
};
