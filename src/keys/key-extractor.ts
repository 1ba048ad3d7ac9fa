/**
 * Derives key attribute values from stored items.
 *
 * Stored attributes are already encoded, so field references are read as-is:
 * modifiers and width specs in the pattern are not re-applied.
 */

import { type Result, ok, err } from "../types/common.js";
import { type KeyError, createKeyError } from "../types/errors.js";
import type { KeyAttributeType } from "../types/table.js";
import type {
  AttributeMap,
  AttributeValue,
  KeyAttributeValue,
} from "../marshalling/types.js";
import type { PatternSpec, PatternSegment } from "./pattern-parser.js";
import { fieldPath } from "./field-ref.js";
import { toKeyAttributeValue } from "./key-value.js";

/** A node of the extraction tree. */
export type ExtractionNode =
  | { readonly type: "literal"; readonly value: string }
  | { readonly type: "field"; readonly path: readonly string[] }
  | { readonly type: "concat"; readonly children: readonly ExtractionNode[] };

/** An extraction tree bound to the key attribute type it produces. */
export interface KeyExtractor {
  readonly kind: KeyAttributeType;
  readonly root: ExtractionNode;
}

/** A key value before it is wrapped in an AttributeValue. */
type Extracted =
  | { readonly tag: "S" | "N"; readonly value: string }
  | { readonly tag: "B"; readonly value: Uint8Array };

const utf8Decoder = new TextDecoder();

const toNode = (segment: PatternSegment): ExtractionNode =>
  segment.type === "literal"
    ? Object.freeze({ type: "literal" as const, value: segment.value })
    : Object.freeze({
        type: "field" as const,
        path: Object.freeze([...fieldPath(segment)]),
      });

/**
 * Builds the extraction tree for a pattern.
 *
 * A constant pattern becomes a single literal, a pattern made of one field
 * reference becomes a field node, and anything else a concatenation.
 *
 * @example
 * ```ts
 * const spec = parsePattern("ORDER#{tenant}#{id}");
 * if (spec.success) buildExtractor(spec.data).root;
 * // => { type: "concat", children: [
 * //      { type: "literal", value: "ORDER#" }, { type: "field", path: ["tenant"] },
 * //      { type: "literal", value: "#" }, { type: "field", path: ["id"] }] }
 * ```
 */
export const buildExtractor = (spec: PatternSpec): KeyExtractor => {
  const nodes = spec.segments.map(toNode);
  const [first] = nodes;
  const root =
    nodes.length === 1 && first !== undefined
      ? first
      : Object.freeze({ type: "concat" as const, children: Object.freeze(nodes) });
  return Object.freeze({ kind: spec.attributeKind, root });
};

const fieldNotFound = (path: readonly string[], depth: number): KeyError =>
  createKeyError(
    "extraction",
    "FieldNotFound",
    `Field "${path.slice(0, depth + 1).join(".")}" not found`,
    { path: path.join(".") },
  );

const readLeaf = (
  value: AttributeValue,
  path: readonly string[],
): Result<Extracted, KeyError> => {
  if ("S" in value) return ok({ tag: "S", value: value.S });
  if ("N" in value) return ok({ tag: "N", value: value.N });
  if ("B" in value) return ok({ tag: "B", value: value.B });
  return err(
    createKeyError(
      "extraction",
      "InvalidFieldValue",
      `Field "${path.join(".")}" holds a value that cannot form a key; expected S, N or B`,
      { path: path.join(".") },
    ),
  );
};

const readField = (
  item: AttributeMap,
  path: readonly string[],
): Result<Extracted, KeyError> => {
  let current: AttributeMap = item;
  for (let depth = 0; depth < path.length - 1; depth++) {
    const key = path[depth] ?? "";
    const value = Object.hasOwn(current, key) ? current[key] : undefined;
    if (value === undefined || !("M" in value)) {
      return err(fieldNotFound(path, depth));
    }
    current = value.M;
  }

  const last = path[path.length - 1] ?? "";
  const leaf = Object.hasOwn(current, last) ? current[last] : undefined;
  if (leaf === undefined) {
    return err(fieldNotFound(path, path.length - 1));
  }
  return readLeaf(leaf, path);
};

const asText = (extracted: Extracted): string =>
  extracted.tag === "B" ? utf8Decoder.decode(extracted.value) : extracted.value;

const evaluate = (
  node: ExtractionNode,
  item: AttributeMap,
): Result<Extracted, KeyError> => {
  switch (node.type) {
    case "literal":
      return ok({ tag: "S", value: node.value });
    case "field":
      return readField(item, node.path);
    case "concat": {
      let text = "";
      for (const child of node.children) {
        const part = evaluate(child, item);
        if (!part.success) return part;
        text += asText(part.data);
      }
      return ok({ tag: "S", value: text });
    }
  }
};

const toAttributeValue = (
  extractor: KeyExtractor,
  extracted: Extracted,
): Result<KeyAttributeValue, KeyError> => {
  if (extractor.kind === "B") {
    if (extracted.tag === "B") return ok({ B: extracted.value });
    if (extracted.tag === "N") {
      return err(
        createKeyError(
          "extraction",
          "IncompatibleBinaryValue",
          `Binary key cannot be derived from stored number "${extracted.value}"`,
        ),
      );
    }
  }
  return ok(
    toKeyAttributeValue(
      extractor.kind,
      asText(extracted),
      extractor.root.type === "literal",
    ),
  );
};

/**
 * Applies an extraction tree to a stored item.
 *
 * @param extractor - A tree built by {@link buildExtractor}
 * @param item - The stored item
 * @returns The key attribute value, `FieldNotFound` when a referenced field
 *   (or a map along its path) is missing, `IncompatibleBinaryValue` when a
 *   binary key is read from a stored number, or `InvalidFieldValue` for a
 *   leaf that is not S, N or B
 *
 * @example
 * ```ts
 * applyExtractor(extractor, { tenant: { S: "acme" }, id: { N: "42" } });
 * // => { success: true, data: { S: "ORDER#acme#42" } }
 * ```
 */
export const applyExtractor = (
  extractor: KeyExtractor,
  item: AttributeMap,
): Result<KeyAttributeValue, KeyError> => {
  const extracted = evaluate(extractor.root, item);
  return extracted.success ? toAttributeValue(extractor, extracted.data) : extracted;
};
