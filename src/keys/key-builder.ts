/**
 * Builds key attribute values from records and named inputs using compiled
 * keys, and derives complete items with every key attribute set.
 */

import { type Result, ok, err } from "../types/common.js";
import { type KeyError, createKeyError, isFieldNotFound } from "../types/errors.js";
import type { AttributeMap, AttributeValue, KeyAttributeValue } from "../marshalling/types.js";
import { marshallItem } from "../marshalling/marshall.js";
import type { ValidationError } from "../validation/errors.js";
import { validateRecord } from "../validation/validate.js";
import type {
  CompiledIndex,
  CompiledKey,
  CompiledKeyPair,
  CompiledPart,
} from "../core/compile-index.js";
import type { ConversionDescriptor, ValueSource } from "./conversion.js";
import { evaluateExpression } from "./encoder.js";
import { toKeyAttributeValue } from "./key-value.js";

/** A record keys are derived from. */
export type KeyRecord = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is KeyRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Reads a dot path from a record's own properties. `undefined` and `null`
 * count as absent.
 */
const readPath = (
  data: KeyRecord,
  path: readonly string[],
): Result<unknown, KeyError> => {
  let current: unknown = data;
  for (const [depth, key] of path.entries()) {
    const value = isRecord(current) && Object.hasOwn(current, key) ? current[key] : undefined;
    if (value === undefined || value === null) {
      return err(
        createKeyError(
          "extraction",
          "FieldNotFound",
          `Missing required key field "${path.slice(0, depth + 1).join(".")}"`,
          { path: path.join(".") },
        ),
      );
    }
    current = value;
  }
  return ok(current);
};

const resolveFrom =
  (data: KeyRecord) =>
  (source: ValueSource): Result<unknown, KeyError> =>
    readPath(data, source.kind === "field" ? source.path : [source.name]);

const buildKeyText = (
  key: CompiledKey,
  select: (part: CompiledPart) => ConversionDescriptor,
  data: KeyRecord,
): Result<string, KeyError> => {
  const resolve = resolveFrom(data);
  let text = "";
  let next = 0;
  for (const segment of key.spec.segments) {
    if (segment.type === "literal") {
      text += segment.value;
      continue;
    }
    const part = key.parts[next++];
    if (part === undefined) {
      return err(
        createKeyError(
          "definition",
          "InvalidDefinition",
          `Compiled key "${key.spec.raw}" has no conversion for "${segment.path}"`,
        ),
      );
    }
    const encoded = evaluateExpression(select(part).expression, resolve);
    if (!encoded.success) return encoded;
    text += encoded.data;
  }
  return ok(text);
};

/**
 * Builds a key attribute value from a record, reading each referenced field
 * by its full path.
 *
 * @param key - A compiled key
 * @param data - The record
 * @returns The attribute value, `FieldNotFound` when a referenced field is
 *   absent, or `InvalidFieldValue` when a value does not fit its encoding
 *
 * @example
 * ```ts
 * // sort key "ORDER#{seq:%05d}" on an "S" attribute
 * buildKeyValue(sortKey, { seq: 42 });
 * // => { success: true, data: { S: "ORDER#00042" } }
 * ```
 */
export const buildKeyValue = (
  key: CompiledKey,
  data: KeyRecord,
): Result<KeyAttributeValue, KeyError> => {
  const text = buildKeyText(key, (part) => part.field, data);
  return text.success
    ? ok(toKeyAttributeValue(key.attribute.type, text.data, key.isConstant))
    : text;
};

/**
 * Builds a key attribute value from named inputs, one per reference,
 * keyed by parameter name (the last path component).
 *
 * @example
 * ```ts
 * // partition key "USER#{user.id}"
 * buildKeyFromParams(partitionKey, { id: "u-1" });
 * // => { success: true, data: { S: "USER#u-1" } }
 * ```
 */
export const buildKeyFromParams = (
  key: CompiledKey,
  params: KeyRecord,
): Result<KeyAttributeValue, KeyError> => {
  const text = buildKeyText(key, (part) => part.param, params);
  return text.success
    ? ok(toKeyAttributeValue(key.attribute.type, text.data, key.isConstant))
    : text;
};

const buildKeyPair = (
  pair: CompiledKeyPair,
  data: KeyRecord,
): Result<Readonly<Record<string, KeyAttributeValue>>, KeyError> => {
  const partition = buildKeyValue(pair.partitionKey, data);
  if (!partition.success) return partition;

  const key: Record<string, KeyAttributeValue> = {
    [pair.partitionKey.attribute.name]: partition.data,
  };

  if (pair.sortKey !== undefined) {
    const sort = buildKeyValue(pair.sortKey, data);
    if (!sort.success) return sort;
    key[pair.sortKey.attribute.name] = sort.data;
  }

  return ok(Object.freeze(key));
};

/**
 * Builds the primary key attributes of a record.
 *
 * @example
 * ```ts
 * buildPrimaryKey(orders, { tenant: "acme", seq: 42 });
 * // => { success: true, data: { pk: { S: "TENANT#acme" }, sk: { S: "ORDER#00042" } } }
 * ```
 */
export const buildPrimaryKey = (
  index: CompiledIndex,
  data: KeyRecord,
): Result<Readonly<Record<string, KeyAttributeValue>>, KeyError> =>
  buildKeyPair(index.primary, data);

/**
 * Builds the key attributes of every secondary index the record takes part
 * in. An index whose referenced fields are absent from the record is left
 * out; other errors fail the whole build.
 */
export const buildSecondaryKeys = (
  index: CompiledIndex,
  data: KeyRecord,
): Result<Readonly<Record<string, KeyAttributeValue>>, KeyError> => {
  const keys: Record<string, KeyAttributeValue> = {};
  for (const secondary of index.secondary) {
    const pair = buildKeyPair(secondary, data);
    if (!pair.success) {
      if (isFieldNotFound(pair.error)) continue;
      return pair;
    }
    Object.assign(keys, pair.data);
  }
  return ok(Object.freeze(keys));
};

const assembleItem = (
  index: CompiledIndex,
  data: KeyRecord,
): Result<AttributeMap, KeyError> => {
  const marshalled = marshallItem(data);
  if (!marshalled.success) return marshalled;

  const primary = buildPrimaryKey(index, data);
  if (!primary.success) return primary;

  const secondary = buildSecondaryKeys(index, data);
  if (!secondary.success) return secondary;

  const item: Record<string, AttributeValue> = {
    ...marshalled.data,
    ...secondary.data,
    ...primary.data,
  };
  return ok(Object.freeze(item));
};

/**
 * Derives the stored form of a record: its marshalled attributes plus the
 * primary key and every applicable secondary index key.
 *
 * When the entity has a schema, the record is validated first and keys are
 * derived from the validated output.
 *
 * @param index - The compiled entity
 * @param data - The record
 * @returns The item, a `ValidationError`, or the first key error
 *
 * @example
 * ```ts
 * const item = await deriveItem(orders, { tenant: "acme", seq: 42 });
 * // => { success: true, data: {
 * //      tenant: { S: "acme" }, seq: { N: "42" },
 * //      pk: { S: "TENANT#acme" }, sk: { S: "ORDER#00042" } } }
 * ```
 */
export const deriveItem = async (
  index: CompiledIndex,
  data: unknown,
): Promise<Result<AttributeMap, KeyError | ValidationError>> => {
  const validated = await validateRecord(index.entity, data);
  if (!validated.success) return validated;

  const record = validated.data;
  if (!isRecord(record)) {
    return err(
      createKeyError(
        "conversion",
        "InvalidFieldValue",
        `Entity "${index.name}" records must be plain objects`,
      ),
    );
  }
  return assembleItem(index, record);
};
