/**
 * Index maintenance: reads the key attributes of stored items.
 *
 * Every item has a primary key, so a missing field there is an error. A
 * secondary index is sparse: an item without the fields its patterns
 * reference does not take part in it.
 */

import { type Result, ok } from "../types/common.js";
import { type KeyError, isFieldNotFound } from "../types/errors.js";
import type { AttributeMap, KeyAttributeValue } from "../marshalling/types.js";
import {
  type CompiledIndex,
  type CompiledKeyPair,
  findSecondaryIndex,
} from "../core/compile-index.js";
import { applyExtractor } from "../keys/key-extractor.js";

/** Key attribute name to value. */
export type KeyAttributes = Readonly<Record<string, KeyAttributeValue>>;

const extractPair = (
  pair: CompiledKeyPair,
  item: AttributeMap,
): Result<KeyAttributes, KeyError> => {
  const partition = applyExtractor(pair.partitionKey.extractor, item);
  if (!partition.success) return partition;

  const keys: Record<string, KeyAttributeValue> = {
    [pair.partitionKey.attribute.name]: partition.data,
  };

  if (pair.sortKey !== undefined) {
    const sort = applyExtractor(pair.sortKey.extractor, item);
    if (!sort.success) return sort;
    keys[pair.sortKey.attribute.name] = sort.data;
  }

  return ok(Object.freeze(keys));
};

/**
 * Extracts an item's primary key.
 *
 * @returns The key attributes, or `FieldNotFound` when the item lacks a
 *   referenced field
 */
export const extractPrimaryKey = (
  index: CompiledIndex,
  item: AttributeMap,
): Result<KeyAttributes, KeyError> => extractPair(index.primary, item);

/**
 * Extracts an item's keys for one secondary index.
 *
 * @param index - The compiled entity
 * @param indexName - The index's key in the table definition, or its storage name
 * @param item - The stored item
 * @returns The key attributes, `undefined` when the item does not take part
 *   in the index, or an error (including `UnknownIndex`)
 *
 * @example
 * ```ts
 * extractSecondaryKeys(users, "byEmail", { id: { S: "u-1" } });
 * // => { success: true, data: undefined }
 * ```
 */
export const extractSecondaryKeys = (
  index: CompiledIndex,
  indexName: string,
  item: AttributeMap,
): Result<KeyAttributes | undefined, KeyError> => {
  const secondary = findSecondaryIndex(index, indexName);
  if (!secondary.success) return secondary;

  const keys = extractPair(secondary.data, item);
  if (!keys.success && isFieldNotFound(keys.error)) return ok(undefined);
  return keys;
};

/**
 * Extracts the primary key and the keys of every secondary index the item
 * takes part in, merged into one record.
 */
export const extractAllKeys = (
  index: CompiledIndex,
  item: AttributeMap,
): Result<KeyAttributes, KeyError> => {
  const primary = extractPrimaryKey(index, item);
  if (!primary.success) return primary;

  const keys: Record<string, KeyAttributeValue> = {};
  for (const secondary of index.secondary) {
    const extracted = extractSecondaryKeys(index, secondary.name, item);
    if (!extracted.success) return extracted;
    if (extracted.data !== undefined) Object.assign(keys, extracted.data);
  }

  return ok(Object.freeze({ ...keys, ...primary.data }));
};
