/**
 * Marshalls JavaScript records into DynamoDB AttributeValue format, so that
 * derived keys can be merged into the stored item.
 */

import { type Result, ok, err } from "../types/common.js";
import { type KeyError, createKeyError } from "../types/errors.js";
import type { AttributeValue, AttributeMap } from "./types.js";

const cannotMarshall = (message: string, path: string): KeyError =>
  createKeyError("conversion", "InvalidFieldValue", message, { path });

const join = (parent: string, key: string): string =>
  parent === "" ? key : `${parent}.${key}`;

/**
 * Marshalls a single JavaScript value into a DynamoDB AttributeValue.
 *
 * Conversion rules:
 * - `null` / `undefined` -> `{ NULL: true }`
 * - `string` -> `{ S: "..." }`
 * - `number` / `bigint` -> `{ N: "..." }`
 * - `boolean` -> `{ BOOL: true/false }`
 * - `Date` -> `{ S: "<ISO 8601>" }`
 * - `Uint8Array` -> `{ B: ... }`
 * - `Set` of strings, numbers or `Uint8Array`s -> `SS` / `NS` / `BS`
 * - `Array` -> `{ L: [...] }`
 * - Plain object -> `{ M: { ... } }`
 *
 * @param value - The JavaScript value to marshall
 * @param path - Dot path of the value, reported in errors
 */
export const marshallValue = (
  value: unknown,
  path = "",
): Result<AttributeValue, KeyError> => {
  if (value === null || value === undefined) {
    return ok({ NULL: true });
  }

  if (typeof value === "string") {
    return ok({ S: value });
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return err(cannotMarshall(`Cannot marshall non-finite number: ${value}`, path));
    }
    return ok({ N: String(value) });
  }

  if (typeof value === "bigint") {
    return ok({ N: value.toString() });
  }

  if (typeof value === "boolean") {
    return ok({ BOOL: value });
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return err(cannotMarshall("Cannot marshall an invalid Date", path));
    }
    return ok({ S: value.toISOString() });
  }

  if (value instanceof Uint8Array) {
    return ok({ B: value });
  }

  if (value instanceof Set) {
    return marshallSet([...value], path);
  }

  if (Array.isArray(value)) {
    return marshallList(value, path);
  }

  if (typeof value === "object") {
    const map = marshallMap(Object.entries(value), path);
    return map.success ? ok({ M: map.data }) : map;
  }

  return err(cannotMarshall(`Cannot marshall value of type ${typeof value}`, path));
};

const isString = (v: unknown): v is string => typeof v === "string";
const isNumeric = (v: unknown): v is number | bigint =>
  typeof v === "number" || typeof v === "bigint";
const isBinary = (v: unknown): v is Uint8Array => v instanceof Uint8Array;

const marshallSet = (
  values: readonly unknown[],
  path: string,
): Result<AttributeValue, KeyError> => {
  if (values.length === 0) {
    return err(cannotMarshall("Cannot marshall an empty Set", path));
  }
  if (values.every(isString)) return ok({ SS: values });
  if (values.every(isNumeric)) return ok({ NS: values.map(String) });
  if (values.every(isBinary)) return ok({ BS: values });
  return err(
    cannotMarshall(
      "Sets must hold only strings, only numbers or only Uint8Arrays",
      path,
    ),
  );
};

const marshallList = (
  list: readonly unknown[],
  path: string,
): Result<AttributeValue, KeyError> => {
  const items: AttributeValue[] = [];
  for (const [i, item] of list.entries()) {
    const result = marshallValue(item, join(path, String(i)));
    if (!result.success) return result;
    items.push(result.data);
  }
  return ok({ L: items });
};

const marshallMap = (
  entries: ReadonlyArray<readonly [string, unknown]>,
  path: string,
): Result<AttributeMap, KeyError> => {
  const map: Record<string, AttributeValue> = {};
  for (const [key, value] of entries) {
    if (value === undefined) continue;
    const result = marshallValue(value, join(path, key));
    if (!result.success) return result;
    map[key] = result.data;
  }
  return ok(map);
};

/**
 * Marshalls a plain JavaScript object into a DynamoDB item (AttributeMap).
 * Attributes whose value is `undefined` are left out.
 *
 * @example
 * ```ts
 * marshallItem({ tenant: "acme", total: 12.5 });
 * // => { success: true, data: { tenant: { S: "acme" }, total: { N: "12.5" } } }
 * ```
 */
export const marshallItem = (
  item: Readonly<Record<string, unknown>>,
): Result<AttributeMap, KeyError> => marshallMap(Object.entries(item), "");
