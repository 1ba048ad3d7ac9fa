/**
 * Builds key condition expressions for range queries over compiled keys.
 */

import { type Result, ok, err } from "../types/common.js";
import { type KeyError, createKeyError } from "../types/errors.js";
import type { KeyAttributeValue } from "../marshalling/types.js";
import {
  type CompiledIndex,
  type CompiledKey,
  type CompiledKeyPair,
  findSecondaryIndex,
} from "../core/compile-index.js";
import { aliasAttributeName, valuePlaceholder } from "../utils/expression.js";
import { type KeyRecord, buildKeyFromParams } from "./key-builder.js";
import { toKeyAttributeValue } from "./key-value.js";

/** Comparison operators with a single bound. */
export type SortKeyComparison = "gt" | "gte" | "lt" | "lte";

/**
 * A sort key condition. Bounds are given as named inputs and encoded with
 * the sort key's pattern, so they collate the same way stored keys do.
 */
export type SortKeyCondition =
  | { readonly op: "equals"; readonly params: KeyRecord }
  | {
      readonly op: "beginsWith";
      /** Defaults to the sort key's leading literal text. */
      readonly prefix?: string | undefined;
    }
  | {
      readonly op: "between";
      readonly low: KeyRecord;
      readonly high: KeyRecord;
    }
  | { readonly op: SortKeyComparison; readonly params: KeyRecord };

export interface KeyConditionInput {
  /** Query a secondary index instead of the table. */
  readonly indexName?: string | undefined;
  /** Named inputs for the partition key pattern. */
  readonly partition: KeyRecord;
  readonly sort?: SortKeyCondition | undefined;
}

/** The pieces of a Query request that select by key. */
export interface KeyCondition {
  /** The storage name of the queried index, when one was requested. */
  readonly indexName?: string | undefined;
  readonly expression: string;
  readonly names: Readonly<Record<string, string>>;
  readonly values: Readonly<Record<string, KeyAttributeValue>>;
}

const OPERATORS: Readonly<Record<SortKeyComparison, string>> = {
  gt: ">",
  gte: ">=",
  lt: "<",
  lte: "<=",
};

const invalidCondition = (message: string): KeyError =>
  createKeyError("definition", "InvalidDefinition", message);

const resolvePair = (
  index: CompiledIndex,
  indexName: string | undefined,
): Result<CompiledKeyPair & { readonly indexName?: string | undefined }, KeyError> =>
  indexName === undefined ? ok(index.primary) : findSecondaryIndex(index, indexName);

const beginsWithValue = (
  sortKey: CompiledKey,
  prefix: string | undefined,
): Result<KeyAttributeValue, KeyError> => {
  if (sortKey.attribute.type === "N") {
    return err(
      invalidCondition(
        `beginsWith is not supported on number sort key "${sortKey.attribute.name}"`,
      ),
    );
  }
  const text = prefix ?? sortKey.literalPrefix;
  if (text === "") {
    return err(
      invalidCondition(
        `Sort key pattern "${sortKey.spec.raw}" has no literal prefix; pass one explicitly`,
      ),
    );
  }
  return ok(toKeyAttributeValue(sortKey.attribute.type, text, false));
};

const sortClause = (
  sortKey: CompiledKey,
  condition: SortKeyCondition,
  alias: string,
  values: Record<string, KeyAttributeValue>,
): Result<string, KeyError> => {
  switch (condition.op) {
    case "equals": {
      const value = buildKeyFromParams(sortKey, condition.params);
      if (!value.success) return value;
      values[valuePlaceholder("sk")] = value.data;
      return ok(`${alias} = ${valuePlaceholder("sk")}`);
    }
    case "beginsWith": {
      const value = beginsWithValue(sortKey, condition.prefix);
      if (!value.success) return value;
      values[valuePlaceholder("sk")] = value.data;
      return ok(`begins_with(${alias}, ${valuePlaceholder("sk")})`);
    }
    case "between": {
      const low = buildKeyFromParams(sortKey, condition.low);
      if (!low.success) return low;
      const high = buildKeyFromParams(sortKey, condition.high);
      if (!high.success) return high;
      values[valuePlaceholder("skLo")] = low.data;
      values[valuePlaceholder("skHi")] = high.data;
      return ok(
        `${alias} BETWEEN ${valuePlaceholder("skLo")} AND ${valuePlaceholder("skHi")}`,
      );
    }
    default: {
      const value = buildKeyFromParams(sortKey, condition.params);
      if (!value.success) return value;
      values[valuePlaceholder("sk")] = value.data;
      return ok(`${alias} ${OPERATORS[condition.op]} ${valuePlaceholder("sk")}`);
    }
  }
};

/**
 * Builds the key condition of a Query over an entity's table or one of its
 * secondary indexes.
 *
 * @param index - The compiled entity
 * @param input - Partition inputs and an optional sort key condition
 * @returns The expression with its attribute names and values, or an error
 *   when an input is missing, the index is unknown, or the sort condition
 *   cannot apply
 *
 * @example
 * ```ts
 * buildKeyCondition(orders, {
 *   partition: { tenant: "acme" },
 *   sort: { op: "beginsWith" },
 * });
 * // => { success: true, data: {
 * //      expression: "#pk = :pk AND begins_with(#sk, :sk)",
 * //      names: { "#pk": "pk", "#sk": "sk" },
 * //      values: { ":pk": { S: "TENANT#acme" }, ":sk": { S: "ORDER#" } } } }
 * ```
 */
export const buildKeyCondition = (
  index: CompiledIndex,
  input: KeyConditionInput,
): Result<KeyCondition, KeyError> => {
  const pair = resolvePair(index, input.indexName);
  if (!pair.success) return pair;
  const { partitionKey, sortKey } = pair.data;

  const partition = buildKeyFromParams(partitionKey, input.partition);
  if (!partition.success) return partition;

  const pkAlias = aliasAttributeName("pk");
  const names: Record<string, string> = { [pkAlias]: partitionKey.attribute.name };
  const values: Record<string, KeyAttributeValue> = {
    [valuePlaceholder("pk")]: partition.data,
  };
  let expression = `${pkAlias} = ${valuePlaceholder("pk")}`;

  if (input.sort !== undefined) {
    if (sortKey === undefined) {
      return err(
        invalidCondition(
          `Entity "${index.name}" has no sort key${input.indexName !== undefined ? ` on index "${input.indexName}"` : ""}`,
        ),
      );
    }
    const skAlias = aliasAttributeName("sk");
    names[skAlias] = sortKey.attribute.name;
    const clause = sortClause(sortKey, input.sort, skAlias, values);
    if (!clause.success) return clause;
    expression += ` AND ${clause.data}`;
  }

  return ok(
    Object.freeze({
      ...(pair.data.indexName !== undefined ? { indexName: pair.data.indexName } : {}),
      expression,
      names: Object.freeze(names),
      values: Object.freeze(values),
    }),
  );
};
