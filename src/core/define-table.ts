/**
 * Factory function for creating immutable table definitions.
 */

import type {
  TableConfig,
  TableDefinition,
  IndexDefinition,
  KeyAttribute,
  ResolvedKeyAttribute,
  ResolvedIndexDefinition,
} from "../types/table.js";

const resolveKeyAttribute = (attr: KeyAttribute): ResolvedKeyAttribute =>
  Object.freeze({ name: attr.name, type: attr.type ?? "S" });

const resolveIndex = (index: IndexDefinition): ResolvedIndexDefinition =>
  Object.freeze({
    type: index.type,
    indexName: index.indexName,
    partitionKey: resolveKeyAttribute(index.partitionKey),
    sortKey: index.sortKey ? resolveKeyAttribute(index.sortKey) : undefined,
  });

/**
 * Defines a table with its primary key attributes and optional indexes.
 * Key attributes without a `type` are string (`"S"`) attributes.
 *
 * @param config - The table configuration
 * @returns A frozen {@link TableDefinition} object
 *
 * @example
 * ```ts
 * const table = defineTable({
 *   tableName: "MainTable",
 *   partitionKey: { name: "pk" },
 *   sortKey: { name: "sk" },
 *   indexes: {
 *     byEmail: {
 *       type: "GSI",
 *       indexName: "GSI1",
 *       partitionKey: { name: "gsi1pk" },
 *       sortKey: { name: "gsi1sk" },
 *     },
 *   },
 * });
 * ```
 */
export const defineTable = <
  Indexes extends Record<string, IndexDefinition> = Record<string, never>,
>(
  config: TableConfig<Indexes>,
): TableDefinition<Indexes> => {
  const indexes: Record<string, ResolvedIndexDefinition> = {};
  for (const [key, index] of Object.entries<IndexDefinition>(
    config.indexes ?? {},
  )) {
    indexes[key] = resolveIndex(index);
  }

  return Object.freeze({
    tableName: config.tableName,
    partitionKey: resolveKeyAttribute(config.partitionKey),
    sortKey: config.sortKey ? resolveKeyAttribute(config.sortKey) : undefined,
    indexes: Object.freeze(indexes) as TableDefinition<Indexes>["indexes"],
  });
};
