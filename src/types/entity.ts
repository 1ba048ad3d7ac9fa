/**
 * Entity definition types: key patterns bound to a table's key attributes.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { TableDefinition } from "./table.js";
import type { FieldTypes } from "../keys/semantic-types.js";
import type { ParsePatternFields } from "../keys/pattern-types.js";

/** Key patterns for one secondary index. */
export interface EntityIndexPatterns {
  readonly partitionKey: string;
  readonly sortKey?: string | undefined;
}

/**
 * Secondary index patterns for an entity.
 * Each key corresponds to an index name defined on the table; entities
 * take part only in the indexes they list.
 */
export type EntityIndexKeys<T extends TableDefinition> = {
  readonly [K in keyof T["indexes"]]?: EntityIndexPatterns;
};

/**
 * Configuration input for `defineEntity()`.
 *
 * `fields` maps each field path a pattern references (dot notation for
 * nested fields) to its semantic type, e.g. `{ "user.id": "string" }`.
 */
export interface EntityConfig<
  S extends StandardSchemaV1 | undefined,
  T extends TableDefinition,
  F extends FieldTypes,
  PK extends string = string,
  SK extends string = string,
> {
  readonly name: string;
  /** Validates records before keys are derived from them. */
  readonly schema?: S;
  readonly fields: F;
  readonly table: T;
  readonly partitionKey: PK;
  readonly sortKey?: SK | undefined;
  readonly indexes?: EntityIndexKeys<T> | undefined;
}

/**
 * The frozen, immutable entity definition produced by `defineEntity()`.
 */
export interface EntityDefinition<
  S extends StandardSchemaV1 | undefined = StandardSchemaV1 | undefined,
  T extends TableDefinition = TableDefinition,
  F extends FieldTypes = FieldTypes,
  PK extends string = string,
  SK extends string = string,
> {
  readonly name: string;
  readonly schema: S | undefined;
  readonly fields: F;
  readonly table: T;
  readonly partitionKey: PK;
  readonly sortKey: SK | undefined;
  readonly indexes: EntityIndexKeys<T> | undefined;
}

/**
 * Infers the record type of an entity: the schema output when the entity
 * has a schema, a plain record otherwise.
 *
 * @example
 * ```ts
 * const orderEntity = defineEntity({ ... });
 * type Order = InferEntityType<typeof orderEntity>;
 * ```
 */
export type InferEntityType<E> =
  E extends EntityDefinition<infer S, infer _T, infer _F, infer _PK, infer _SK>
    ? S extends StandardSchemaV1
      ? StandardSchemaV1.InferOutput<S>
      : Readonly<Record<string, unknown>>
    : never;

/**
 * The field paths referenced by an entity's primary key patterns.
 */
export type EntityKeyFields<E> =
  E extends EntityDefinition<infer _S, infer _T, infer _F, infer PK, infer SK>
    ? ParsePatternFields<PK> | ParsePatternFields<SK>
    : never;
