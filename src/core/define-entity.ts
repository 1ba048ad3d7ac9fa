/**
 * Factory function for creating immutable entity definitions.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { TableDefinition } from "../types/table.js";
import type { EntityConfig, EntityDefinition } from "../types/entity.js";
import type { FieldTypes } from "../keys/semantic-types.js";
import type {
  RootField,
  ValidatePatternFields,
} from "../keys/pattern-types.js";

type DeclaredPaths<F extends FieldTypes> = string & keyof F;

type SchemaOutputKeys<S> = S extends StandardSchemaV1
  ? string & keyof StandardSchemaV1.InferOutput<S>
  : never;

/** Root fields of `F` that the schema output does not have, or `true`. */
type ValidateSchemaRoots<
  S extends StandardSchemaV1 | undefined,
  F extends FieldTypes,
> = [S] extends [undefined]
  ? true
  : [S] extends [StandardSchemaV1]
    ? [Exclude<RootField<DeclaredPaths<F>>, SchemaOutputKeys<S>>] extends [never]
      ? true
      : Exclude<RootField<DeclaredPaths<F>>, SchemaOutputKeys<S>>
    : true;

/**
 * Defines an entity by binding key patterns to a table's key attributes.
 *
 * Checks at compile time that every field the primary key patterns
 * reference is declared in `fields`, and, when a schema is given, that
 * every declared field's root exists in the schema's output type.
 * The type parameters are inferred from `config` alone, so the checks hold
 * when the call is itself an argument, as in `registry.register(defineEntity(...))`.
 *
 * @param config - The entity configuration
 * @returns A frozen {@link EntityDefinition}
 *
 * @example
 * ```ts
 * const orderEntity = defineEntity({
 *   name: "Order",
 *   schema: z.object({ tenant: z.string(), createdAt: z.date(), total: z.number() }),
 *   fields: { tenant: "string", createdAt: "time", total: "float64" },
 *   table,
 *   partitionKey: "TENANT#{tenant}",
 *   sortKey: "ORDER#{createdAt:utc:unixnano:%020d}",
 * });
 * ```
 */
export const defineEntity = <
  T extends TableDefinition,
  F extends FieldTypes,
  PK extends string,
  SK extends string = never,
  S extends StandardSchemaV1 | undefined = undefined,
>(
  config: EntityConfig<S, T, F, PK, SK> &
    (ValidatePatternFields<PK, DeclaredPaths<F>> extends true
      ? unknown
      : {
          _pkError: `Partition key pattern references undeclared fields: ${string & ValidatePatternFields<PK, DeclaredPaths<F>>}`;
        }) &
    (ValidatePatternFields<SK, DeclaredPaths<F>> extends true
      ? unknown
      : {
          _skError: `Sort key pattern references undeclared fields: ${string & ValidatePatternFields<SK, DeclaredPaths<F>>}`;
        }) &
    (ValidateSchemaRoots<S, F> extends true
      ? unknown
      : {
          _schemaError: `Fields missing from schema output: ${string & ValidateSchemaRoots<S, F>}`;
        }),
): NoInfer<EntityDefinition<S, T, F, PK, SK>> =>
  Object.freeze({
    name: config.name,
    schema: config.schema,
    fields: config.fields,
    table: config.table,
    partitionKey: config.partitionKey,
    sortKey: config.sortKey,
    indexes: config.indexes,
  });
