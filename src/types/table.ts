/**
 * Table and index definition types for single-table key design.
 */

/** DynamoDB key attribute type: string, number or binary. */
export type KeyAttributeType = "S" | "N" | "B";

/** A single key attribute in a table or index. */
export interface KeyAttribute {
  readonly name: string;
  readonly type?: KeyAttributeType | undefined;
}

/** Index type discriminator. */
export type IndexType = "GSI" | "LSI";

/** Definition for a Global or Local Secondary Index. */
export interface IndexDefinition {
  readonly type: IndexType;
  readonly indexName: string;
  readonly partitionKey: KeyAttribute;
  readonly sortKey?: KeyAttribute | undefined;
}

/** Configuration input for `defineTable()`. */
export interface TableConfig<
  Indexes extends Record<string, IndexDefinition> = Record<
    string,
    IndexDefinition
  >,
> {
  readonly tableName: string;
  readonly partitionKey: KeyAttribute;
  readonly sortKey?: KeyAttribute | undefined;
  readonly indexes?: Indexes | undefined;
}

/** A key attribute with its type resolved. */
export interface ResolvedKeyAttribute {
  readonly name: string;
  readonly type: KeyAttributeType;
}

/** A secondary index with its key attribute types resolved. */
export interface ResolvedIndexDefinition {
  readonly type: IndexType;
  readonly indexName: string;
  readonly partitionKey: ResolvedKeyAttribute;
  readonly sortKey?: ResolvedKeyAttribute | undefined;
}

/** The frozen, immutable table definition produced by `defineTable()`. */
export interface TableDefinition<
  Indexes extends Record<string, IndexDefinition> = Record<
    string,
    IndexDefinition
  >,
> {
  readonly tableName: string;
  readonly partitionKey: ResolvedKeyAttribute;
  readonly sortKey?: ResolvedKeyAttribute | undefined;
  readonly indexes: { readonly [K in keyof Indexes]: ResolvedIndexDefinition };
}
