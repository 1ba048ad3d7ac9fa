/**
 * Shared test fixtures used across test files.
 */

import { z } from "zod";
import { defineTable } from "../core/define-table.js";
import { defineEntity } from "../core/define-entity.js";
import { type CompiledIndex, compileEntity } from "../core/compile-index.js";
import type { EntityDefinition } from "../types/entity.js";
import { type PatternSpec, type FieldRefSegment, parsePattern } from "../keys/pattern-parser.js";
import { fieldRefs } from "../keys/field-ref.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Parses a pattern that the test expects to be valid. */
export const mustParse = (raw: string, kind: "S" | "N" | "B" = "S"): PatternSpec => {
  const result = parsePattern(raw, kind);
  if (!result.success) throw new Error(`fixture pattern "${raw}": ${result.error.message}`);
  return result.data;
};

/** Returns the only field reference of a pattern like `"{count:%020d}"`. */
export const refOf = (raw: string): FieldRefSegment => {
  const [ref] = fieldRefs(mustParse(raw));
  if (ref === undefined) throw new Error(`fixture pattern "${raw}" has no reference`);
  return ref;
};

/** Compiles an entity that the test expects to be valid. */
export const mustCompile = (entity: EntityDefinition): CompiledIndex => {
  const result = compileEntity(entity);
  if (!result.success) throw new Error(`fixture entity "${entity.name}": ${result.error.message}`);
  return result.data;
};

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export const mainTable = defineTable({
  tableName: "MainTable",
  partitionKey: { name: "pk" },
  sortKey: { name: "sk" },
  indexes: {
    byCustomer: {
      type: "GSI",
      indexName: "GSI1",
      partitionKey: { name: "gsi1pk" },
      sortKey: { name: "gsi1sk" },
    },
    byStatus: {
      type: "GSI",
      indexName: "GSI2",
      partitionKey: { name: "gsi2pk" },
    },
  },
});

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

export const orderSchema = z.object({
  tenant: z.string().min(1),
  seq: z.number().int().nonnegative(),
  customer: z.object({ id: z.string() }).optional(),
  status: z.string().optional(),
});

export const orderEntity = defineEntity({
  name: "Order",
  schema: orderSchema,
  fields: {
    tenant: "string",
    seq: "int64",
    "customer.id": "string",
    status: "string",
  },
  table: mainTable,
  partitionKey: "TENANT#{tenant}",
  sortKey: "ORDER#{seq:%05d}",
  indexes: {
    byCustomer: {
      partitionKey: "CUSTOMER#{customer.id}",
      sortKey: "ORDER#{seq:%05d}",
    },
    byStatus: {
      partitionKey: "STATUS#{status}",
    },
  },
});

export const eventEntity = defineEntity({
  name: "Event",
  fields: { stream: "string", at: "time", count: "int" },
  table: mainTable,
  partitionKey: "STREAM#{stream}",
  sortKey: "AT#{at:utc:unixnano:%020d}#{count}",
});

/** Keys on fields that share names with Object.prototype members. */
export const widgetEntity = defineEntity({
  name: "Widget",
  fields: { id: "string", constructor: "string" },
  table: mainTable,
  partitionKey: "WIDGET#{id}",
  sortKey: "WIDGET",
  indexes: {
    byStatus: { partitionKey: "KIND#{constructor}" },
  },
});
