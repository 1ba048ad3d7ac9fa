import { describe, it, expect } from "vitest";
import { defineTable } from "../../core/define-table.js";
import { defineEntity } from "../../core/define-entity.js";
import { buildKeyCondition } from "../../keys/key-condition.js";
import { mainTable, mustCompile, orderEntity } from "../fixtures.js";

const orders = mustCompile(orderEntity);

describe("buildKeyCondition()", () => {
  it("selects a partition", () => {
    expect(buildKeyCondition(orders, { partition: { tenant: "acme" } })).toEqual({
      success: true,
      data: {
        expression: "#pk = :pk",
        names: { "#pk": "pk" },
        values: { ":pk": { S: "TENANT#acme" } },
      },
    });
  });

  it("defaults beginsWith to the sort key's literal prefix", () => {
    const result = buildKeyCondition(orders, {
      partition: { tenant: "acme" },
      sort: { op: "beginsWith" },
    });
    expect(result).toEqual({
      success: true,
      data: {
        expression: "#pk = :pk AND begins_with(#sk, :sk)",
        names: { "#pk": "pk", "#sk": "sk" },
        values: { ":pk": { S: "TENANT#acme" }, ":sk": { S: "ORDER#" } },
      },
    });
  });

  it("takes an explicit beginsWith prefix", () => {
    const result = buildKeyCondition(orders, {
      partition: { tenant: "acme" },
      sort: { op: "beginsWith", prefix: "ORDER#000" },
    });
    expect(result.success).toBe(true);
    if (result.success) expect(result.data.values[":sk"]).toEqual({ S: "ORDER#000" });
  });

  it("encodes an equality bound with the sort key pattern", () => {
    const result = buildKeyCondition(orders, {
      partition: { tenant: "acme" },
      sort: { op: "equals", params: { seq: 42 } },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.expression).toBe("#pk = :pk AND #sk = :sk");
      expect(result.data.values[":sk"]).toEqual({ S: "ORDER#00042" });
    }
  });

  it("encodes both bounds of a range", () => {
    const result = buildKeyCondition(orders, {
      partition: { tenant: "acme" },
      sort: { op: "between", low: { seq: 1 }, high: { seq: 99 } },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.expression).toBe("#pk = :pk AND #sk BETWEEN :skLo AND :skHi");
      expect(result.data.values).toEqual({
        ":pk": { S: "TENANT#acme" },
        ":skLo": { S: "ORDER#00001" },
        ":skHi": { S: "ORDER#00099" },
      });
    }
  });

  it("writes single-bound comparisons", () => {
    const gte = buildKeyCondition(orders, {
      partition: { tenant: "acme" },
      sort: { op: "gte", params: { seq: 10 } },
    });
    expect(gte.success).toBe(true);
    if (gte.success) expect(gte.data.expression).toBe("#pk = :pk AND #sk >= :sk");

    const lt = buildKeyCondition(orders, {
      partition: { tenant: "acme" },
      sort: { op: "lt", params: { seq: 10 } },
    });
    expect(lt.success).toBe(true);
    if (lt.success) expect(lt.data.expression).toBe("#pk = :pk AND #sk < :sk");
  });

  describe("secondary indexes", () => {
    it("queries an index by table key and reports its storage name", () => {
      const result = buildKeyCondition(orders, {
        indexName: "byCustomer",
        partition: { id: "c-1" },
        sort: { op: "gt", params: { seq: 5 } },
      });
      expect(result).toEqual({
        success: true,
        data: {
          indexName: "GSI1",
          expression: "#pk = :pk AND #sk > :sk",
          names: { "#pk": "gsi1pk", "#sk": "gsi1sk" },
          values: { ":pk": { S: "CUSTOMER#c-1" }, ":sk": { S: "ORDER#00005" } },
        },
      });
    });

    it("accepts the storage name", () => {
      const result = buildKeyCondition(orders, {
        indexName: "GSI2",
        partition: { status: "open" },
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.indexName).toBe("GSI2");
        expect(result.data.values[":pk"]).toEqual({ S: "STATUS#open" });
      }
    });

    it("rejects a sort condition on an index without a sort key", () => {
      const result = buildKeyCondition(orders, {
        indexName: "byStatus",
        partition: { status: "open" },
        sort: { op: "beginsWith" },
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("InvalidDefinition");
        expect(result.error.message).toBe('Entity "Order" has no sort key on index "byStatus"');
      }
    });

    it("rejects an index the entity does not take part in", () => {
      const result = buildKeyCondition(orders, { indexName: "byEmail", partition: {} });
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe("UnknownIndex");
    });
  });

  it("reports a missing partition input", () => {
    const result = buildKeyCondition(orders, { partition: {} });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe("FieldNotFound");
  });

  it("rejects beginsWith without a literal prefix", () => {
    const bare = mustCompile(
      defineEntity({
        name: "Bare",
        fields: { tenant: "string", seq: "int" },
        table: mainTable,
        partitionKey: "{tenant}",
        sortKey: "{seq:%05d}",
      }),
    );
    const result = buildKeyCondition(bare, {
      partition: { tenant: "acme" },
      sort: { op: "beginsWith" },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        'Sort key pattern "{seq:%05d}" has no literal prefix; pass one explicitly',
      );
    }
  });

  describe("number sort keys", () => {
    const table = defineTable({
      tableName: "Counters",
      partitionKey: { name: "pk" },
      sortKey: { name: "n", type: "N" },
    });
    const counters = mustCompile(
      defineEntity({
        name: "Counter",
        fields: { name: "string", n: "int64" },
        table,
        partitionKey: "COUNTER#{name}",
        sortKey: "{n}",
      }),
    );

    it("encodes bounds as numbers", () => {
      const result = buildKeyCondition(counters, {
        partition: { name: "hits" },
        sort: { op: "lte", params: { n: 100 } },
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.names).toEqual({ "#pk": "pk", "#sk": "n" });
        expect(result.data.values[":sk"]).toEqual({ N: "100" });
      }
    });

    it("rejects beginsWith", () => {
      const result = buildKeyCondition(counters, {
        partition: { name: "hits" },
        sort: { op: "beginsWith", prefix: "1" },
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('beginsWith is not supported on number sort key "n"');
      }
    });
  });

  it("rejects a sort condition when the table has no sort key", () => {
    const table = defineTable({ tableName: "Flat", partitionKey: { name: "id" } });
    const flat = mustCompile(
      defineEntity({
        name: "Flat",
        fields: { id: "string" },
        table,
        partitionKey: "{id}",
      }),
    );
    const result = buildKeyCondition(flat, {
      partition: { id: "x" },
      sort: { op: "equals", params: {} },
    });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe('Entity "Flat" has no sort key');
  });
});
