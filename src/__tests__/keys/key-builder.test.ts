import { describe, it, expect } from "vitest";
import { defineTable } from "../../core/define-table.js";
import { defineEntity } from "../../core/define-entity.js";
import {
  buildKeyFromParams,
  buildKeyValue,
  buildPrimaryKey,
  buildSecondaryKeys,
  deriveItem,
} from "../../keys/key-builder.js";
import { createTimestamp } from "../../keys/time-format.js";
import { eventEntity, mustCompile, orderEntity, widgetEntity } from "../fixtures.js";

const orders = mustCompile(orderEntity);
const events = mustCompile(eventEntity);
const widgets = mustCompile(widgetEntity);

describe("buildKeyValue()", () => {
  it("encodes the sort key of a record", () => {
    const sortKey = orders.primary.sortKey;
    expect(sortKey).toBeDefined();
    if (sortKey !== undefined) {
      expect(buildKeyValue(sortKey, { seq: 42 })).toEqual({
        success: true,
        data: { S: "ORDER#00042" },
      });
    }
  });

  it("reads nested fields by full path", () => {
    const [byCustomer] = orders.secondary;
    expect(byCustomer).toBeDefined();
    if (byCustomer !== undefined) {
      expect(buildKeyValue(byCustomer.partitionKey, { customer: { id: "c-1" } })).toEqual({
        success: true,
        data: { S: "CUSTOMER#c-1" },
      });
    }
  });

  it("treats null as absent", () => {
    const result = buildKeyValue(orders.primary.partitionKey, { tenant: null });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("FieldNotFound");
      expect(result.error.message).toBe('Missing required key field "tenant"');
    }
  });

  it("names the missing component of a nested path", () => {
    const [byCustomer] = orders.secondary;
    if (byCustomer === undefined) throw new Error("byCustomer not compiled");
    const result = buildKeyValue(byCustomer.partitionKey, {});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Missing required key field "customer"');
      expect(result.error.path).toBe("customer.id");
    }
  });

  it("writes number and binary key attributes", () => {
    const table = defineTable({
      tableName: "Blobs",
      partitionKey: { name: "id", type: "B" },
      sortKey: { name: "version", type: "N" },
    });
    const blobs = mustCompile(
      defineEntity({
        name: "Blob",
        fields: { owner: "string", version: "uint32" },
        table,
        partitionKey: "OWNER#{owner}",
        sortKey: "{version}",
      }),
    );
    expect(buildPrimaryKey(blobs, { owner: "ab", version: 3 })).toEqual({
      success: true,
      data: {
        id: { B: new TextEncoder().encode("OWNER#ab") },
        version: { N: "3" },
      },
    });
  });
});

describe("buildKeyFromParams()", () => {
  it("reads inputs by parameter name", () => {
    const [byCustomer] = orders.secondary;
    if (byCustomer === undefined) throw new Error("byCustomer not compiled");
    expect(buildKeyFromParams(byCustomer.partitionKey, { id: "c-1" })).toEqual({
      success: true,
      data: { S: "CUSTOMER#c-1" },
    });
  });

  it("encodes date-time inputs", () => {
    const sortKey = events.primary.sortKey;
    if (sortKey === undefined) throw new Error("Event has no sort key");
    const result = buildKeyFromParams(sortKey, {
      at: createTimestamp(1_700_000_000_120_000_000n, 60),
      count: 3,
    });
    expect(result).toEqual({ success: true, data: { S: "AT#01700000000120000000#3" } });
  });

  it("reports a missing input", () => {
    const sortKey = events.primary.sortKey;
    if (sortKey === undefined) throw new Error("Event has no sort key");
    const result = buildKeyFromParams(sortKey, { at: new Date(0) });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe("FieldNotFound");
  });
});

describe("buildPrimaryKey()", () => {
  it("builds both key attributes", () => {
    expect(buildPrimaryKey(orders, { tenant: "acme", seq: 42 })).toEqual({
      success: true,
      data: { pk: { S: "TENANT#acme" }, sk: { S: "ORDER#00042" } },
    });
  });

  it("fails on a value that does not fit its encoding", () => {
    const result = buildPrimaryKey(orders, { tenant: "acme", seq: "42" });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe("InvalidFieldValue");
  });
});

describe("buildSecondaryKeys()", () => {
  it("skips indexes whose fields are absent", () => {
    const result = buildSecondaryKeys(orders, {
      tenant: "acme",
      seq: 42,
      customer: { id: "c-1" },
    });
    expect(result).toEqual({
      success: true,
      data: { gsi1pk: { S: "CUSTOMER#c-1" }, gsi1sk: { S: "ORDER#00042" } },
    });
  });

  it("builds every index the record takes part in", () => {
    const result = buildSecondaryKeys(orders, {
      tenant: "acme",
      seq: 7,
      customer: { id: "c-1" },
      status: "open",
    });
    expect(result).toEqual({
      success: true,
      data: {
        gsi1pk: { S: "CUSTOMER#c-1" },
        gsi1sk: { S: "ORDER#00007" },
        gsi2pk: { S: "STATUS#open" },
      },
    });
  });

  it("skips an index whose field is named like an inherited property", () => {
    expect(buildSecondaryKeys(widgets, { id: "w-1" })).toEqual({ success: true, data: {} });
    expect(buildSecondaryKeys(widgets, { id: "w-1", constructor: "gear" })).toEqual({
      success: true,
      data: { gsi2pk: { S: "KIND#gear" } },
    });
  });

  it("fails on errors other than a missing field", () => {
    const result = buildSecondaryKeys(orders, { customer: { id: "c-1" }, seq: 1.5 });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe("InvalidFieldValue");
  });
});

describe("deriveItem()", () => {
  it("merges marshalled attributes with every applicable key", async () => {
    const result = await deriveItem(orders, { tenant: "acme", seq: 42, status: "open" });
    expect(result).toEqual({
      success: true,
      data: {
        tenant: { S: "acme" },
        seq: { N: "42" },
        status: { S: "open" },
        gsi2pk: { S: "STATUS#open" },
        pk: { S: "TENANT#acme" },
        sk: { S: "ORDER#00042" },
      },
    });
  });

  it("validates the record against the entity schema", async () => {
    const result = await deriveItem(orders, { tenant: "", seq: 1 });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.type).toBe("validation");
  });

  it("derives keys without a schema", async () => {
    const result = await deriveItem(events, {
      stream: "s1",
      at: new Date(1_700_000_000_120),
      count: 3,
    });
    expect(result).toEqual({
      success: true,
      data: {
        stream: { S: "s1" },
        at: { S: "2023-11-14T22:13:20.120Z" },
        count: { N: "3" },
        pk: { S: "STREAM#s1" },
        sk: { S: "AT#01700000000120000000#3" },
      },
    });
  });

  it("overwrites stale key attributes in the record", async () => {
    const result = await deriveItem(events, {
      stream: "s1",
      at: new Date(0),
      count: 0,
      pk: "stale",
    });
    expect(result.success).toBe(true);
    if (result.success) expect(result.data["pk"]).toEqual({ S: "STREAM#s1" });
  });

  it("rejects a record that is not an object", async () => {
    const result = await deriveItem(events, "s1");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Entity "Event" records must be plain objects');
    }
  });
});
