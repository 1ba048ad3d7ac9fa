import { describe, it, expect, expectTypeOf } from "vitest";
import { defineEntity } from "../../core/define-entity.js";
import type { EntityDefinition } from "../../types/entity.js";
import { mainTable, orderSchema } from "../fixtures.js";

describe("defineEntity()", () => {
  const entity = defineEntity({
    name: "Order",
    schema: orderSchema,
    fields: { tenant: "string", seq: "int64", status: "string" },
    table: mainTable,
    partitionKey: "TENANT#{tenant}",
    sortKey: "ORDER#{seq:%05d}",
    indexes: { byStatus: { partitionKey: "STATUS#{status}" } },
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(entity)).toBe(true);
  });

  it("stores the name, schema and table", () => {
    expect(entity.name).toBe("Order");
    expect(entity.schema).toBe(orderSchema);
    expect(entity.table).toBe(mainTable);
  });

  it("stores the key patterns", () => {
    expect(entity.partitionKey).toBe("TENANT#{tenant}");
    expect(entity.sortKey).toBe("ORDER#{seq:%05d}");
    expect(entity.indexes).toEqual({ byStatus: { partitionKey: "STATUS#{status}" } });
  });

  it("stores the field types", () => {
    expect(entity.fields).toEqual({ tenant: "string", seq: "int64", status: "string" });
  });

  it("leaves optional parts undefined", () => {
    const bare = defineEntity({
      name: "Marker",
      fields: {},
      table: mainTable,
      partitionKey: "MARKER",
    });
    expect(bare.schema).toBeUndefined();
    expect(bare.sortKey).toBeUndefined();
    expect(bare.indexes).toBeUndefined();
  });

  it("keeps pattern literal types", () => {
    expectTypeOf(entity.partitionKey).toEqualTypeOf<"TENANT#{tenant}">();
    expectTypeOf(entity.sortKey).toEqualTypeOf<"ORDER#{seq:%05d}" | undefined>();
  });

  it("accepts inline definitions passed where any entity is expected", () => {
    const names: string[] = [];
    const accept = (defined: EntityDefinition): void => {
      names.push(defined.name);
    };

    accept(
      defineEntity({
        name: "Session",
        fields: { user: "string", startedAt: "time" },
        table: mainTable,
        partitionKey: "USER#{user}",
        sortKey: "SESSION#{startedAt:utc:unixnano:%020d}",
      }),
    );
    accept(
      defineEntity({
        name: "Order",
        schema: orderSchema,
        fields: { tenant: "string", seq: "int64" },
        table: mainTable,
        partitionKey: "TENANT#{tenant}",
        sortKey: "ORDER#{seq:%05d}",
      }),
    );

    expect(names).toEqual(["Session", "Order"]);
  });
});
