import { describe, it, expect } from "vitest";
import { convertFieldRef, fieldSource, paramSource } from "../../keys/conversion.js";
import { refOf } from "../fixtures.js";

const source = (name: string) => ({ kind: "source", source: { kind: "param", name } });

describe("paramSource() / fieldSource()", () => {
  it("names a param after the last path component", () => {
    expect(paramSource(refOf("{user.id}"))).toEqual({ kind: "param", name: "id" });
  });

  it("keeps the full path for a field source", () => {
    expect(fieldSource(refOf("{user.id}"))).toEqual({ kind: "field", path: ["user", "id"] });
  });
});

describe("convertFieldRef()", () => {
  const convert = (raw: string, type: string) => {
    const ref = refOf(raw);
    return convertFieldRef(ref, type, paramSource(ref));
  };

  describe("text", () => {
    it("passes strings through", () => {
      const result = convert("{name}", "string");
      expect(result).toEqual({
        success: true,
        data: {
          expression: source("name"),
          requiresNumericLibrary: false,
          requiresTemporalLibrary: false,
          requiresFormatter: false,
        },
      });
    });

    it("applies a width spec", () => {
      const result = convert("{name:%-8s}", "string");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.expression).toEqual({
          kind: "printf",
          spec: "%-8s",
          operand: source("name"),
        });
        expect(result.data.requiresFormatter).toBe(true);
      }
    });
  });

  describe("integers", () => {
    it("uses canonical decimal without a width spec", () => {
      const result = convert("{seq}", "int64");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.expression).toEqual({ kind: "decimal", operand: source("seq") });
        expect(result.data.requiresNumericLibrary).toBe(true);
        expect(result.data.requiresFormatter).toBe(false);
      }
    });

    it("formats with the width spec", () => {
      const result = convert("{seq:%020d}", "uint32");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.expression).toEqual({
          kind: "printf",
          spec: "%020d",
          operand: source("seq"),
        });
        expect(result.data.requiresNumericLibrary).toBe(false);
      }
    });

    it("reports an invalid width spec with the field path", () => {
      const result = convert("{seq:%q}", "int");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("InvalidWidthSpec");
        expect(result.error.path).toBe("seq");
      }
    });
  });

  describe("floats", () => {
    it("requires an explicit format", () => {
      const result = convert("{price}", "float64");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("MissingFloatFormat");
        expect(result.error.type).toBe("conversion");
      }
    });

    it("formats with the given spec", () => {
      const result = convert("{price:%012.2f}", "float32");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.expression).toEqual({
          kind: "printf",
          spec: "%012.2f",
          operand: source("price"),
        });
      }
    });
  });

  describe("date-times", () => {
    it("requires an explicit format", () => {
      const result = convert("{at}", "time");
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe("MissingTemporalFormat");
    });

    it("does not accept utc alone as a format", () => {
      const result = convert("{at:utc}", "time");
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe("MissingTemporalFormat");
    });

    it("chains utc, epoch and printf", () => {
      const result = convert("{at:utc:unixnano:%020d}", "time");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.expression).toEqual({
          kind: "printf",
          spec: "%020d",
          operand: {
            kind: "epoch",
            unit: "unixnano",
            operand: { kind: "utc", operand: source("at") },
          },
        });
      }
    });

    it("uses canonical decimal for an unpadded epoch", () => {
      const result = convert("{at:unix}", "date");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.expression).toEqual({
          kind: "decimal",
          operand: { kind: "epoch", unit: "unix", operand: source("at") },
        });
      }
    });

    it("formats named and custom layouts", () => {
      const named = convert("{at:utc:rfc3339fixed}", "time");
      expect(named.success).toBe(true);
      if (named.success) {
        expect(named.data.expression).toEqual({
          kind: "timestamp",
          layout: "rfc3339fixed",
          operand: { kind: "utc", operand: source("at") },
        });
        expect(named.data.requiresTemporalLibrary).toBe(true);
      }

      const custom = convert("{at:yyyy-MM-dd}", "date");
      expect(custom.success).toBe(true);
      if (custom.success) {
        expect(custom.data.expression).toEqual({
          kind: "timestamp",
          layout: "yyyy-MM-dd",
          operand: source("at"),
        });
      }
    });
  });

  it("stringifies unknown types", () => {
    const result = convert("{active}", "bool");
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.expression).toEqual({ kind: "stringify", operand: source("active") });
      expect(result.data.requiresFormatter).toBe(true);
    }
  });

  it("builds a field-source leaf for the full path", () => {
    const ref = refOf("{user.id}");
    const result = convertFieldRef(ref, "string", fieldSource(ref));
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.expression).toEqual({
        kind: "source",
        source: { kind: "field", path: ["user", "id"] },
      });
    }
  });
});
