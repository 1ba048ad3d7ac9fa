import { describe, it, expect } from "vitest";
import {
  isFloatType,
  isIntegerType,
  isSignedIntegerType,
  isTemporalType,
  isTextType,
} from "../../keys/semantic-types.js";

describe("semantic type classifiers", () => {
  it("classifies integers by signedness", () => {
    expect(isIntegerType("int32")).toBe(true);
    expect(isIntegerType("uint64")).toBe(true);
    expect(isSignedIntegerType("int8")).toBe(true);
    expect(isSignedIntegerType("uint8")).toBe(false);
  });

  it("classifies floats, date-times and text", () => {
    expect(isFloatType("float32")).toBe(true);
    expect(isFloatType("int")).toBe(false);
    expect(isTemporalType("date")).toBe(true);
    expect(isTemporalType("time")).toBe(true);
    expect(isTextType("string")).toBe(true);
  });

  it("leaves unknown names unclassified", () => {
    for (const check of [isIntegerType, isFloatType, isTemporalType, isTextType]) {
      expect(check("bytes")).toBe(false);
    }
  });
});
