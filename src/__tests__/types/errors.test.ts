import { describe, it, expect } from "vitest";
import { createKeyError, isFieldNotFound } from "../../types/errors.js";

describe("createKeyError()", () => {
  it("leaves out details that are not given", () => {
    const error = createKeyError("definition", "NotRegistered", 'Entity "Order" is not registered');
    expect(error).toEqual({
      type: "definition",
      code: "NotRegistered",
      message: 'Entity "Order" is not registered',
    });
    expect(Object.keys(error)).toEqual(["type", "code", "message"]);
    expect(Object.isFrozen(error)).toBe(true);
  });

  it("keeps the offset, path and cause", () => {
    const cause = new RangeError("out of range");
    const error = createKeyError("parse", "InvalidFieldPath", "Invalid path", {
      offset: 4,
      path: "user..id",
      cause,
    });
    expect(error.offset).toBe(4);
    expect(error.path).toBe("user..id");
    expect(error.cause).toBe(cause);
  });
});

describe("isFieldNotFound()", () => {
  it("matches only missing-field errors", () => {
    expect(isFieldNotFound(createKeyError("extraction", "FieldNotFound", "missing"))).toBe(true);
    expect(isFieldNotFound(createKeyError("conversion", "InvalidFieldValue", "bad"))).toBe(false);
  });
});
