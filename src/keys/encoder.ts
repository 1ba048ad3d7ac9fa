/**
 * Evaluates conversion expressions against runtime values.
 */

import { type Result, ok, err } from "../types/common.js";
import { type KeyError, createKeyError } from "../types/errors.js";
import type { ConversionExpression, ValueSource } from "./conversion.js";
import { sprintf } from "./printf.js";
import {
  type Timestamp,
  epochValue,
  formatTimestamp,
  toTimestamp,
  toUtc,
} from "./time-format.js";

/**
 * Supplies the raw value of a {@link ValueSource}. Returns a
 * `FieldNotFound` error when the value is absent.
 */
export type SourceResolver = (source: ValueSource) => Result<unknown, KeyError>;

const invalidValue = (message: string): KeyError =>
  createKeyError("conversion", "InvalidFieldValue", message);

const describeSource = (source: ValueSource): string =>
  source.kind === "param" ? source.name : source.path.join(".");

/** Best-effort text for values without a dedicated encoding. */
const stringify = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return new TextDecoder().decode(value);
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v,
    );
  }
  return String(value);
};

const toDecimal = (value: unknown): Result<string, KeyError> => {
  if (typeof value === "bigint") return ok(value.toString());
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return ok(String(value));
  }
  return err(invalidValue(`Expected an integer, got ${typeof value} ${String(value)}`));
};

const evaluateValue = (
  expression: ConversionExpression,
  resolve: SourceResolver,
): Result<unknown, KeyError> => {
  switch (expression.kind) {
    case "source":
      return resolve(expression.source);

    case "utc": {
      const time = evaluateTime(expression.operand, resolve);
      return time.success ? ok(toUtc(time.data)) : time;
    }

    case "epoch": {
      const time = evaluateTime(expression.operand, resolve);
      return time.success ? ok(epochValue(time.data, expression.unit)) : time;
    }

    case "printf": {
      const value = evaluateValue(expression.operand, resolve);
      return value.success ? sprintf(expression.spec, value.data) : value;
    }

    case "decimal": {
      const value = evaluateValue(expression.operand, resolve);
      return value.success ? toDecimal(value.data) : value;
    }

    case "timestamp": {
      const time = evaluateTime(expression.operand, resolve);
      return time.success ? formatTimestamp(time.data, expression.layout) : time;
    }

    case "stringify": {
      const value = evaluateValue(expression.operand, resolve);
      return value.success ? ok(stringify(value.data)) : value;
    }
  }
};

const evaluateTime = (
  expression: ConversionExpression,
  resolve: SourceResolver,
): Result<Timestamp, KeyError> => {
  const value = evaluateValue(expression, resolve);
  return value.success ? toTimestamp(value.data) : value;
};

/**
 * Evaluates a conversion expression to its key text.
 *
 * @param expression - An expression produced by `convertFieldRef()`
 * @param resolve - Supplies raw values for the expression's source
 * @returns The encoded text, `FieldNotFound` from the resolver, or
 *   `InvalidFieldValue` when a value does not fit its encoding
 */
export const evaluateExpression = (
  expression: ConversionExpression,
  resolve: SourceResolver,
): Result<string, KeyError> => {
  const value = evaluateValue(expression, resolve);
  if (!value.success) return value;
  if (typeof value.data !== "string") {
    const source = findSource(expression);
    return err(
      invalidValue(
        `Expected a string for "${describeSource(source)}", got ${typeof value.data}`,
      ),
    );
  }
  return ok(value.data);
};

/** Returns the value source at the leaf of an expression. */
export const findSource = (expression: ConversionExpression): ValueSource =>
  expression.kind === "source" ? expression.source : findSource(expression.operand);
