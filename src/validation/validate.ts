/**
 * Validates records against an entity's Standard Schema before keys are
 * derived from them.
 */

import { type Result, ok, err } from "../types/common.js";
import type { EntityDefinition } from "../types/entity.js";
import { type ValidationError, createValidationError } from "./errors.js";

/**
 * Runs a record through the entity's schema. Sync and async schemas are
 * both awaited; an entity without a schema passes the record through.
 *
 * @param entity - The entity the record belongs to
 * @param value - The record
 * @returns The schema output, or a ValidationError naming the entity
 *
 * @example
 * ```ts
 * const result = await validateRecord(orderEntity, { tenant: "" });
 * if (!result.success) {
 *   result.error.issues; // [{ path: "tenant", message: "..." }, ...]
 * }
 * ```
 */
export const validateRecord = async (
  entity: EntityDefinition,
  value: unknown,
): Promise<Result<unknown, ValidationError>> => {
  const schema = entity.schema;
  if (schema === undefined) return ok(value);

  const result = await schema["~standard"].validate(value);
  if (result.issues !== undefined) {
    return err(createValidationError(entity.name, result.issues));
  }
  return ok(result.value);
};
