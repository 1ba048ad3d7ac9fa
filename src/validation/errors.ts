/**
 * The error returned when a record fails its entity schema.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";

/** One schema issue, with the offending field as a dot path. */
export interface ValidationIssue {
  readonly message: string;
  readonly path?: string | undefined;
}

/** Returned by `deriveItem()` when the record does not match the schema. */
export interface ValidationError {
  readonly type: "validation";
  readonly entity: string;
  readonly message: string;
  readonly issues: readonly ValidationIssue[];
}

const segmentKey = (
  segment: PropertyKey | StandardSchemaV1.PathSegment,
): PropertyKey => (typeof segment === "object" ? segment.key : segment);

const toIssue = (issue: StandardSchemaV1.Issue): ValidationIssue =>
  Object.freeze(
    issue.path !== undefined && issue.path.length > 0
      ? {
          message: issue.message,
          path: issue.path.map((segment) => String(segmentKey(segment))).join("."),
        }
      : { message: issue.message },
  );

const describeIssue = (issue: ValidationIssue): string =>
  issue.path !== undefined ? `${issue.path}: ${issue.message}` : issue.message;

/**
 * Creates a frozen ValidationError for an entity.
 *
 * @example
 * ```ts
 * createValidationError("Order", [{ message: "Required", path: ["tenant"] }]).message;
 * // 'Entity "Order" record failed validation: tenant: Required'
 * ```
 */
export const createValidationError = (
  entity: string,
  issues: ReadonlyArray<StandardSchemaV1.Issue>,
): ValidationError => {
  const converted = issues.map(toIssue);
  return Object.freeze({
    type: "validation" as const,
    entity,
    message: `Entity "${entity}" record failed validation: ${converted.map(describeIssue).join("; ")}`,
    issues: Object.freeze(converted),
  });
};
