/**
 * keyspec: sortable composite DynamoDB keys from typed record fields.
 *
 * Patterns such as `"ORDER#{tenant}#{createdAt:utc:unixnano:%020d}"` are
 * compiled once per entity into conversions, sortability warnings and
 * extraction trees, then used to build, read and query keys.
 *
 * @example
 * ```ts
 * import { defineTable, defineEntity, createIndexRegistry, formatDiagnostic } from "keyspec";
 *
 * const table = defineTable({
 *   tableName: "MainTable",
 *   partitionKey: { name: "pk" },
 *   sortKey: { name: "sk" },
 * });
 *
 * const orderEntity = defineEntity({
 *   name: "Order",
 *   fields: { tenant: "string", createdAt: "time" },
 *   table,
 *   partitionKey: "TENANT#{tenant}",
 *   sortKey: "ORDER#{createdAt:utc:unixnano:%020d}",
 * });
 *
 * const registry = createIndexRegistry({
 *   onDiagnostic: (d) => console.warn(formatDiagnostic(d)),
 * });
 * const orders = registry.register(orderEntity);
 * registry.seal();
 * ```
 */

// Definitions
export { defineTable } from "./core/define-table.js";
export { defineEntity } from "./core/define-entity.js";
export type {
  TableConfig,
  TableDefinition,
  IndexDefinition,
  IndexType,
  KeyAttribute,
  KeyAttributeType,
  ResolvedKeyAttribute,
  ResolvedIndexDefinition,
} from "./types/table.js";
export type {
  EntityConfig,
  EntityDefinition,
  EntityIndexKeys,
  EntityIndexPatterns,
  EntityKeyFields,
  InferEntityType,
} from "./types/entity.js";

// Compilation and registry
export { compileEntity, compileKey, findSecondaryIndex } from "./core/compile-index.js";
export type {
  CompiledIndex,
  CompiledKey,
  CompiledKeyPair,
  CompiledPart,
  CompiledSecondaryIndex,
  KeyCapabilities,
} from "./core/compile-index.js";
export { createIndexRegistry } from "./core/registry.js";
export type { IndexRegistry, IndexRegistryOptions } from "./core/registry.js";

// Patterns
export { parsePattern } from "./keys/pattern-parser.js";
export type {
  PatternSpec,
  PatternSegment,
  LiteralSegment,
  FieldRefSegment,
} from "./keys/pattern-parser.js";
export {
  UTC_MODIFIER,
  fieldPath,
  fieldPaths,
  fieldRefs,
  hasModifier,
  hasZeroPadding,
  isConstant,
  leadingLiteralPrefix,
  parameterName,
  primaryFormat,
} from "./keys/field-ref.js";
export type {
  ParsePatternFields,
  ReferencePath,
  RootField,
  ValidatePatternFields,
} from "./keys/pattern-types.js";

// Semantic types and conversion
export {
  isFloatType,
  isIntegerType,
  isSignedIntegerType,
  isTemporalType,
  isTextType,
} from "./keys/semantic-types.js";
export type {
  FieldTypes,
  FloatType,
  SemanticType,
  SignedIntegerType,
  TemporalType,
  UnsignedIntegerType,
} from "./keys/semantic-types.js";
export { convertFieldRef, fieldSource, paramSource } from "./keys/conversion.js";
export type {
  ConversionDescriptor,
  ConversionExpression,
  ValueSource,
} from "./keys/conversion.js";

// Encoding
export { evaluateExpression, findSource } from "./keys/encoder.js";
export type { SourceResolver } from "./keys/encoder.js";
export { formatPrintf, parsePrintfSpec, sprintf } from "./keys/printf.js";
export type { PrintfDirective, PrintfVerb } from "./keys/printf.js";
export {
  EPOCH_UNITS,
  NAMED_LAYOUTS,
  createTimestamp,
  epochValue,
  formatTimestamp,
  timestampFromDate,
  toTimestamp,
  toUtc,
} from "./keys/time-format.js";
export type {
  EpochUnit,
  NamedLayout,
  TemporalValue,
  Timestamp,
} from "./keys/time-format.js";

// Sortability
export {
  checkPatternSortSafety,
  checkSortSafety,
  formatDiagnostic,
} from "./keys/sortability.js";
export type {
  SortabilityCondition,
  SortabilityDiagnostic,
} from "./keys/sortability.js";

// Keys
export {
  buildKeyFromParams,
  buildKeyValue,
  buildPrimaryKey,
  buildSecondaryKeys,
  deriveItem,
} from "./keys/key-builder.js";
export type { KeyRecord } from "./keys/key-builder.js";
export { applyExtractor, buildExtractor } from "./keys/key-extractor.js";
export type { ExtractionNode, KeyExtractor } from "./keys/key-extractor.js";
export { buildKeyCondition } from "./keys/key-condition.js";
export type {
  KeyCondition,
  KeyConditionInput,
  SortKeyComparison,
  SortKeyCondition,
} from "./keys/key-condition.js";
export {
  extractAllKeys,
  extractPrimaryKey,
  extractSecondaryKeys,
} from "./index-keys/index-keys.js";
export type { KeyAttributes } from "./index-keys/index-keys.js";

// Result type and errors
export {
  type Result,
  ok,
  err,
  mapResult,
  flatMapResult,
  collectResults,
} from "./types/common.js";
export { createKeyError, isFieldNotFound } from "./types/errors.js";
export type { KeyError, KeyErrorCode, KeyErrorType } from "./types/errors.js";

// Validation
export { validateRecord } from "./validation/validate.js";
export type { ValidationError, ValidationIssue } from "./validation/errors.js";

// Marshalling
export { marshallItem, marshallValue } from "./marshalling/marshall.js";
export type {
  AttributeValue,
  AttributeMap,
  KeyAttributeValue,
} from "./marshalling/types.js";
