/**
 * Compiles an entity's key patterns into the structures the rest of the
 * library works from: per-reference conversions, sortability diagnostics
 * and extraction trees.
 */

import { type Result, ok, err, collectResults } from "../types/common.js";
import { type KeyError, createKeyError } from "../types/errors.js";
import type { EntityDefinition, EntityIndexPatterns } from "../types/entity.js";
import type {
  IndexType,
  ResolvedIndexDefinition,
  ResolvedKeyAttribute,
} from "../types/table.js";
import { type FieldRefSegment, type PatternSpec, parsePattern } from "../keys/pattern-parser.js";
import {
  fieldRefs,
  isConstant,
  leadingLiteralPrefix,
  parameterName,
} from "../keys/field-ref.js";
import type { FieldTypes, SemanticType } from "../keys/semantic-types.js";
import {
  type ConversionDescriptor,
  convertFieldRef,
  fieldSource,
  paramSource,
} from "../keys/conversion.js";
import {
  type SortabilityDiagnostic,
  checkPatternSortSafety,
} from "../keys/sortability.js";
import { type KeyExtractor, buildExtractor } from "../keys/key-extractor.js";
import { isBase64 } from "../keys/key-value.js";

/** One field reference with its two conversions. */
export interface CompiledPart {
  readonly ref: FieldRefSegment;
  readonly semanticType: SemanticType;
  /** Conversion for callers holding a named input. */
  readonly param: ConversionDescriptor;
  /** Conversion for callers holding a whole record. */
  readonly field: ConversionDescriptor;
}

/** Support an encoder of the key needs, across all of its references. */
export interface KeyCapabilities {
  readonly requiresNumericLibrary: boolean;
  readonly requiresTemporalLibrary: boolean;
  readonly requiresFormatter: boolean;
}

/** A pattern bound to the key attribute it produces. */
export interface CompiledKey {
  readonly attribute: ResolvedKeyAttribute;
  readonly spec: PatternSpec;
  readonly isConstant: boolean;
  /** Literal text before the first reference; used for `beginsWith` queries. */
  readonly literalPrefix: string;
  /** Parameter names in pattern order. */
  readonly params: readonly string[];
  readonly parts: readonly CompiledPart[];
  readonly capabilities: KeyCapabilities;
  /** Sortability warnings; always empty for partition keys. */
  readonly diagnostics: readonly SortabilityDiagnostic[];
  readonly extractor: KeyExtractor;
}

export interface CompiledKeyPair {
  readonly partitionKey: CompiledKey;
  readonly sortKey: CompiledKey | undefined;
}

export interface CompiledSecondaryIndex extends CompiledKeyPair {
  /** The index's key in the table definition's `indexes`. */
  readonly name: string;
  /** The index name the storage layer knows it by. */
  readonly indexName: string;
  readonly type: IndexType;
}

/** Everything compiled for one entity. */
export interface CompiledIndex {
  readonly entity: EntityDefinition;
  readonly name: string;
  readonly tableName: string;
  readonly primary: CompiledKeyPair;
  readonly secondary: readonly CompiledSecondaryIndex[];
  /** All sortability diagnostics, primary first, then by index. */
  readonly diagnostics: readonly SortabilityDiagnostic[];
}

type KeyPosition = "partition" | "sort";

const definitionError = (
  code: "UnknownField" | "UnknownIndex" | "InvalidDefinition",
  message: string,
  details?: { readonly path?: string; readonly cause?: unknown },
): KeyError => createKeyError("definition", code, message, details);

const compilePart = (
  entityName: string,
  ref: FieldRefSegment,
  fields: FieldTypes,
): Result<CompiledPart, KeyError> => {
  const semanticType = Object.hasOwn(fields, ref.path) ? fields[ref.path] : undefined;
  if (semanticType === undefined) {
    return err(
      definitionError(
        "UnknownField",
        `Entity "${entityName}" references field "${ref.path}" with no declared type`,
        { path: ref.path },
      ),
    );
  }

  const param = convertFieldRef(ref, semanticType, paramSource(ref));
  if (!param.success) return param;
  const field = convertFieldRef(ref, semanticType, fieldSource(ref));
  if (!field.success) return field;

  return ok(Object.freeze({ ref, semanticType, param: param.data, field: field.data }));
};

const capabilitiesOf = (parts: readonly CompiledPart[]): KeyCapabilities => {
  const descriptors = parts.flatMap((part) => [part.param, part.field]);
  return Object.freeze({
    requiresNumericLibrary: descriptors.some((d) => d.requiresNumericLibrary),
    requiresTemporalLibrary: descriptors.some((d) => d.requiresTemporalLibrary),
    requiresFormatter: descriptors.some((d) => d.requiresFormatter),
  });
};

/**
 * Compiles one key pattern.
 *
 * @param entityName - Used in diagnostics and error messages
 * @param attribute - The key attribute the pattern produces
 * @param pattern - The raw pattern
 * @param fields - The entity's field-type table
 * @param position - Sortability is only checked in sort-key position
 */
export const compileKey = (
  entityName: string,
  attribute: ResolvedKeyAttribute,
  pattern: string,
  fields: FieldTypes,
  position: KeyPosition,
): Result<CompiledKey, KeyError> => {
  const parsed = parsePattern(pattern, attribute.type);
  if (!parsed.success) return parsed;
  const spec = parsed.data;
  const refs = fieldRefs(spec);

  if (attribute.type === "B" && isConstant(spec) && !isBase64(spec.raw)) {
    return err(
      definitionError(
        "InvalidDefinition",
        `Entity "${entityName}" binary key "${attribute.name}" has constant pattern "${pattern}", which is not valid base64`,
      ),
    );
  }

  const parts = collectResults(refs.map((ref) => compilePart(entityName, ref, fields)));
  if (!parts.success) return parts;

  return ok(
    Object.freeze({
      attribute,
      spec,
      isConstant: isConstant(spec),
      literalPrefix: leadingLiteralPrefix(spec),
      params: Object.freeze(refs.map(parameterName)),
      parts: parts.data,
      capabilities: capabilitiesOf(parts.data),
      diagnostics:
        position === "sort"
          ? checkPatternSortSafety(spec, fields, entityName)
          : Object.freeze([]),
      extractor: buildExtractor(spec),
    }),
  );
};

const compileKeyPair = (
  entity: EntityDefinition,
  label: string,
  partitionAttribute: ResolvedKeyAttribute,
  sortAttribute: ResolvedKeyAttribute | undefined,
  patterns: EntityIndexPatterns,
): Result<CompiledKeyPair, KeyError> => {
  if (sortAttribute === undefined && patterns.sortKey !== undefined) {
    return err(
      definitionError(
        "InvalidDefinition",
        `Entity "${entity.name}" sets a sort key for ${label}, which has no sort key attribute`,
      ),
    );
  }
  if (sortAttribute !== undefined && patterns.sortKey === undefined) {
    return err(
      definitionError(
        "InvalidDefinition",
        `Entity "${entity.name}" needs a sort key pattern for ${label} ("${sortAttribute.name}")`,
      ),
    );
  }

  const partitionKey = compileKey(
    entity.name,
    partitionAttribute,
    patterns.partitionKey,
    entity.fields,
    "partition",
  );
  if (!partitionKey.success) return partitionKey;

  if (sortAttribute === undefined || patterns.sortKey === undefined) {
    return ok(Object.freeze({ partitionKey: partitionKey.data, sortKey: undefined }));
  }

  const sortKey = compileKey(
    entity.name,
    sortAttribute,
    patterns.sortKey,
    entity.fields,
    "sort",
  );
  if (!sortKey.success) return sortKey;

  return ok(Object.freeze({ partitionKey: partitionKey.data, sortKey: sortKey.data }));
};

const compileSecondary = (
  entity: EntityDefinition,
  name: string,
  patterns: EntityIndexPatterns,
): Result<CompiledSecondaryIndex, KeyError> => {
  const index: ResolvedIndexDefinition | undefined = Object.hasOwn(entity.table.indexes, name)
    ? entity.table.indexes[name]
    : undefined;
  if (index === undefined) {
    return err(
      definitionError(
        "UnknownIndex",
        `Entity "${entity.name}" binds index "${name}", which table "${entity.table.tableName}" does not define`,
      ),
    );
  }

  const pair = compileKeyPair(
    entity,
    `index "${name}"`,
    index.partitionKey,
    index.sortKey,
    patterns,
  );
  if (!pair.success) return pair;

  return ok(
    Object.freeze({
      ...pair.data,
      name,
      indexName: index.indexName,
      type: index.type,
    }),
  );
};

const diagnosticsOf = (pair: CompiledKeyPair): readonly SortabilityDiagnostic[] =>
  pair.sortKey?.diagnostics ?? [];

/**
 * Compiles an entity's primary key and every secondary index it binds.
 *
 * Fails on the first error; nothing partial is returned.
 *
 * @param entity - An entity created by `defineEntity()`
 * @returns The compiled index, or a parse, conversion or definition error
 *
 * @example
 * ```ts
 * const compiled = compileEntity(orderEntity);
 * if (compiled.success) {
 *   compiled.data.primary.sortKey?.literalPrefix; // "ORDER#"
 * }
 * ```
 */
export const compileEntity = (
  entity: EntityDefinition,
): Result<CompiledIndex, KeyError> => {
  const primary = compileKeyPair(
    entity,
    `table "${entity.table.tableName}"`,
    entity.table.partitionKey,
    entity.table.sortKey,
    { partitionKey: entity.partitionKey, sortKey: entity.sortKey },
  );
  if (!primary.success) return primary;

  const secondary: CompiledSecondaryIndex[] = [];
  for (const [name, patterns] of Object.entries<EntityIndexPatterns | undefined>(
    entity.indexes ?? {},
  )) {
    if (patterns === undefined) continue;
    const compiled = compileSecondary(entity, name, patterns);
    if (!compiled.success) return compiled;
    secondary.push(compiled.data);
  }

  return ok(
    Object.freeze({
      entity,
      name: entity.name,
      tableName: entity.table.tableName,
      primary: primary.data,
      secondary: Object.freeze(secondary),
      diagnostics: Object.freeze([
        ...diagnosticsOf(primary.data),
        ...secondary.flatMap(diagnosticsOf),
      ]),
    }),
  );
};

/** Finds a compiled secondary index by its table key or storage name. */
export const findSecondaryIndex = (
  index: CompiledIndex,
  name: string,
): Result<CompiledSecondaryIndex, KeyError> => {
  const found = index.secondary.find(
    (candidate) => candidate.name === name || candidate.indexName === name,
  );
  if (found === undefined) {
    return err(
      definitionError(
        "UnknownIndex",
        `Entity "${index.name}" does not take part in index "${name}"`,
      ),
    );
  }
  return ok(found);
};
