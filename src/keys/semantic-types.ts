/**
 * Semantic field types handed to the compiler by a schema provider.
 */

/** Signed integer type names. */
export type SignedIntegerType = "int" | "int8" | "int16" | "int32" | "int64";

/** Unsigned integer type names. */
export type UnsignedIntegerType =
  | "uint"
  | "uint8"
  | "uint16"
  | "uint32"
  | "uint64";

/** Floating point type names. */
export type FloatType = "float32" | "float64";

/** Date-time type names. */
export type TemporalType = "time" | "date";

/**
 * A semantic type name. Names outside the known set are accepted and
 * encoded with a best-effort string conversion.
 */
export type SemanticType =
  | "string"
  | SignedIntegerType
  | UnsignedIntegerType
  | FloatType
  | TemporalType
  | (string & {});

/** Mapping from field path (dot notation) to semantic type. */
export type FieldTypes = Readonly<Record<string, SemanticType>>;

const SIGNED: ReadonlySet<string> = new Set<SignedIntegerType>([
  "int",
  "int8",
  "int16",
  "int32",
  "int64",
]);

const UNSIGNED: ReadonlySet<string> = new Set<UnsignedIntegerType>([
  "uint",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
]);

export const isTextType = (type: SemanticType): boolean => type === "string";

export const isSignedIntegerType = (type: SemanticType): boolean =>
  SIGNED.has(type);

export const isIntegerType = (type: SemanticType): boolean =>
  SIGNED.has(type) || UNSIGNED.has(type);

export const isFloatType = (type: SemanticType): boolean =>
  type === "float32" || type === "float64";

export const isTemporalType = (type: SemanticType): boolean =>
  type === "time" || type === "date";
