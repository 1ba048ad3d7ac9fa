/**
 * Error types shared by the pattern compiler, the encoder and the
 * extraction tree.
 */

/** The stage that produced a {@link KeyError}. */
export type KeyErrorType = "parse" | "conversion" | "extraction" | "definition";

/** Machine-readable cause of a {@link KeyError}. */
export type KeyErrorCode =
  // parse
  | "EmptyPattern"
  | "EmptyFieldReference"
  | "InvalidFieldPath"
  | "UnbalancedBrace"
  // conversion
  | "MissingFloatFormat"
  | "MissingTemporalFormat"
  | "InvalidWidthSpec"
  | "InvalidFieldValue"
  // extraction
  | "FieldNotFound"
  | "IncompatibleBinaryValue"
  // definition
  | "UnknownField"
  | "UnknownIndex"
  | "InvalidDefinition"
  | "RegistrySealed"
  | "NotRegistered";

/** Error returned by every keyspec operation that can fail. */
export interface KeyError {
  readonly type: KeyErrorType;
  readonly code: KeyErrorCode;
  readonly message: string;
  /** Index into the pattern string, for parse errors. */
  readonly offset?: number | undefined;
  /** Field path involved, when there is one. */
  readonly path?: string | undefined;
  readonly cause?: unknown;
}

/** Creates a frozen KeyError. */
export const createKeyError = (
  type: KeyErrorType,
  code: KeyErrorCode,
  message: string,
  details?: {
    readonly offset?: number | undefined;
    readonly path?: string | undefined;
    readonly cause?: unknown;
  },
): KeyError =>
  Object.freeze({
    type,
    code,
    message,
    ...(details?.offset !== undefined ? { offset: details.offset } : {}),
    ...(details?.path !== undefined ? { path: details.path } : {}),
    ...(details?.cause !== undefined ? { cause: details.cause } : {}),
  });

/** Returns true when the error means a record lacks a referenced field. */
export const isFieldNotFound = (error: KeyError): boolean =>
  error.code === "FieldNotFound";
