/**
 * DynamoDB AttributeValue types.
 *
 * Defined locally so that the library has no runtime dependency on the
 * AWS SDK; the shapes match its low-level AttributeValue.
 */

/** A DynamoDB AttributeValue. */
export type AttributeValue =
  | { readonly S: string }
  | { readonly N: string }
  | { readonly B: Uint8Array }
  | { readonly SS: readonly string[] }
  | { readonly NS: readonly string[] }
  | { readonly BS: readonly Uint8Array[] }
  | { readonly L: readonly AttributeValue[] }
  | { readonly M: Readonly<Record<string, AttributeValue>> }
  | { readonly NULL: true }
  | { readonly BOOL: boolean };

/** A DynamoDB item: a record of attribute name to AttributeValue. */
export type AttributeMap = Readonly<Record<string, AttributeValue>>;

/** The value of a key attribute: string, number or binary. */
export type KeyAttributeValue =
  | { readonly S: string }
  | { readonly N: string }
  | { readonly B: Uint8Array };
