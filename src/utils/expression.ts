/**
 * Names and placeholders for DynamoDB expressions.
 */

/**
 * Creates an ExpressionAttributeNames alias.
 *
 * @example
 * aliasAttributeName("pk") // "#pk"
 */
export const aliasAttributeName = (name: string): string => `#${name}`;

/**
 * Creates an ExpressionAttributeValues placeholder.
 *
 * @example
 * valuePlaceholder("skLo") // ":skLo"
 */
export const valuePlaceholder = (name: string): string => `:${name}`;
