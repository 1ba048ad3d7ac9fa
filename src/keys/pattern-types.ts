/**
 * Type-level pattern parsing.
 *
 * These types let `defineEntity()` reject, at compile time, key patterns
 * that reference fields the entity does not declare.
 */

/**
 * Strips modifiers and the width spec from the inside of a reference.
 * `"createdAt:utc:unixnano"` becomes `"createdAt"`.
 */
export type ReferencePath<Ref extends string> =
  Ref extends `${infer Path}:${string}` ? Path : Ref;

/**
 * Returns the first component of a dot path.
 * `"user.id"` becomes `"user"`.
 */
export type RootField<Path extends string> =
  Path extends `${infer Root}.${string}` ? Root : Path;

/**
 * Extracts the field paths referenced by a pattern as a union.
 *
 * @example
 * ```ts
 * type R = ParsePatternFields<"ORDER#{tenant}#{createdAt:utc:unixnano:%020d}">;
 * //   ^? "tenant" | "createdAt"
 *
 * type C = ParsePatternFields<"PROFILE">;
 * //   ^? never
 * ```
 */
export type ParsePatternFields<T extends string> =
  T extends `${string}{${infer Ref}}${infer Rest}`
    ? ReferencePath<Ref> | ParsePatternFields<Rest>
    : never;

/**
 * Resolves to `true` when every field path referenced by `Pattern` is in
 * `Known`, or to the missing paths otherwise.
 */
export type ValidatePatternFields<
  Pattern extends string,
  Known extends string,
> = [Exclude<ParsePatternFields<Pattern>, Known>] extends [never]
  ? true
  : Exclude<ParsePatternFields<Pattern>, Known>;
