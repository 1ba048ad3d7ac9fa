/**
 * An explicit registry of compiled entities.
 *
 * Registration is single-writer and expected during startup; once `seal()`
 * is called the registry is immutable and safe to read from anywhere.
 */

import { type Result, ok, err } from "../types/common.js";
import { type KeyError, createKeyError } from "../types/errors.js";
import type { EntityDefinition } from "../types/entity.js";
import type { SortabilityDiagnostic } from "../keys/sortability.js";
import { type CompiledIndex, compileEntity } from "./compile-index.js";

/** Options for {@link createIndexRegistry}. */
export interface IndexRegistryOptions {
  /**
   * Receives every sortability diagnostic produced while registering.
   * Pass `(d) => console.warn(formatDiagnostic(d))` to print them.
   */
  readonly onDiagnostic?: ((diagnostic: SortabilityDiagnostic) => void) | undefined;
}

export interface IndexRegistry {
  /**
   * Compiles and stores an entity. Registering a name again replaces the
   * earlier entry and keeps its position.
   */
  readonly register: (entity: EntityDefinition) => Result<CompiledIndex, KeyError>;
  /** Returns the compiled entity, or `NotRegistered`. */
  readonly get: (name: string) => Result<CompiledIndex, KeyError>;
  readonly has: (name: string) => boolean;
  /** All compiled entities in order of first registration. */
  readonly all: () => readonly CompiledIndex[];
  /** Makes the registry read-only. */
  readonly seal: () => void;
  readonly sealed: () => boolean;
}

/**
 * Creates an empty registry.
 *
 * @example
 * ```ts
 * const registry = createIndexRegistry({
 *   onDiagnostic: (d) => console.warn(formatDiagnostic(d)),
 * });
 * registry.register(orderEntity);
 * registry.seal();
 * ```
 */
export const createIndexRegistry = (
  options: IndexRegistryOptions = {},
): IndexRegistry => {
  const entries = new Map<string, CompiledIndex>();
  let isSealed = false;

  const register = (entity: EntityDefinition): Result<CompiledIndex, KeyError> => {
    if (isSealed) {
      return err(
        createKeyError(
          "definition",
          "RegistrySealed",
          `Cannot register entity "${entity.name}": the registry is sealed`,
        ),
      );
    }

    const compiled = compileEntity(entity);
    if (!compiled.success) return compiled;

    entries.set(entity.name, compiled.data);
    for (const diagnostic of compiled.data.diagnostics) {
      options.onDiagnostic?.(diagnostic);
    }
    return compiled;
  };

  const get = (name: string): Result<CompiledIndex, KeyError> => {
    const entry = entries.get(name);
    return entry !== undefined
      ? ok(entry)
      : err(
          createKeyError(
            "definition",
            "NotRegistered",
            `Entity "${name}" is not registered`,
          ),
        );
  };

  return Object.freeze({
    register,
    get,
    has: (name: string) => entries.has(name),
    all: () => Object.freeze([...entries.values()]),
    seal: () => {
      isSealed = true;
    },
    sealed: () => isSealed,
  });
};
