/**
 * Macro Registry - Stores and retrieves macro definitions
 *
 * This module also provides a generic Registry<K, V> abstraction that other
 * packages use for their own keyed tables (refinement definitions, etc.).
 */

import type { ExpressionMacro, MacroDefinition, MacroRegistry } from "./types.js";

// ============================================================================
// Generic Registry<K, V> Abstraction
// ============================================================================

/**
 * Options for creating a Registry instance.
 */
export interface RegistryOptions {
  /** Name for error messages */
  name?: string;
}

/**
 * A generic, type-safe registry for key-value pairs. Keys are registered
 * once; setting a key again throws.
 *
 * @example
 * ```typescript
 * const definitions = createGenericRegistry<string, Definition>({
 *   name: "DefinitionRegistry",
 * });
 *
 * definitions.set("PosInt", posIntDefinition);
 * definitions.get("PosInt");
 * ```
 */
export interface GenericRegistry<K, V> {
  /** Register a new entry */
  set(key: K, value: V): void;

  /** Get an entry by key */
  get(key: K): V | undefined;

  /** Check if a key exists */
  has(key: K): boolean;

  /** Get all values, in registration order */
  values(): IterableIterator<V>;
}

class GenericRegistryImpl<K, V> implements GenericRegistry<K, V> {
  private store = new Map<K, V>();
  private readonly name: string;

  constructor(options: RegistryOptions = {}) {
    this.name = options.name ?? "Registry";
  }

  set(key: K, value: V): void {
    if (this.store.has(key)) {
      throw new Error(`${this.name}: entry for key '${String(key)}' already exists`);
    }
    this.store.set(key, value);
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  values(): IterableIterator<V> {
    return this.store.values();
  }
}

/**
 * Create a new generic registry instance.
 */
export function createGenericRegistry<K, V>(options?: RegistryOptions): GenericRegistry<K, V> {
  return new GenericRegistryImpl<K, V>(options);
}

// ============================================================================
// Macro Registry Implementation
// ============================================================================

/**
 * Key for module-scoped macro lookup: "module::exportName"
 */
function moduleKey(mod: string, exportName: string): string {
  return `${mod}::${exportName}`;
}

class MacroRegistryImpl implements MacroRegistry {
  private expressionMacros = new Map<string, ExpressionMacro>();

  /**
   * Secondary index for macros that declare a `module`.
   * Key is "module::exportName".
   */
  private moduleScopedMacros = new Map<string, MacroDefinition>();

  /**
   * Two macros are the same when they share name and module. ESM re-imports
   * can produce fresh definition objects for the same macro.
   */
  private isSameMacro(existing: MacroDefinition, incoming: MacroDefinition): boolean {
    if (existing === incoming) return true;
    return existing.name === incoming.name && existing.module === incoming.module;
  }

  register(macro: MacroDefinition): void {
    const existing = this.expressionMacros.get(macro.name);
    if (existing) {
      if (this.isSameMacro(existing, macro)) return;
      throw new Error(`Expression macro '${macro.name}' is already registered`);
    }
    this.expressionMacros.set(macro.name, macro);

    if (macro.module) {
      const exportName = macro.exportName ?? macro.name;
      this.moduleScopedMacros.set(moduleKey(macro.module, exportName), macro);
    }
  }

  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined {
    return this.moduleScopedMacros.get(moduleKey(mod, exportName));
  }

  getAll(): MacroDefinition[] {
    return [...this.expressionMacros.values()];
  }
}

/**
 * Create a fresh, empty macro registry
 */
export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

/** The process-wide registry the transformer consults */
export const globalRegistry: MacroRegistry = createRegistry();

/**
 * Define an expression macro with type inference
 */
export function defineExpressionMacro(definition: Omit<ExpressionMacro, "kind">): ExpressionMacro {
  return {
    ...definition,
    kind: "expression",
  };
}
