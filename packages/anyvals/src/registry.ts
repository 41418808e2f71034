/**
 * Definition registry
 *
 * Erased metadata for every defined refinement type, keyed by type name.
 * Instances, the literal-check macro and the binding verifier look types
 * up here by name, which keeps them independent of the concrete types
 * module.
 */

import { createGenericRegistry, InvariantError, type GenericRegistry } from "@refinum/core";
import type { PrimitiveKind } from "./primitives.js";
import type { AnyValName, LiteralRule, RoundingTargets } from "./table.js";

export interface AnyValDefinition {
  readonly typeName: AnyValName;
  readonly kind: PrimitiveKind;
  readonly literal: LiteralRule;
  /** Predicate wording used in messages, e.g. "non-negative (x >= 0)" */
  readonly description: string;
  /** A valid literal, as source text */
  readonly example: string;
  readonly widensTo: readonly AnyValName[];
  readonly rounding: RoundingTargets | undefined;
  readonly minValue: number | bigint;
  readonly maxValue: number | bigint;

  /** Whether a value of this type's kind satisfies the predicate */
  accepts(value: number | bigint): boolean;

  /**
   * Coerce a raw input to this type's kind and apply the predicate.
   * Returns the coerced value, or undefined when the input is rejected.
   */
  admit(input: number | bigint | string): number | bigint | undefined;
}

export const definitions: GenericRegistry<string, AnyValDefinition> = createGenericRegistry({
  name: "AnyValRegistry",
});

export function getDefinition(typeName: AnyValName): AnyValDefinition {
  const definition = definitions.get(typeName);
  if (!definition) {
    throw new InvariantError(`No refinement type named '${typeName}' has been defined`);
  }
  return definition;
}
