/**
 * Refinement Type Expander
 *
 * `defineAnyVal` turns one binding (a name, a primitive kind, a predicate,
 * its bounds and its table metadata) into a complete refinement type: a
 * callable companion with every validated construction path, cached
 * MinValue/MaxValue instances, a registered definition and a compile-time
 * literal-check macro.
 *
 * @example
 * ```typescript
 * export type PosInt = AnyVal<"PosInt">;
 * export const PosInt = defineAnyVal({
 *   ...ANYVAL_TABLE.PosInt, // kind, literal rule, messages, widening targets
 *   typeName: "PosInt",
 *   predicate: (x) => x > 0,
 *   minValue: 1,
 *   maxValue: 2147483647,
 * });
 *
 * PosInt(42);            // literal, checked at compile time
 * PosInt.from(n);        // PosInt | undefined
 * PosInt.ensuringValid(n); // PosInt, or throws InvariantError
 * ```
 *
 * Malformed bindings fail as soon as they are defined with a BindingError;
 * `verifyBindings()` then checks the graph between the defined types.
 */

import { InvariantError, RF9301, config, formatDiagnosticMessage } from "@refinum/core";
import { ROUNDING_OPERATIONS, createInstance, type AnyVal } from "./anyval.js";
import { registerLiteralMacro, type LiteralGuard } from "./literal.js";
import {
  FLOAT_MIN_POSITIVE,
  coerce,
  compareValues,
  convert,
  formatPrimitive,
  isFloatingKind,
  isPrimitiveKind,
  isRepresentable,
  type Input,
  type PrimitiveKind,
  type Rep,
} from "./primitives.js";
import { definitions, type AnyValDefinition } from "./registry.js";
import { Bad, Fail, Good, Pass, attempt, type Or, type Try, type Validation } from "./result.js";
import type { AnyValName, AnyValTable, KindOf, RoundingOp, RoundingTargets } from "./table.js";

// ============================================================================
// Bindings
// ============================================================================

type RoundingFor<N extends AnyValName> = AnyValTable[N] extends {
  rounding: infer R extends RoundingTargets;
}
  ? R
  : undefined;

/** Everything that defines one refinement type */
export interface AnyValBinding<N extends AnyValName> {
  readonly typeName: N;
  readonly kind: KindOf<N>;
  readonly predicate: (value: Rep<KindOf<N>>) => boolean;
  readonly minValue: Rep<KindOf<N>>;
  readonly maxValue: Rep<KindOf<N>>;
  readonly literal: AnyValTable[N]["literal"];
  readonly description: AnyValTable[N]["description"];
  readonly example: AnyValTable[N]["example"];
  readonly widensTo: AnyValTable[N]["widensTo"];
  /** Required for floating kinds, absent for integral kinds */
  readonly rounding?: RoundingFor<N>;
}

/** The shape `checkBinding` validates, without the table's typing */
export interface BindingShape {
  readonly typeName: string;
  readonly kind: string;
  predicate(value: number | bigint): boolean;
  readonly minValue: unknown;
  readonly maxValue: unknown;
  readonly description: string;
  readonly example: string;
  readonly widensTo: readonly string[];
  readonly rounding?: Readonly<Partial<Record<RoundingOp, string>>>;
}

export class BindingError extends Error {
  constructor(
    readonly binding: string,
    message: string,
  ) {
    super(`Invalid binding '${binding}': ${message}`);
    this.name = "BindingError";
  }
}

const TYPE_NAME = /^[A-Z][A-Za-z0-9]*$/;
const ROUNDING_OPS: readonly RoundingOp[] = ["round", "ceil", "floor", "toRadians", "toDegrees"];

function show(kind: PrimitiveKind, value: number | bigint): string {
  return formatPrimitive(kind === "char" ? "int" : kind, value);
}

/**
 * Validate a binding on its own. Cross-type checks (widening and rounding
 * targets) are left to `verifyBindings`, since targets may be defined later.
 */
export function checkBinding(binding: BindingShape): void {
  const { typeName, kind, minValue, maxValue } = binding;
  const fail = (message: string): never => {
    throw new BindingError(typeName, message);
  };

  if (!TYPE_NAME.test(typeName)) {
    return fail("the type name must be an identifier starting with an upper-case letter");
  }
  if (!isPrimitiveKind(kind)) {
    return fail(`unknown primitive kind '${kind}'`);
  }
  if (typeof minValue !== "number" && typeof minValue !== "bigint") {
    return fail("MinValue must be a number or a bigint");
  }
  if (typeof maxValue !== "number" && typeof maxValue !== "bigint") {
    return fail("MaxValue must be a number or a bigint");
  }
  if (!isRepresentable(kind, minValue)) {
    fail(`MinValue ${String(minValue)} is not representable as ${kind}`);
  }
  if (!isRepresentable(kind, maxValue)) {
    fail(`MaxValue ${String(maxValue)} is not representable as ${kind}`);
  }
  if (!binding.predicate(minValue)) {
    fail(`MinValue ${show(kind, minValue)} does not satisfy the predicate`);
  }
  if (!binding.predicate(maxValue)) {
    fail(`MaxValue ${show(kind, maxValue)} does not satisfy the predicate`);
  }
  if (compareValues(minValue, maxValue) > 0) {
    fail(`MinValue ${show(kind, minValue)} is greater than MaxValue ${show(kind, maxValue)}`);
  }
  if (binding.description.length === 0 || binding.example.length === 0) {
    fail("a description and an example are required");
  }

  if (isFloatingKind(kind)) {
    const rounding = binding.rounding;
    const missing = ROUNDING_OPS.filter((op) => rounding?.[op] === undefined);
    if (missing.length > 0) {
      fail(`${kind} types must declare rounding targets for ${missing.join(", ")}`);
    }
  } else if (binding.rounding !== undefined) {
    fail(`${kind} types have no rounding operations`);
  }

  if (definitions.has(typeName)) {
    fail("a refinement type with this name is already defined");
  }
}

// ============================================================================
// Companions
// ============================================================================

/** The companion object of a refinement type: constructor, bounds and validators */
export interface AnyValCompanion<N extends AnyValName> {
  /** Apply to a literal; checked at compile time */
  <V extends Input<KindOf<N>>>(value: V & LiteralGuard<N, V>): AnyVal<N>;

  readonly typeName: N;
  readonly kind: KindOf<N>;
  readonly MinValue: AnyVal<N>;
  readonly MaxValue: AnyVal<N>;

  /** The instance for a valid value, otherwise undefined */
  from(value: Input<KindOf<N>>): AnyVal<N> | undefined;

  /** The instance for a valid value; throws an InvariantError otherwise */
  ensuringValid(value: Input<KindOf<N>>): AnyVal<N>;

  fromOrElse(value: Input<KindOf<N>>, fallback: AnyVal<N>): AnyVal<N>;

  goodOrElse<B>(value: Input<KindOf<N>>, onBad: (value: Input<KindOf<N>>) => B): Or<AnyVal<N>, B>;

  passOrElse<E>(value: Input<KindOf<N>>, onFail: (value: Input<KindOf<N>>) => E): Validation<E>;

  tryingValid(value: Input<KindOf<N>>): Try<AnyVal<N>>;

  isValid(value: Input<KindOf<N>>): boolean;

  /** Sort comparator: the primitive order, with -0.0 before 0.0 and NaN last */
  compare(a: AnyVal<N>, b: AnyVal<N>): number;

  equal(a: AnyVal<N>, b: AnyVal<N>): boolean;
}

function describeInput(input: number | bigint | string): string {
  return typeof input === "string" ? JSON.stringify(input) : String(input);
}

/**
 * Define a refinement type from its binding.
 */
export function defineAnyVal<N extends AnyValName>(binding: AnyValBinding<N>): AnyValCompanion<N> {
  checkBinding(binding);

  const { typeName, kind, predicate } = binding;

  const accepts = (value: number | bigint): boolean => predicate(convert(value, kind));

  const definition: AnyValDefinition = {
    typeName,
    kind,
    literal: binding.literal,
    description: binding.description,
    example: binding.example,
    widensTo: binding.widensTo,
    rounding: binding.rounding,
    minValue: binding.minValue,
    maxValue: binding.maxValue,
    accepts,
    admit(input) {
      const value = coerce<PrimitiveKind>(kind, input);
      return value !== undefined && accepts(value) ? value : undefined;
    },
  };
  definitions.set(typeName, definition);
  registerLiteralMacro(definition);

  const from = (input: Input<KindOf<N>>): AnyVal<N> | undefined => {
    const value = coerce(kind, input);
    return value !== undefined && predicate(value) ? createInstance(typeName, kind, value) : undefined;
  };

  const ensuringValid = (input: Input<KindOf<N>>): AnyVal<N> => {
    const instance = from(input);
    if (instance === undefined) {
      throw new InvariantError(`${describeInput(input)} was not a valid ${typeName}`);
    }
    return instance;
  };

  const apply = (input: Input<KindOf<N>>): AnyVal<N> => {
    const instance = from(input);
    if (instance === undefined) {
      throw new InvariantError(
        formatDiagnosticMessage(RF9301, {
          type: typeName,
          constraint: binding.description,
          example: binding.example,
        })
      );
    }
    return instance;
  };

  const companion: AnyValCompanion<N> = Object.assign(apply, {
    typeName,
    kind,
    MinValue: createInstance(typeName, kind, binding.minValue),
    MaxValue: createInstance(typeName, kind, binding.maxValue),
    from,
    ensuringValid,
    fromOrElse: (input: Input<KindOf<N>>, fallback: AnyVal<N>): AnyVal<N> => from(input) ?? fallback,
    goodOrElse: <B>(input: Input<KindOf<N>>, onBad: (value: Input<KindOf<N>>) => B): Or<AnyVal<N>, B> => {
      const instance = from(input);
      return instance === undefined ? Bad(onBad(input)) : Good(instance);
    },
    passOrElse: <E>(input: Input<KindOf<N>>, onFail: (value: Input<KindOf<N>>) => E): Validation<E> =>
      from(input) === undefined ? Fail(onFail(input)) : Pass,
    tryingValid: (input: Input<KindOf<N>>): Try<AnyVal<N>> => attempt(() => ensuringValid(input)),
    isValid: (input: Input<KindOf<N>>): boolean => from(input) !== undefined,
    compare: (a: AnyVal<N>, b: AnyVal<N>): number => compareValues(a.value, b.value),
    equal: (a: AnyVal<N>, b: AnyVal<N>): boolean => a.equals(b),
  });

  if (config.isDebug()) {
    console.log(
      `[refinum] Defined ${typeName}: ${kind}, ${binding.description}, ` +
        `[${show(kind, binding.minValue)}, ${show(kind, binding.maxValue)}]`
    );
  }

  return Object.freeze(companion);
}

// ============================================================================
// Graph Verification
// ============================================================================

/** Widening primitive conversions, plus identity */
const WIDENS: Readonly<Record<PrimitiveKind, readonly PrimitiveKind[]>> = {
  byte: ["byte", "short", "int", "long", "float", "double"],
  short: ["short", "int", "long", "float", "double"],
  char: ["char", "int", "long", "float", "double"],
  int: ["int", "long", "float", "double"],
  long: ["long", "float", "double"],
  float: ["float", "double"],
  double: ["double"],
};

/** Values at the edges of every predicate in the table */
const SAMPLES: readonly number[] = [
  0,
  -0,
  1,
  -1,
  FLOAT_MIN_POSITIVE,
  -FLOAT_MIN_POSITIVE,
  Number.MIN_VALUE,
  -Number.MIN_VALUE,
  0.5,
  -0.5,
  Number.NaN,
  Infinity,
  -Infinity,
];

function acceptedSamples(definition: AnyValDefinition): Array<number | bigint> {
  const values: Array<number | bigint> = [definition.minValue, definition.maxValue];
  for (const sample of SAMPLES) {
    const value = definition.admit(sample);
    if (value !== undefined) values.push(value);
  }
  return values;
}

function lookup(source: AnyValName, target: AnyValName): AnyValDefinition {
  const definition = definitions.get(target);
  if (definition === undefined) {
    throw new BindingError(source, `refers to '${target}', which is not a defined refinement type`);
  }
  return definition;
}

/**
 * Check the graph between the defined types: every widening target exists,
 * is reached by a widening primitive conversion, and accepts every edge
 * value of the source; every rounding target accepts the rounded edge
 * values. Returns the number of types verified.
 */
export function verifyBindings(): number {
  let count = 0;
  for (const definition of definitions.values()) {
    const { typeName, kind } = definition;
    const samples = acceptedSamples(definition);

    for (const targetName of definition.widensTo) {
      const target = lookup(typeName, targetName);
      if (!WIDENS[kind].includes(target.kind)) {
        throw new BindingError(typeName, `${kind} does not widen to ${target.kind} (${targetName})`);
      }
      for (const value of samples) {
        if (!target.accepts(convert(value, target.kind))) {
          throw new BindingError(
            typeName,
            `${show(kind, value)} widened to ${targetName} does not satisfy its predicate`
          );
        }
      }
    }

    if (definition.rounding !== undefined) {
      for (const op of ROUNDING_OPS) {
        const targetName = definition.rounding[op];
        if (isPrimitiveKind(targetName)) continue;
        const target = lookup(typeName, targetName);
        for (const value of samples) {
          const rounded = convert(ROUNDING_OPERATIONS[op](convert(value, "double")), target.kind);
          if (!target.accepts(rounded)) {
            throw new BindingError(
              typeName,
              `${op}(${show(kind, value)}) = ${show(target.kind, rounded)} does not satisfy ${targetName}`
            );
          }
        }
      }
    }

    count++;
  }

  if (config.isDebug()) {
    console.log(`[refinum] Verified ${count} refinement types`);
  }
  return count;
}
