/**
 * The Refinement Type Table
 *
 * One entry per refinement type: its primitive kind, the rule the literal
 * check applies, the description and example used in messages, the types
 * it widens to and, for floating types, the narrowest result type of each
 * rounding operation.
 *
 * The bindings in `types.ts` spread their entry, and the static types below
 * are read off the same object, so the runtime graph and the types cannot
 * drift apart.
 */

import type { ComputeKind, IntegralKind, PrimitiveKind } from "./primitives.js";

/** How the type-level literal check judges a literal argument */
export type LiteralRule = "positive" | "nonNegative" | "nonZero" | "digit";

export type RoundingOp = "round" | "ceil" | "floor" | "toRadians" | "toDegrees";

/** A rounding result: another refinement type, or a raw primitive kind */
export type RoundingTarget = AnyValName | ComputeKind;

export type RoundingTargets = { readonly [Op in RoundingOp]: RoundingTarget };

interface TableEntry {
  readonly kind: PrimitiveKind;
  readonly literal: LiteralRule;
  readonly description: string;
  readonly example: string;
  readonly widensTo: readonly string[];
  readonly rounding?: { readonly [Op in RoundingOp]: string };
}

const POSITIVE = "positive (x > 0)";
const NON_NEGATIVE = "non-negative (x >= 0)";
const NON_ZERO = "non-zero (x != 0)";

export const ANYVAL_TABLE = {
  PosInt: {
    kind: "int",
    literal: "positive",
    description: POSITIVE,
    example: "42",
    widensTo: [
      "PosZInt",
      "NonZeroInt",
      "PosLong",
      "PosZLong",
      "NonZeroLong",
      "PosFloat",
      "PosZFloat",
      "NonZeroFloat",
      "PosDouble",
      "PosZDouble",
      "PosFiniteDouble",
      "PosZFiniteDouble",
      "NonZeroDouble",
    ],
  },
  PosZInt: {
    kind: "int",
    literal: "nonNegative",
    description: NON_NEGATIVE,
    example: "42",
    widensTo: ["PosZLong", "PosZFloat", "PosZDouble", "PosZFiniteDouble"],
  },
  NonZeroInt: {
    kind: "int",
    literal: "nonZero",
    description: NON_ZERO,
    example: "42",
    widensTo: ["NonZeroLong", "NonZeroFloat", "NonZeroDouble"],
  },
  PosLong: {
    kind: "long",
    literal: "positive",
    description: POSITIVE,
    example: "42n",
    widensTo: [
      "PosZLong",
      "NonZeroLong",
      "PosFloat",
      "PosZFloat",
      "NonZeroFloat",
      "PosDouble",
      "PosZDouble",
      "PosFiniteDouble",
      "PosZFiniteDouble",
      "NonZeroDouble",
    ],
  },
  PosZLong: {
    kind: "long",
    literal: "nonNegative",
    description: NON_NEGATIVE,
    example: "42n",
    widensTo: ["PosZFloat", "PosZDouble", "PosZFiniteDouble"],
  },
  NonZeroLong: {
    kind: "long",
    literal: "nonZero",
    description: NON_ZERO,
    example: "42n",
    widensTo: ["NonZeroFloat", "NonZeroDouble"],
  },
  PosFloat: {
    kind: "float",
    literal: "positive",
    description: POSITIVE,
    example: "42.0",
    widensTo: ["PosZFloat", "NonZeroFloat", "PosDouble", "PosZDouble", "NonZeroDouble"],
    rounding: {
      round: "PosZInt",
      ceil: "PosFloat",
      floor: "PosZFloat",
      toRadians: "PosZFloat",
      toDegrees: "PosFloat",
    },
  },
  PosZFloat: {
    kind: "float",
    literal: "nonNegative",
    description: NON_NEGATIVE,
    example: "42.0",
    widensTo: ["PosZDouble"],
    rounding: {
      round: "PosZInt",
      ceil: "PosZFloat",
      floor: "PosZFloat",
      toRadians: "PosZFloat",
      toDegrees: "PosZFloat",
    },
  },
  NonZeroFloat: {
    kind: "float",
    literal: "nonZero",
    description: NON_ZERO,
    example: "42.0",
    widensTo: ["NonZeroDouble"],
    rounding: {
      round: "int",
      ceil: "float",
      floor: "float",
      toRadians: "float",
      toDegrees: "NonZeroFloat",
    },
  },
  PosDouble: {
    kind: "double",
    literal: "positive",
    description: POSITIVE,
    example: "42.0",
    widensTo: ["PosZDouble", "NonZeroDouble"],
    rounding: {
      round: "PosZLong",
      ceil: "PosDouble",
      floor: "PosZDouble",
      toRadians: "PosZDouble",
      toDegrees: "PosDouble",
    },
  },
  PosZDouble: {
    kind: "double",
    literal: "nonNegative",
    description: NON_NEGATIVE,
    example: "42.0",
    widensTo: [],
    rounding: {
      round: "PosZLong",
      ceil: "PosZDouble",
      floor: "PosZDouble",
      toRadians: "PosZDouble",
      toDegrees: "PosZDouble",
    },
  },
  PosFiniteDouble: {
    kind: "double",
    literal: "positive",
    description: "finite positive (0 < x < Infinity)",
    example: "42.0",
    widensTo: ["PosDouble", "PosZDouble", "PosZFiniteDouble", "NonZeroDouble"],
    rounding: {
      round: "PosZLong",
      ceil: "PosFiniteDouble",
      floor: "PosZFiniteDouble",
      toRadians: "PosZFiniteDouble",
      toDegrees: "PosDouble",
    },
  },
  PosZFiniteDouble: {
    kind: "double",
    literal: "nonNegative",
    description: "finite non-negative (0 <= x < Infinity)",
    example: "42.0",
    widensTo: ["PosZDouble"],
    rounding: {
      round: "PosZLong",
      ceil: "PosZFiniteDouble",
      floor: "PosZFiniteDouble",
      toRadians: "PosZFiniteDouble",
      toDegrees: "PosZDouble",
    },
  },
  NonZeroDouble: {
    kind: "double",
    literal: "nonZero",
    description: NON_ZERO,
    example: "42.0",
    widensTo: [],
    rounding: {
      round: "long",
      ceil: "double",
      floor: "double",
      toRadians: "double",
      toDegrees: "NonZeroDouble",
    },
  },
  NumericChar: {
    kind: "char",
    literal: "digit",
    description: 'numeric ("0" <= x <= "9")',
    example: '"4"',
    widensTo: [
      "PosInt",
      "PosZInt",
      "NonZeroInt",
      "PosLong",
      "PosZLong",
      "PosFloat",
      "PosZFloat",
      "PosDouble",
      "PosZDouble",
      "PosFiniteDouble",
      "PosZFiniteDouble",
    ],
  },
} as const satisfies Record<string, TableEntry>;

export type AnyValTable = typeof ANYVAL_TABLE;

// ============================================================================
// Derived Types
// ============================================================================

export type AnyValName = keyof AnyValTable;

export type KindOf<N extends AnyValName> = AnyValTable[N]["kind"];

export type WidensTo<N extends AnyValName> = Extract<AnyValTable[N]["widensTo"][number], AnyValName>;

export type IntegralName = {
  [N in AnyValName]: KindOf<N> extends IntegralKind ? N : never;
}[AnyValName];

export type FloatingName = Exclude<AnyValName, IntegralName>;

/** The result type name or kind of one rounding operation */
export type RoundingResult<N extends FloatingName, Op extends RoundingOp> = AnyValTable[N]["rounding"][Op];
