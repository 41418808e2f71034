/**
 * The refinement types
 *
 * Each type is a binding expanded by `defineAnyVal`: its table entry plus
 * the predicate and bounds. The type alias and the companion share a name,
 * so `PosInt` is both the instance type and the value used to build
 * instances.
 */

import type { AnyVal } from "./anyval.js";
import {
  FLOAT_MAX,
  FLOAT_MIN_POSITIVE,
  INT_MAX,
  INT_MIN,
  LONG_MAX,
  LONG_MIN,
} from "./primitives.js";
import { ANYVAL_TABLE } from "./table.js";
import { defineAnyVal, verifyBindings } from "./template.js";

const CHAR_0 = 48;
const CHAR_9 = 57;

// ============================================================================
// int
// ============================================================================

/** An int greater than zero */
export type PosInt = AnyVal<"PosInt">;
export const PosInt = defineAnyVal({
  ...ANYVAL_TABLE.PosInt,
  typeName: "PosInt",
  predicate: (x) => x > 0,
  minValue: 1,
  maxValue: INT_MAX,
});

/** An int greater than or equal to zero */
export type PosZInt = AnyVal<"PosZInt">;
export const PosZInt = defineAnyVal({
  ...ANYVAL_TABLE.PosZInt,
  typeName: "PosZInt",
  predicate: (x) => x >= 0,
  minValue: 0,
  maxValue: INT_MAX,
});

export type NonZeroInt = AnyVal<"NonZeroInt">;
export const NonZeroInt = defineAnyVal({
  ...ANYVAL_TABLE.NonZeroInt,
  typeName: "NonZeroInt",
  predicate: (x) => x !== 0,
  minValue: INT_MIN,
  maxValue: INT_MAX,
});

// ============================================================================
// long
// ============================================================================

/** A long greater than zero */
export type PosLong = AnyVal<"PosLong">;
export const PosLong = defineAnyVal({
  ...ANYVAL_TABLE.PosLong,
  typeName: "PosLong",
  predicate: (x) => x > 0n,
  minValue: 1n,
  maxValue: LONG_MAX,
});

export type PosZLong = AnyVal<"PosZLong">;
export const PosZLong = defineAnyVal({
  ...ANYVAL_TABLE.PosZLong,
  typeName: "PosZLong",
  predicate: (x) => x >= 0n,
  minValue: 0n,
  maxValue: LONG_MAX,
});

export type NonZeroLong = AnyVal<"NonZeroLong">;
export const NonZeroLong = defineAnyVal({
  ...ANYVAL_TABLE.NonZeroLong,
  typeName: "NonZeroLong",
  predicate: (x) => x !== 0n,
  minValue: LONG_MIN,
  maxValue: LONG_MAX,
});

// ============================================================================
// float
// ============================================================================

/** A float greater than zero; positive infinity included */
export type PosFloat = AnyVal<"PosFloat">;
export const PosFloat = defineAnyVal({
  ...ANYVAL_TABLE.PosFloat,
  typeName: "PosFloat",
  predicate: (x) => x > 0,
  minValue: FLOAT_MIN_POSITIVE,
  maxValue: FLOAT_MAX,
});

export type PosZFloat = AnyVal<"PosZFloat">;
export const PosZFloat = defineAnyVal({
  ...ANYVAL_TABLE.PosZFloat,
  typeName: "PosZFloat",
  predicate: (x) => x >= 0,
  minValue: 0,
  maxValue: FLOAT_MAX,
});

/** A float other than zero; NaN and both infinities included */
export type NonZeroFloat = AnyVal<"NonZeroFloat">;
export const NonZeroFloat = defineAnyVal({
  ...ANYVAL_TABLE.NonZeroFloat,
  typeName: "NonZeroFloat",
  predicate: (x) => x !== 0,
  minValue: -FLOAT_MAX,
  maxValue: FLOAT_MAX,
});

// ============================================================================
// double
// ============================================================================

export type PosDouble = AnyVal<"PosDouble">;
export const PosDouble = defineAnyVal({
  ...ANYVAL_TABLE.PosDouble,
  typeName: "PosDouble",
  predicate: (x) => x > 0,
  minValue: Number.MIN_VALUE,
  maxValue: Number.MAX_VALUE,
});

export type PosZDouble = AnyVal<"PosZDouble">;
export const PosZDouble = defineAnyVal({
  ...ANYVAL_TABLE.PosZDouble,
  typeName: "PosZDouble",
  predicate: (x) => x >= 0,
  minValue: 0,
  maxValue: Number.MAX_VALUE,
});

/** A finite double greater than zero */
export type PosFiniteDouble = AnyVal<"PosFiniteDouble">;
export const PosFiniteDouble = defineAnyVal({
  ...ANYVAL_TABLE.PosFiniteDouble,
  typeName: "PosFiniteDouble",
  predicate: (x) => x > 0 && x !== Infinity,
  minValue: Number.MIN_VALUE,
  maxValue: Number.MAX_VALUE,
});

export type PosZFiniteDouble = AnyVal<"PosZFiniteDouble">;
export const PosZFiniteDouble = defineAnyVal({
  ...ANYVAL_TABLE.PosZFiniteDouble,
  typeName: "PosZFiniteDouble",
  predicate: (x) => x >= 0 && x !== Infinity,
  minValue: 0,
  maxValue: Number.MAX_VALUE,
});

export type NonZeroDouble = AnyVal<"NonZeroDouble">;
export const NonZeroDouble = defineAnyVal({
  ...ANYVAL_TABLE.NonZeroDouble,
  typeName: "NonZeroDouble",
  predicate: (x) => x !== 0,
  minValue: -Number.MAX_VALUE,
  maxValue: Number.MAX_VALUE,
});

// ============================================================================
// char
// ============================================================================

/** A char in '0'..'9' */
export type NumericChar = AnyVal<"NumericChar">;
export const NumericChar = defineAnyVal({
  ...ANYVAL_TABLE.NumericChar,
  typeName: "NumericChar",
  predicate: (x) => x >= CHAR_0 && x <= CHAR_9,
  minValue: CHAR_0,
  maxValue: CHAR_9,
});

verifyBindings();
