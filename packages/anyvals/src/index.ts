/**
 * @refinum/anyvals - Numeric refinement types
 *
 * Fifteen restricted numeric types (PosInt, PosZDouble, NonZeroLong,
 * NumericChar, ...) over fixed-width primitive kinds, each with a literal
 * constructor checked at compile time and validated construction paths for
 * run-time values.
 *
 * @example
 * ```typescript
 * import { PosInt, PosZDouble, int } from "@refinum/anyvals";
 *
 * const size = PosInt(42);
 * const parsed = PosInt.from(Number(input)); // PosInt | undefined
 * PosZDouble(3.0).plus(3);                   // 6
 * size.plus(int(1));                         // 43
 * ```
 */

// Concrete types
export {
  PosInt,
  PosZInt,
  NonZeroInt,
  PosLong,
  PosZLong,
  NonZeroLong,
  PosFloat,
  PosZFloat,
  NonZeroFloat,
  PosDouble,
  PosZDouble,
  PosFiniteDouble,
  PosZFiniteDouble,
  NonZeroDouble,
  NumericChar,
} from "./types.js";

// Instances
export { AnyVal, ROUNDING_OPERATIONS, type Produce, type WideningTarget } from "./anyval.js";

// Expander
export {
  defineAnyVal,
  checkBinding,
  verifyBindings,
  BindingError,
  type AnyValBinding,
  type AnyValCompanion,
  type BindingShape,
} from "./template.js";

// Literal checking
export { ANYVALS_MODULE, expandLiteralCall, type LiteralGuard } from "./literal.js";

// Definitions
export { getDefinition, type AnyValDefinition } from "./registry.js";

// Table
export { ANYVAL_TABLE } from "./table.js";
export type {
  AnyValTable,
  AnyValName,
  KindOf,
  WidensTo,
  IntegralName,
  FloatingName,
  LiteralRule,
  RoundingOp,
  RoundingResult,
  RoundingTarget,
  RoundingTargets,
} from "./table.js";

// Primitive model
export {
  byte,
  short,
  char,
  int,
  long,
  float,
  double,
  convert,
  coerce,
  arithmetic,
  negate,
  compareOp,
  bitwise,
  bitwiseNot,
  shift,
  promote,
  totalCompare,
  compareValues,
  sameValue,
  formatPrimitive,
  isPrimitive,
  isPrimitiveKind,
  isIntegralKind,
  isFloatingKind,
  INT_MIN,
  INT_MAX,
  LONG_MIN,
  LONG_MAX,
  FLOAT_MAX,
  FLOAT_MIN_POSITIVE,
  PRIMITIVE_KINDS,
  type PrimitiveKind,
  type IntegralKind,
  type FloatingKind,
  type ComputeKind,
  type Primitive,
  type Rep,
  type Input,
  type Peer,
  type PeerKind,
  type IntegralPeer,
  type IntegralPeerKind,
  type Promote,
  type UnaryPromote,
  type IntegralPromote,
  type ArithmeticOp,
  type ComparisonOp,
  type BitwiseOp,
  type ShiftOp,
} from "./primitives.js";

// Ranges
export { NumericRange } from "./range.js";

// Results
export {
  Good,
  Bad,
  isGood,
  isBad,
  Pass,
  Fail,
  isPass,
  isFail,
  Success,
  Failure,
  isSuccess,
  isFailure,
  attempt,
  type Or,
  type Validation,
  type Try,
} from "./result.js";
