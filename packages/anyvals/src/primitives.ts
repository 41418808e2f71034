/**
 * Primitive Numeric Model
 *
 * JavaScript has one floating-point number type and bigint. Refinement types
 * sit on top of seven fixed-width primitive kinds with two's-complement
 * integers and IEEE-754 floats, so this module models them explicitly:
 *
 * | Kind   | Representation | Range                                   |
 * |--------|----------------|-----------------------------------------|
 * | byte   | number         | -128 .. 127                             |
 * | short  | number         | -32768 .. 32767                         |
 * | char   | number         | 0 .. 65535 (a UTF-16 code unit)         |
 * | int    | number         | -2^31 .. 2^31-1                         |
 * | long   | bigint         | -2^63 .. 2^63-1                         |
 * | float  | number         | IEEE-754 binary32 (Math.fround values)  |
 * | double | number         | IEEE-754 binary64                       |
 *
 * Arithmetic follows binary numeric promotion: the operands are widened to
 * the wider of int/long/float/double and the operation wraps (integers) or
 * rounds (floats) exactly like the host primitive would.
 *
 * A bare `number` operand is a double; a bare `bigint` operand is a long.
 * Use the `byte()`..`float()` constructors for the other kinds.
 */

import { unreachable } from "@refinum/core";

// ============================================================================
// Kinds and Representations
// ============================================================================

export type IntegralKind = "byte" | "short" | "char" | "int" | "long";
export type FloatingKind = "float" | "double";
export type PrimitiveKind = IntegralKind | FloatingKind;

/** Kinds that arithmetic is actually performed in */
export type ComputeKind = "int" | "long" | "float" | "double";

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  "byte",
  "short",
  "char",
  "int",
  "long",
  "float",
  "double",
];

export interface PrimitiveReps {
  byte: number;
  short: number;
  char: number;
  int: number;
  long: bigint;
  float: number;
  double: number;
}

/** The JavaScript representation of a primitive kind */
export type Rep<K extends PrimitiveKind> = PrimitiveReps[K];

/** Values accepted where a primitive of the kind is expected */
export interface PrimitiveInputs {
  byte: number;
  short: number;
  char: number | string;
  int: number;
  long: bigint | number;
  float: number | bigint;
  double: number | bigint;
}

export type Input<K extends PrimitiveKind> = PrimitiveInputs[K];

/** A primitive value tagged with its kind */
export interface Primitive<K extends PrimitiveKind = PrimitiveKind> {
  readonly kind: K;
  readonly value: Rep<K>;
}

/** Anything usable as the right-hand side of an operator */
export type Peer = number | bigint | Primitive;

/** Peers allowed for bitwise operators and shift distances */
export type IntegralPeer = bigint | Primitive<IntegralKind>;

/** The primitive kind a peer stands for */
export type PeerKind<P> = P extends number
  ? "double"
  : P extends bigint
    ? "long"
    : P extends Primitive<infer K extends PrimitiveKind>
      ? K
      : never;

/** The integral kind an integral peer stands for */
export type IntegralPeerKind<P> = P extends bigint
  ? "long"
  : P extends Primitive<infer K extends IntegralKind>
    ? K
    : never;

const KIND_NAMES: ReadonlySet<string> = new Set(PRIMITIVE_KINDS);

export function isPrimitiveKind(name: string): name is PrimitiveKind {
  return KIND_NAMES.has(name);
}

export function isIntegralKind(kind: PrimitiveKind): kind is IntegralKind {
  return kind !== "float" && kind !== "double";
}

export function isFloatingKind(kind: PrimitiveKind): kind is FloatingKind {
  return kind === "float" || kind === "double";
}

// ============================================================================
// Limits
// ============================================================================

export const INT_MIN = -2147483648;
export const INT_MAX = 2147483647;
export const LONG_MIN = -(2n ** 63n);
export const LONG_MAX = 2n ** 63n - 1n;
/** Largest finite binary32 value */
export const FLOAT_MAX = 3.4028234663852886e38;
/** Smallest positive binary32 value (subnormal) */
export const FLOAT_MIN_POSITIVE = 1.401298464324817e-45;

const INTEGRAL_RANGES: Record<"byte" | "short" | "char" | "int", readonly [number, number]> = {
  byte: [-128, 127],
  short: [-32768, 32767],
  char: [0, 65535],
  int: [INT_MIN, INT_MAX],
};

// ============================================================================
// Conversions
// ============================================================================

function doubleToInt(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value >= INT_MAX) return INT_MAX;
  if (value <= INT_MIN) return INT_MIN;
  return Math.trunc(value) | 0;
}

function doubleToLong(value: number): bigint {
  if (Number.isNaN(value)) return 0n;
  if (value >= 2 ** 63) return LONG_MAX;
  if (value <= -(2 ** 63)) return LONG_MIN;
  return BigInt(Math.trunc(value));
}

/**
 * long to float with a single rounding step. Number(bigint) rounds to
 * binary64 first, which can double-round; keep 53 significant bits plus a
 * sticky bit so the final binary32 rounding sees the exact tie state.
 */
function longToFloat(value: bigint): number {
  const negative = value < 0n;
  let magnitude = negative ? -value : value;
  const excess = magnitude.toString(2).length - 53;
  if (excess > 0) {
    const shift = BigInt(excess);
    const sticky = magnitude & ((1n << shift) - 1n);
    magnitude >>= shift;
    if (sticky !== 0n) magnitude |= 1n;
  }
  const rounded = Math.fround(Number(magnitude) * 2 ** Math.max(excess, 0));
  return negative ? -rounded : rounded;
}

function toIntValue(value: number | bigint): number {
  return typeof value === "bigint" ? Number(BigInt.asIntN(32, value)) : doubleToInt(value);
}

type Converters = { [K in PrimitiveKind]: (value: number | bigint) => Rep<K> };

/**
 * Primitive conversions. Integral sources are always exact integers, so
 * one table serves every source kind: narrowing keeps the low bits,
 * floating sources truncate toward zero and saturate, NaN becomes 0.
 */
const CONVERTERS: Converters = {
  byte: (value) => (toIntValue(value) << 24) >> 24,
  short: (value) => (toIntValue(value) << 16) >> 16,
  char: (value) => toIntValue(value) & 0xffff,
  int: toIntValue,
  long: (value) => (typeof value === "bigint" ? value : doubleToLong(value)),
  float: (value) => (typeof value === "bigint" ? longToFloat(value) : Math.fround(value)),
  double: (value) => (typeof value === "bigint" ? Number(value) : value),
};

/**
 * Convert a primitive value to another kind.
 *
 * @example
 * ```typescript
 * convert(3.99, "int")      // 3
 * convert(-1, "char")       // 65535
 * convert(1e20, "long")     // 9223372036854775807n
 * convert(2n ** 40n, "int") // 0
 * ```
 */
export function convert<K extends PrimitiveKind>(value: number | bigint, to: K): Rep<K> {
  return CONVERTERS[to](value);
}

// ============================================================================
// Typed Primitive Constructors
// ============================================================================

/** A byte; the argument is narrowed like a cast */
export function byte(value: number): Primitive<"byte"> {
  return { kind: "byte", value: convert(value, "byte") };
}

export function short(value: number): Primitive<"short"> {
  return { kind: "short", value: convert(value, "short") };
}

/** A char from a one-unit string or a code unit number */
export function char(value: number | string): Primitive<"char"> {
  if (typeof value === "string" && value.length !== 1) {
    throw new RangeError(`A char is a single UTF-16 code unit, got ${JSON.stringify(value)}`);
  }
  const code = typeof value === "string" ? value.charCodeAt(0) : value;
  return { kind: "char", value: convert(code, "char") };
}

export function int(value: number): Primitive<"int"> {
  return { kind: "int", value: convert(value, "int") };
}

export function long(value: bigint | number): Primitive<"long"> {
  return { kind: "long", value: convert(value, "long") };
}

export function float(value: number): Primitive<"float"> {
  return { kind: "float", value: convert(value, "float") };
}

export function double(value: number): Primitive<"double"> {
  return { kind: "double", value };
}

// ============================================================================
// Input Coercion
// ============================================================================

function exactIntegral(kind: "byte" | "short" | "char" | "int", value: number): number | undefined {
  const [min, max] = INTEGRAL_RANGES[kind];
  // `+ 0` folds -0 into 0
  return Number.isInteger(value) && value >= min && value <= max ? value + 0 : undefined;
}

type Coercers = { [K in PrimitiveKind]: (input: Input<K>) => Rep<K> | undefined };

/**
 * Turn a caller-supplied input into a value of the kind, or undefined when
 * the input is not a value of that kind. Integral kinds never round; float
 * inputs round to binary32 like a literal would, and a bigint input to a
 * floating kind rounds to the nearest value.
 */
const COERCERS: Coercers = {
  byte: (input) => exactIntegral("byte", input),
  short: (input) => exactIntegral("short", input),
  char: (input) => {
    if (typeof input === "string") {
      return input.length === 1 ? input.charCodeAt(0) : undefined;
    }
    return exactIntegral("char", input);
  },
  int: (input) => exactIntegral("int", input),
  long: (input) => {
    if (typeof input === "number") {
      if (!Number.isInteger(input)) return undefined;
      input = BigInt(input);
    }
    return input >= LONG_MIN && input <= LONG_MAX ? input : undefined;
  },
  float: (input) => convert(input, "float"),
  double: (input) => convert(input, "double"),
};

export function coerce<K extends PrimitiveKind>(kind: K, input: Input<K>): Rep<K> | undefined {
  return COERCERS[kind](input);
}

/** Whether a raw JavaScript value is a representable value of the kind */
export function isRepresentable(kind: PrimitiveKind, value: unknown): boolean {
  switch (kind) {
    case "long":
      return typeof value === "bigint" && value >= LONG_MIN && value <= LONG_MAX;
    case "float":
      return typeof value === "number" && (Number.isNaN(value) || Math.fround(value) === value);
    case "double":
      return typeof value === "number";
    default:
      return typeof value === "number" && exactIntegral(kind, value) === value;
  }
}

// ============================================================================
// Numeric Promotion
// ============================================================================

/** Unary numeric promotion: byte, short and char compute as int */
export type UnaryPromote<K extends PrimitiveKind> = K extends "byte" | "short" | "char"
  ? "int"
  : K & ComputeKind;

/** Binary numeric promotion */
export type Promote<A extends PrimitiveKind, B extends PrimitiveKind> = "double" extends A | B
  ? "double"
  : "float" extends A | B
    ? "float"
    : "long" extends A | B
      ? "long"
      : "int";

/** Promotion for bitwise operators, whose operands are integral */
export type IntegralPromote<A extends IntegralKind, B extends IntegralKind> = "long" extends A | B
  ? "long"
  : "int";

function promoteKind(a: PrimitiveKind, b: PrimitiveKind): ComputeKind {
  if (a === "double" || b === "double") return "double";
  if (a === "float" || b === "float") return "float";
  if (a === "long" || b === "long") return "long";
  return "int";
}

/*
 * The three functions below are the runtime mirrors of the promotion types.
 * The compiler cannot evaluate a conditional type against a runtime value,
 * so each asserts its result once; every table lookup downstream is checked.
 */

export function promote<A extends PrimitiveKind, B extends PrimitiveKind>(a: A, b: B): Promote<A, B> {
  return promoteKind(a, b) as Promote<A, B>;
}

export function unaryPromote<K extends PrimitiveKind>(kind: K): UnaryPromote<K> {
  return (kind === "byte" || kind === "short" || kind === "char" ? "int" : kind) as UnaryPromote<K>;
}

export function integralPromote<A extends IntegralKind, B extends IntegralKind>(
  a: A,
  b: B
): IntegralPromote<A, B> {
  return (a === "long" || b === "long" ? "long" : "int") as IntegralPromote<A, B>;
}

/** The typed primitive a peer operand stands for */
export function peerPrimitive<P extends Peer>(that: P): Primitive<PeerKind<P>>;
export function peerPrimitive(that: Peer): Primitive {
  if (typeof that === "number") return double(that);
  if (typeof that === "bigint") return long(that);
  return that;
}

/** The typed primitive an integral peer operand stands for */
export function integralPeerPrimitive<P extends IntegralPeer>(that: P): Primitive<IntegralPeerKind<P>>;
export function integralPeerPrimitive(that: IntegralPeer): Primitive<IntegralKind> {
  return typeof that === "bigint" ? long(that) : that;
}

// ============================================================================
// Arithmetic
// ============================================================================

export type ArithmeticOp = "plus" | "minus" | "times" | "div" | "rem";
export type ComparisonOp = "lt" | "le" | "gt" | "ge";
export type BitwiseOp = "and" | "or" | "xor";
export type ShiftOp = "shl" | "shr" | "ushr";

interface Arithmetic<R> {
  plus(a: R, b: R): R;
  minus(a: R, b: R): R;
  times(a: R, b: R): R;
  div(a: R, b: R): R;
  rem(a: R, b: R): R;
  negate(a: R): R;
}

function divisionByZero(): never {
  throw new RangeError("Division by zero");
}

const ARITHMETIC: { [K in ComputeKind]: Arithmetic<Rep<K>> } = {
  int: {
    plus: (a, b) => (a + b) | 0,
    minus: (a, b) => (a - b) | 0,
    times: (a, b) => Math.imul(a, b),
    div: (a, b) => (b === 0 ? divisionByZero() : (a / b) | 0),
    rem: (a, b) => (b === 0 ? divisionByZero() : (a % b) | 0),
    negate: (a) => -a | 0,
  },
  long: {
    plus: (a, b) => BigInt.asIntN(64, a + b),
    minus: (a, b) => BigInt.asIntN(64, a - b),
    times: (a, b) => BigInt.asIntN(64, a * b),
    div: (a, b) => (b === 0n ? divisionByZero() : BigInt.asIntN(64, a / b)),
    rem: (a, b) => (b === 0n ? divisionByZero() : a % b),
    negate: (a) => BigInt.asIntN(64, -a),
  },
  float: {
    plus: (a, b) => Math.fround(a + b),
    minus: (a, b) => Math.fround(a - b),
    times: (a, b) => Math.fround(a * b),
    div: (a, b) => Math.fround(a / b),
    rem: (a, b) => Math.fround(a % b),
    negate: (a) => -a,
  },
  double: {
    plus: (a, b) => a + b,
    minus: (a, b) => a - b,
    times: (a, b) => a * b,
    div: (a, b) => a / b,
    rem: (a, b) => a % b,
    negate: (a) => -a,
  },
};

function arithmeticIn<R extends ComputeKind>(
  kind: R,
  op: ArithmeticOp,
  a: number | bigint,
  b: number | bigint
): Rep<R> {
  return ARITHMETIC[kind][op](convert(a, kind), convert(b, kind));
}

/**
 * Apply an arithmetic operator with binary numeric promotion.
 *
 * @example
 * ```typescript
 * arithmetic("plus", int(2147483647), int(1))  // -2147483648
 * arithmetic("div", int(7), double(2))         // 3.5
 * arithmetic("div", int(7), int(2))            // 3
 * ```
 */
export function arithmetic<A extends PrimitiveKind, B extends PrimitiveKind>(
  op: ArithmeticOp,
  a: Primitive<A>,
  b: Primitive<B>
): Rep<Promote<A, B>> {
  return arithmeticIn(promote(a.kind, b.kind), op, a.value, b.value);
}

/** Unary minus; the operand is unary-promoted first */
export function negate<K extends PrimitiveKind>(a: Primitive<K>): Rep<UnaryPromote<K>> {
  const kind = unaryPromote(a.kind);
  return ARITHMETIC[kind].negate(convert(a.value, kind));
}

/**
 * IEEE comparison after promotion: every comparison involving NaN is false.
 */
export function compareOp(op: ComparisonOp, a: Primitive, b: Primitive): boolean {
  const kind = promoteKind(a.kind, b.kind);
  const left = convert(a.value, kind);
  const right = convert(b.value, kind);
  switch (op) {
    case "lt":
      return left < right;
    case "le":
      return left <= right;
    case "gt":
      return left > right;
    case "ge":
      return left >= right;
    default:
      return unreachable(op);
  }
}

// ============================================================================
// Bitwise Operators
// ============================================================================

interface Bitwise<R> {
  and(a: R, b: R): R;
  or(a: R, b: R): R;
  xor(a: R, b: R): R;
  not(a: R): R;
  shl(a: R, distance: number): R;
  shr(a: R, distance: number): R;
  ushr(a: R, distance: number): R;
}

const BITWISE: { [K in "int" | "long"]: Bitwise<Rep<K>> } = {
  int: {
    and: (a, b) => a & b,
    or: (a, b) => a | b,
    xor: (a, b) => a ^ b,
    not: (a) => ~a,
    // JavaScript masks int shift distances to 5 bits already
    shl: (a, distance) => a << distance,
    shr: (a, distance) => a >> distance,
    ushr: (a, distance) => (a >>> distance) | 0,
  },
  long: {
    and: (a, b) => a & b,
    or: (a, b) => a | b,
    xor: (a, b) => a ^ b,
    not: (a) => ~a,
    shl: (a, distance) => BigInt.asIntN(64, a << BigInt(distance & 63)),
    shr: (a, distance) => a >> BigInt(distance & 63),
    ushr: (a, distance) => BigInt.asIntN(64, BigInt.asUintN(64, a) >> BigInt(distance & 63)),
  },
};

function integralUnary<K extends IntegralKind>(kind: K): "int" | "long" {
  return kind === "long" ? "long" : "int";
}

export function bitwise<A extends IntegralKind, B extends IntegralKind>(
  op: BitwiseOp,
  a: Primitive<A>,
  b: Primitive<B>
): Rep<IntegralPromote<A, B>> {
  const kind = integralPromote(a.kind, b.kind);
  return BITWISE[kind][op](convert(a.value, kind), convert(b.value, kind));
}

export function bitwiseNot<K extends IntegralKind>(a: Primitive<K>): Rep<UnaryPromote<K>> {
  const inverted =
    integralUnary(a.kind) === "long"
      ? BITWISE.long.not(convert(a.value, "long"))
      : BITWISE.int.not(toIntValue(a.value));
  return convert(inverted, unaryPromote(a.kind));
}

/**
 * Shift the left operand; the result has the left operand's promoted kind.
 * The distance is masked to 5 bits for int and 6 bits for long.
 */
export function shift<K extends IntegralKind>(
  op: ShiftOp,
  a: Primitive<K>,
  distance: Primitive<IntegralKind>
): Rep<UnaryPromote<K>> {
  const kind = unaryPromote(a.kind);
  const raw = distance.value;
  const bits = typeof raw === "bigint" ? Number(raw & 63n) : raw & 63;
  const shifted =
    integralUnary(a.kind) === "long"
      ? BITWISE.long[op](convert(a.value, "long"), bits)
      : BITWISE.int[op](toIntValue(a.value), bits & 31);
  return convert(shifted, kind);
}

// ============================================================================
// Ordering
// ============================================================================

/**
 * Total order on doubles: -0.0 sorts before 0.0, and NaN sorts after every
 * other value and equals itself.
 */
export function totalCompare(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;

  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) {
    if (aNaN && bNaN) return 0;
    return aNaN ? 1 : -1;
  }

  const aNegZero = Object.is(a, -0);
  const bNegZero = Object.is(b, -0);
  if (aNegZero === bNegZero) return 0;
  return aNegZero ? -1 : 1;
}

export function compareValues(a: number | bigint, b: number | bigint): number {
  if (typeof a === "number" && typeof b === "number") return totalCompare(a, b);
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Equality for instance values: IEEE equality, except that NaN equals NaN.
 */
export function sameValue(a: number | bigint, b: number | bigint): boolean {
  if (typeof a === "number" && typeof b === "number" && Number.isNaN(a)) {
    return Number.isNaN(b);
  }
  return a === b;
}

// ============================================================================
// Formatting
// ============================================================================

/** Shortest decimal digits that round-trip through binary32 */
function floatDigits(magnitude: number): string {
  for (let precision = 0; precision < 9; precision++) {
    const text = magnitude.toExponential(precision);
    if (Math.fround(Number(text)) === magnitude) return text;
  }
  return magnitude.toExponential(8);
}

/**
 * Render the shortest round-tripping digits in the canonical layout:
 * plain decimal for 10^-3 <= |v| < 10^7, otherwise computerized scientific
 * notation with an upper-case E. There is always a digit after the point.
 */
function formatFloating(value: number, kind: FloatingKind): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "Infinity";
  if (value === -Infinity) return "-Infinity";
  if (value === 0) return Object.is(value, -0) ? "-0.0" : "0.0";

  const sign = value < 0 ? "-" : "";
  const magnitude = Math.abs(value);
  const [mantissa, exponentText] = (
    kind === "float" ? floatDigits(magnitude) : magnitude.toExponential()
  ).split("e");
  const digits = mantissa.replace(".", "").replace(/0+$/, "") || "0";
  const exponent = Number(exponentText);

  if (exponent >= -3 && exponent < 7) {
    if (exponent < 0) {
      return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`;
    }
    const whole = digits.slice(0, exponent + 1).padEnd(exponent + 1, "0");
    const fraction = digits.slice(exponent + 1) || "0";
    return `${sign}${whole}.${fraction}`;
  }

  return `${sign}${digits[0]}.${digits.slice(1) || "0"}E${exponent}`;
}

/**
 * The canonical text of a primitive value.
 *
 * @example
 * ```typescript
 * formatPrimitive("double", 42)        // "42.0"
 * formatPrimitive("float", 0.1)        // "0.1" (0.1 rounded to binary32)
 * formatPrimitive("double", 1e7)       // "1.0E7"
 * formatPrimitive("char", 55)          // "7"
 * formatPrimitive("long", 5n)          // "5"
 * ```
 */
export function formatPrimitive(kind: PrimitiveKind, value: number | bigint): string {
  if (typeof value === "bigint") return value.toString();
  switch (kind) {
    case "char":
      return String.fromCharCode(value);
    case "float":
    case "double":
      return formatFloating(value, kind);
    default:
      return String(value);
  }
}

// ============================================================================
// Operand Helpers
// ============================================================================

export function isPrimitive(value: unknown): value is Primitive {
  return typeof value === "object" && value !== null && "kind" in value && "value" in value;
}

/** The raw value of an operand given either raw or typed */
export function primitiveValue<K extends PrimitiveKind>(operand: Rep<K> | Primitive<K>): Rep<K> {
  return isPrimitive(operand) ? operand.value : operand;
}
