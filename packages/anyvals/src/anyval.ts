/**
 * Refinement Type Instances
 *
 * An `AnyVal<N>` is an immutable wrapper around a primitive value that is
 * known to satisfy the predicate of the refinement type `N`. Instances are
 * only created by the type's companion (see `defineAnyVal`), so holding one
 * is proof of validity.
 *
 * Operators return raw primitives, exactly what the same operation on the
 * underlying primitive would produce; they never re-validate:
 *
 * ```typescript
 * const x = PosInt(2147483647);
 * x.plus(int(1));   // -2147483648 (int overflow wraps)
 * x.plus(1);        // 2147483648 (a bare number is a double)
 * x.div(int(2));    // 1073741823
 * ```
 *
 * Floating types add rounding operations whose results are refined to the
 * narrowest type their table entry declares:
 *
 * ```typescript
 * PosFloat(2.5).round()       // PosZInt(3)
 * PosDouble(0.5).floor()      // PosZDouble(0.0)
 * NonZeroDouble(-2.5).round() // -2n
 * ```
 */

import { InvariantError, invariant } from "@refinum/core";
import {
  arithmetic,
  bitwise,
  bitwiseNot,
  compareOp,
  convert,
  formatPrimitive,
  integralPeerPrimitive,
  negate as negatePrimitive,
  peerPrimitive,
  primitiveValue,
  sameValue,
  shift,
  type ComputeKind,
  type IntegralPeer,
  type IntegralPeerKind,
  type IntegralPromote,
  type Peer,
  type PeerKind,
  type Primitive,
  type PrimitiveKind,
  type Promote,
  type Rep,
  type UnaryPromote,
} from "./primitives.js";
import { NumericRange } from "./range.js";
import { getDefinition } from "./registry.js";
import type {
  AnyValName,
  FloatingName,
  IntegralName,
  KindOf,
  RoundingOp,
  RoundingResult,
  RoundingTarget,
  WidensTo,
} from "./table.js";

const INSTANCE: unique symbol = Symbol("refinum.AnyVal");

const DEGREES_TO_RADIANS = 0.017453292519943295;
const RADIANS_TO_DEGREES = 57.29577951308232;

/** The raw operation behind each rounding method, computed in double */
export const ROUNDING_OPERATIONS: Readonly<Record<RoundingOp, (value: number) => number>> = {
  round: Math.round,
  ceil: Math.ceil,
  floor: Math.floor,
  toRadians: (value) => value * DEGREES_TO_RADIANS,
  toDegrees: (value) => value * RADIANS_TO_DEGREES,
};

/** A rounding result: an instance for a type name, a raw value for a kind */
export type Produce<T> = T extends AnyValName ? AnyVal<T> : T extends PrimitiveKind ? Rep<T> : never;

/** The part of a companion that `widen` needs */
export interface WideningTarget<T extends AnyValName> {
  readonly typeName: T;
  readonly kind: KindOf<T>;
}

// ============================================================================
// AnyVal
// ============================================================================

export class AnyVal<N extends AnyValName, K extends PrimitiveKind = KindOf<N>> implements Primitive<K> {
  readonly typeName: N;
  readonly kind: K;
  readonly value: Rep<K>;

  /** @internal Use the type's companion to create instances */
  constructor(token: typeof INSTANCE, typeName: N, kind: K, value: Rep<K>) {
    if (token !== INSTANCE) {
      throw new InvariantError(`${typeName} instances are created through ${typeName}.from`);
    }
    this.typeName = typeName;
    this.kind = kind;
    this.value = value;
    Object.freeze(this);
  }

  // --------------------------------------------------------------------------
  // Conversions
  // --------------------------------------------------------------------------

  toByte(): number {
    return convert(this.value, "byte");
  }

  toShort(): number {
    return convert(this.value, "short");
  }

  /** The value as a UTF-16 code unit */
  toChar(): number {
    return convert(this.value, "char");
  }

  toInt(): number {
    return convert(this.value, "int");
  }

  toLong(): bigint {
    return convert(this.value, "long");
  }

  toFloat(): number {
    return convert(this.value, "float");
  }

  toDouble(): number {
    return convert(this.value, "double");
  }

  /** e.g. `PosInt(42)`, `PosZDouble(42.0)`, `NumericChar(4)` */
  toString(): string {
    return `${this.typeName}(${formatPrimitive(this.kind, this.value)})`;
  }

  /** Same type and same value; NaN equals NaN */
  equals(that: unknown): boolean {
    return that instanceof AnyVal && that.typeName === this.typeName && sameValue(this.value, that.value);
  }

  // --------------------------------------------------------------------------
  // Unary Operators
  // --------------------------------------------------------------------------

  unaryPlus(): this {
    return this;
  }

  negate(): Rep<UnaryPromote<K>> {
    return negatePrimitive(this);
  }

  /** Bitwise complement */
  not<M extends IntegralName>(this: AnyVal<M>): Rep<UnaryPromote<KindOf<M>>> {
    return bitwiseNot(this);
  }

  /** String concatenation of the underlying value */
  concat(suffix: string): string {
    return formatPrimitive(this.kind, this.value) + suffix;
  }

  // --------------------------------------------------------------------------
  // Comparison Operators
  // --------------------------------------------------------------------------

  lt(that: Peer): boolean {
    return compareOp("lt", this, peerPrimitive(that));
  }

  le(that: Peer): boolean {
    return compareOp("le", this, peerPrimitive(that));
  }

  gt(that: Peer): boolean {
    return compareOp("gt", this, peerPrimitive(that));
  }

  ge(that: Peer): boolean {
    return compareOp("ge", this, peerPrimitive(that));
  }

  // --------------------------------------------------------------------------
  // Arithmetic Operators
  // --------------------------------------------------------------------------

  plus<P extends Peer>(that: P): Rep<Promote<K, PeerKind<P>>> {
    return arithmetic("plus", this, peerPrimitive(that));
  }

  minus<P extends Peer>(that: P): Rep<Promote<K, PeerKind<P>>> {
    return arithmetic("minus", this, peerPrimitive(that));
  }

  times<P extends Peer>(that: P): Rep<Promote<K, PeerKind<P>>> {
    return arithmetic("times", this, peerPrimitive(that));
  }

  /** Integral division truncates and throws a RangeError on a zero divisor */
  div<P extends Peer>(that: P): Rep<Promote<K, PeerKind<P>>> {
    return arithmetic("div", this, peerPrimitive(that));
  }

  rem<P extends Peer>(that: P): Rep<Promote<K, PeerKind<P>>> {
    return arithmetic("rem", this, peerPrimitive(that));
  }

  // --------------------------------------------------------------------------
  // Bitwise Operators
  // --------------------------------------------------------------------------

  and<M extends IntegralName, P extends IntegralPeer>(
    this: AnyVal<M>,
    that: P
  ): Rep<IntegralPromote<KindOf<M>, IntegralPeerKind<P>>> {
    return bitwise("and", this, integralPeerPrimitive(that));
  }

  or<M extends IntegralName, P extends IntegralPeer>(
    this: AnyVal<M>,
    that: P
  ): Rep<IntegralPromote<KindOf<M>, IntegralPeerKind<P>>> {
    return bitwise("or", this, integralPeerPrimitive(that));
  }

  xor<M extends IntegralName, P extends IntegralPeer>(
    this: AnyVal<M>,
    that: P
  ): Rep<IntegralPromote<KindOf<M>, IntegralPeerKind<P>>> {
    return bitwise("xor", this, integralPeerPrimitive(that));
  }

  /** Left shift; the distance is masked to 5 bits (int) or 6 bits (long) */
  shl<M extends IntegralName>(this: AnyVal<M>, distance: IntegralPeer): Rep<UnaryPromote<KindOf<M>>> {
    return shift("shl", this, integralPeerPrimitive(distance));
  }

  /** Arithmetic (sign-extending) right shift */
  shr<M extends IntegralName>(this: AnyVal<M>, distance: IntegralPeer): Rep<UnaryPromote<KindOf<M>>> {
    return shift("shr", this, integralPeerPrimitive(distance));
  }

  /** Logical (zero-filling) right shift */
  ushr<M extends IntegralName>(this: AnyVal<M>, distance: IntegralPeer): Rep<UnaryPromote<KindOf<M>>> {
    return shift("ushr", this, integralPeerPrimitive(distance));
  }

  // --------------------------------------------------------------------------
  // Min / Max / Ranges
  // --------------------------------------------------------------------------

  /** The smaller of the two; `this` on a tie */
  min(that: AnyVal<N, K>): AnyVal<N, K> {
    return compareOp("gt", this, that) ? that : this;
  }

  /** The larger of the two; `this` on a tie */
  max(that: AnyVal<N, K>): AnyVal<N, K> {
    return compareOp("lt", this, that) ? that : this;
  }

  /** The inclusive range from this value to `end` */
  to(end: Rep<K> | Primitive<K>, step?: Rep<K> | Primitive<K>): NumericRange<K> {
    return this.range(end, step, true);
  }

  /** The range from this value up to, but excluding, `end` */
  until(end: Rep<K> | Primitive<K>, step?: Rep<K> | Primitive<K>): NumericRange<K> {
    return this.range(end, step, false);
  }

  private range(
    end: Rep<K> | Primitive<K>,
    step: Rep<K> | Primitive<K> | undefined,
    inclusive: boolean
  ): NumericRange<K> {
    const range = NumericRange.of(this.kind, this.value, primitiveValue(end), inclusive);
    return step === undefined ? range : range.by(primitiveValue(step));
  }

  // --------------------------------------------------------------------------
  // Widening
  // --------------------------------------------------------------------------

  /**
   * Convert to a wider refinement type. Only the types this type declares
   * as widening targets are accepted, and the conversion cannot fail.
   *
   * @example
   * ```typescript
   * PosInt(3).widen(PosZLong)  // PosZLong(3)
   * PosInt(3).widen(NonZeroDouble) // NonZeroDouble(3.0)
   * ```
   */
  widen<T extends WidensTo<N>>(target: WideningTarget<T>): AnyVal<T> {
    const value = convert(this.value, target.kind);
    invariant(
      getDefinition(target.typeName).accepts(value),
      () => `${this} does not widen to ${target.typeName}`
    );
    return createInstance(target.typeName, target.kind, value);
  }

  // --------------------------------------------------------------------------
  // Floating-Point Operations
  // --------------------------------------------------------------------------

  /** Whether the value is a finite whole number */
  isWhole<M extends FloatingName>(this: AnyVal<M>): boolean {
    return Number.isInteger(this.toDouble());
  }

  isPosInfinity<M extends FloatingName>(this: AnyVal<M>): boolean {
    return this.toDouble() === Infinity;
  }

  isNegInfinity<M extends FloatingName>(this: AnyVal<M>): boolean {
    return this.toDouble() === -Infinity;
  }

  /** Nearest whole number, ties toward positive infinity, saturated to int (float) or long (double) */
  round<M extends FloatingName>(this: AnyVal<M>): Produce<RoundingResult<M, "round">> {
    return produce<RoundingResult<M, "round">>(
      this.roundingTarget("round"),
      ROUNDING_OPERATIONS.round(this.toDouble())
    );
  }

  ceil<M extends FloatingName>(this: AnyVal<M>): Produce<RoundingResult<M, "ceil">> {
    return produce<RoundingResult<M, "ceil">>(
      this.roundingTarget("ceil"),
      ROUNDING_OPERATIONS.ceil(this.toDouble())
    );
  }

  floor<M extends FloatingName>(this: AnyVal<M>): Produce<RoundingResult<M, "floor">> {
    return produce<RoundingResult<M, "floor">>(
      this.roundingTarget("floor"),
      ROUNDING_OPERATIONS.floor(this.toDouble())
    );
  }

  toRadians<M extends FloatingName>(this: AnyVal<M>): Produce<RoundingResult<M, "toRadians">> {
    return produce<RoundingResult<M, "toRadians">>(
      this.roundingTarget("toRadians"),
      ROUNDING_OPERATIONS.toRadians(this.toDouble())
    );
  }

  toDegrees<M extends FloatingName>(this: AnyVal<M>): Produce<RoundingResult<M, "toDegrees">> {
    return produce<RoundingResult<M, "toDegrees">>(
      this.roundingTarget("toDegrees"),
      ROUNDING_OPERATIONS.toDegrees(this.toDouble())
    );
  }

  private roundingTarget(op: RoundingOp): RoundingTarget {
    const rounding = getDefinition(this.typeName).rounding;
    invariant(rounding !== undefined, `${this.typeName} declares no rounding targets`);
    return rounding[op];
  }
}

// ============================================================================
// Construction
// ============================================================================

/**
 * @internal Wrap a value already known to satisfy the type's predicate.
 */
export function createInstance<N extends AnyValName>(
  typeName: N,
  kind: KindOf<N>,
  value: Rep<KindOf<N>>
): AnyVal<N> {
  return new AnyVal(INSTANCE, typeName, kind, value);
}

const COMPUTE_KINDS: ReadonlySet<string> = new Set<ComputeKind>(["int", "long", "float", "double"]);

function isComputeKind(target: RoundingTarget): target is ComputeKind {
  return COMPUTE_KINDS.has(target);
}

/*
 * The rounding result type is read from the table while the target is read
 * from the registered binding; defineAnyVal checks that the two agree, so
 * the overload states the table type for the erased runtime value.
 */
function produce<T>(target: RoundingTarget, raw: number): Produce<T>;
function produce(target: RoundingTarget, raw: number): number | bigint | AnyVal<AnyValName, PrimitiveKind> {
  if (isComputeKind(target)) {
    return convert(raw, target);
  }
  const definition = getDefinition(target);
  const value = convert(raw, definition.kind);
  invariant(definition.accepts(value), () => `${formatPrimitive(definition.kind, value)} is not a valid ${target}`);
  return new AnyVal(INSTANCE, target, definition.kind, value);
}
