/**
 * Every refinement type against every kind of right-hand operand.
 *
 * Each operator result is checked against a reference computed from the
 * promotion rules: promote both sides, then wrap integral results to 32 or
 * 64 bits with exact bigint arithmetic, and round float results once.
 */

import { describe, it, expect } from "vitest";
import {
  INT_MAX,
  INT_MIN,
  LONG_MAX,
  LONG_MIN,
  NonZeroDouble,
  NonZeroFloat,
  NonZeroInt,
  NonZeroLong,
  NumericChar,
  PosDouble,
  PosFiniteDouble,
  PosFloat,
  PosInt,
  PosLong,
  PosZDouble,
  PosZFiniteDouble,
  PosZFloat,
  PosZInt,
  PosZLong,
  byte,
  char,
  double,
  float,
  int,
  long,
  short,
  type AnyVal,
  type AnyValName,
  type ArithmeticOp,
  type BitwiseOp,
  type ComparisonOp,
  type IntegralName,
  type IntegralPeer,
  type Peer,
  type Primitive,
  type PrimitiveKind,
  type ShiftOp,
} from "@refinum/anyvals";

// ============================================================================
// Reference Model
// ============================================================================

type ResultKind = "int" | "long" | "float" | "double";

const RANK: Record<PrimitiveKind, number> = { byte: 0, short: 0, char: 0, int: 0, long: 1, float: 2, double: 3 };
const BY_RANK: readonly ResultKind[] = ["int", "long", "float", "double"];

function resultKind(a: PrimitiveKind, b: PrimitiveKind): ResultKind {
  return BY_RANK[Math.max(RANK[a], RANK[b])];
}

function operandOf(peer: Peer): Primitive {
  if (typeof peer === "number") return { kind: "double", value: peer };
  if (typeof peer === "bigint") return { kind: "long", value: peer };
  return peer;
}

function wrap(value: bigint, bits: 32 | 64): bigint {
  const size = 1n << BigInt(bits);
  const half = size >> 1n;
  return ((((value + half) % size) + size) % size) - half;
}

function unsigned(value: bigint, bits: 32 | 64): bigint {
  const size = 1n << BigInt(bits);
  return ((value % size) + size) % size;
}

function exactOp(op: ArithmeticOp, a: bigint, b: bigint): bigint {
  switch (op) {
    case "plus":
      return a + b;
    case "minus":
      return a - b;
    case "times":
      return a * b;
    case "div":
      return a / b;
    case "rem":
      return a % b;
  }
}

function doubleOp(op: ArithmeticOp, a: number, b: number): number {
  switch (op) {
    case "plus":
      return a + b;
    case "minus":
      return a - b;
    case "times":
      return a * b;
    case "div":
      return a / b;
    case "rem":
      return a % b;
  }
}

function referenceArithmetic(op: ArithmeticOp, a: Primitive, b: Primitive): number | bigint {
  switch (resultKind(a.kind, b.kind)) {
    case "int":
      return Number(wrap(exactOp(op, BigInt(a.value), BigInt(b.value)), 32));
    case "long":
      return wrap(exactOp(op, BigInt(a.value), BigInt(b.value)), 64);
    case "float":
      return Math.fround(doubleOp(op, Math.fround(Number(a.value)), Math.fround(Number(b.value))));
    case "double":
      return doubleOp(op, Number(a.value), Number(b.value));
  }
}

function compareIn(op: ComparisonOp, a: number | bigint, b: number | bigint): boolean {
  switch (op) {
    case "lt":
      return a < b;
    case "le":
      return a <= b;
    case "gt":
      return a > b;
    case "ge":
      return a >= b;
  }
}

function referenceCompare(op: ComparisonOp, a: Primitive, b: Primitive): boolean {
  switch (resultKind(a.kind, b.kind)) {
    case "int":
    case "long":
      return compareIn(op, BigInt(a.value), BigInt(b.value));
    case "float":
      return compareIn(op, Math.fround(Number(a.value)), Math.fround(Number(b.value)));
    case "double":
      return compareIn(op, Number(a.value), Number(b.value));
  }
}

function integralResult(value: bigint, bits: 32 | 64): number | bigint {
  return bits === 32 ? Number(wrap(value, 32)) : wrap(value, 64);
}

function referenceBitwise(op: BitwiseOp, a: Primitive, b: Primitive): number | bigint {
  const bits = a.kind === "long" || b.kind === "long" ? 64 : 32;
  const x = BigInt(a.value);
  const y = BigInt(b.value);
  switch (op) {
    case "and":
      return integralResult(x & y, bits);
    case "or":
      return integralResult(x | y, bits);
    case "xor":
      return integralResult(x ^ y, bits);
  }
}

function referenceShift(op: ShiftOp, a: Primitive, distance: Primitive): number | bigint {
  const bits = a.kind === "long" ? 64 : 32;
  const x = BigInt(a.value);
  const by = BigInt(distance.value) & BigInt(bits - 1);
  switch (op) {
    case "shl":
      return integralResult(x << by, bits);
    case "shr":
      return integralResult(x >> by, bits);
    case "ushr":
      return integralResult(unsigned(x, bits) >> by, bits);
  }
}

// ============================================================================
// Subjects and Peers
// ============================================================================

interface Subject {
  readonly instance: Primitive;
  readonly label: string;
  arithmetic(op: ArithmeticOp, peer: Peer): number | bigint;
  compare(op: ComparisonOp, peer: Peer): boolean;
}

interface IntegralSubject extends Subject {
  bitwise(op: BitwiseOp, peer: IntegralPeer): number | bigint;
  shift(op: ShiftOp, distance: IntegralPeer): number | bigint;
}

function subject<N extends AnyValName>(instance: AnyVal<N>): Subject {
  return {
    instance,
    label: instance.toString(),
    arithmetic(op, peer) {
      switch (op) {
        case "plus":
          return instance.plus(peer);
        case "minus":
          return instance.minus(peer);
        case "times":
          return instance.times(peer);
        case "div":
          return instance.div(peer);
        case "rem":
          return instance.rem(peer);
      }
    },
    compare(op, peer) {
      switch (op) {
        case "lt":
          return instance.lt(peer);
        case "le":
          return instance.le(peer);
        case "gt":
          return instance.gt(peer);
        case "ge":
          return instance.ge(peer);
      }
    },
  };
}

function integralSubject<N extends IntegralName>(instance: AnyVal<N>): IntegralSubject {
  return {
    ...subject(instance),
    bitwise(op, peer) {
      switch (op) {
        case "and":
          return instance.and(peer);
        case "or":
          return instance.or(peer);
        case "xor":
          return instance.xor(peer);
      }
    },
    shift(op, distance) {
      switch (op) {
        case "shl":
          return instance.shl(distance);
        case "shr":
          return instance.shr(distance);
        case "ushr":
          return instance.ushr(distance);
      }
    },
  };
}

const INTEGRAL_SUBJECTS: readonly IntegralSubject[] = [
  integralSubject(PosInt(7)),
  integralSubject(PosInt.ensuringValid(INT_MAX)),
  integralSubject(PosZInt(0)),
  integralSubject(PosZInt(9)),
  integralSubject(NonZeroInt(-7)),
  integralSubject(NonZeroInt.ensuringValid(INT_MIN)),
  integralSubject(PosLong(7n)),
  integralSubject(PosLong.ensuringValid(LONG_MAX)),
  integralSubject(PosZLong(0n)),
  integralSubject(NonZeroLong(-9n)),
  integralSubject(NonZeroLong.ensuringValid(LONG_MIN)),
  integralSubject(NumericChar("7")),
  integralSubject(NumericChar("0")),
];

const FLOATING_SUBJECTS: readonly Subject[] = [
  subject(PosFloat(2.5)),
  subject(PosZFloat(0)),
  subject(PosZFloat(1.5)),
  subject(NonZeroFloat(-2.25)),
  subject(PosDouble(2.5)),
  subject(PosDouble.ensuringValid(Number.MAX_VALUE)),
  subject(PosZDouble(0.5)),
  subject(PosFiniteDouble(3.75)),
  subject(PosZFiniteDouble(0)),
  subject(NonZeroDouble(-0.125)),
  subject(NonZeroDouble.ensuringValid(Number.NaN)),
];

const INTEGRAL_PEERS: readonly IntegralPeer[] = [
  byte(-3),
  short(300),
  char("2"),
  int(-6),
  long(5n),
  3n,
  PosInt(4),
  PosLong(6n),
  NumericChar("3"),
];

const PEERS: readonly Peer[] = [
  ...INTEGRAL_PEERS,
  float(0.75),
  double(-1.5),
  2.5,
  PosFloat(0.5),
  PosDouble(1.25),
];

const ARITHMETIC_OPS: readonly ArithmeticOp[] = ["plus", "minus", "times", "div", "rem"];
const COMPARISON_OPS: readonly ComparisonOp[] = ["lt", "le", "gt", "ge"];
const BITWISE_OPS: readonly BitwiseOp[] = ["and", "or", "xor"];
const SHIFT_OPS: readonly ShiftOp[] = ["shl", "shr", "ushr"];

function describePeer(peer: Peer): string {
  if (typeof peer === "number") return String(peer);
  if (typeof peer === "bigint") return `${peer}n`;
  return `${peer.kind} ${String(peer.value)}`;
}

// ============================================================================
// Tests
// ============================================================================

const ALL_SUBJECTS: readonly Subject[] = [...INTEGRAL_SUBJECTS, ...FLOATING_SUBJECTS];

for (const s of ALL_SUBJECTS) {
  describe(s.label, () => {
    it("should promote and compute every arithmetic operator", () => {
      for (const peer of PEERS) {
        for (const op of ARITHMETIC_OPS) {
          const expected = referenceArithmetic(op, s.instance, operandOf(peer));
          expect(s.arithmetic(op, peer), `${s.label}.${op}(${describePeer(peer)})`).toBe(expected);
        }
      }
    });

    it("should compare against every peer after promotion", () => {
      for (const peer of PEERS) {
        for (const op of COMPARISON_OPS) {
          const expected = referenceCompare(op, s.instance, operandOf(peer));
          expect(s.compare(op, peer), `${s.label}.${op}(${describePeer(peer)})`).toBe(expected);
        }
      }
    });
  });
}

for (const s of INTEGRAL_SUBJECTS) {
  describe(`${s.label} bitwise`, () => {
    it("should apply every bitwise operator", () => {
      for (const peer of INTEGRAL_PEERS) {
        for (const op of BITWISE_OPS) {
          const expected = referenceBitwise(op, s.instance, operandOf(peer));
          expect(s.bitwise(op, peer), `${s.label}.${op}(${describePeer(peer)})`).toBe(expected);
        }
      }
    });

    it("should shift by every masked distance", () => {
      for (const distance of INTEGRAL_PEERS) {
        for (const op of SHIFT_OPS) {
          const expected = referenceShift(op, s.instance, operandOf(distance));
          expect(s.shift(op, distance), `${s.label}.${op}(${describePeer(distance)})`).toBe(expected);
        }
      }
    });
  });
}

describe("result kinds", () => {
  it("should widen int arithmetic to the operand's kind", () => {
    expect(PosInt(7).plus(long(5n))).toBe(12n);
    expect(PosInt(7).div(int(2))).toBe(3);
    expect(PosInt(7).div(float(2))).toBe(3.5);
    expect(NumericChar("7").plus(char("2"))).toBe(105);
  });

  it("should wrap at the width of the promoted kind", () => {
    expect(PosInt.ensuringValid(INT_MAX).plus(int(1))).toBe(INT_MIN);
    expect(PosInt.ensuringValid(INT_MAX).plus(1n)).toBe(2n ** 31n);
    expect(NonZeroLong.ensuringValid(LONG_MIN).minus(1n)).toBe(LONG_MAX);
  });
});
