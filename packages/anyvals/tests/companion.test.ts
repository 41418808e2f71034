/**
 * Tests for the construction paths and bounds of the refinement types
 */

import { describe, it, expect } from "vitest";
import { InvariantError } from "@refinum/core";
import {
  FLOAT_MAX,
  FLOAT_MIN_POSITIVE,
  INT_MAX,
  INT_MIN,
  LONG_MAX,
  NonZeroDouble,
  NonZeroInt,
  NumericChar,
  Pass,
  PosDouble,
  PosFiniteDouble,
  PosFloat,
  PosInt,
  PosLong,
  PosZDouble,
  PosZFiniteDouble,
  PosZFloat,
  PosZInt,
  isFailure,
  isGood,
} from "@refinum/anyvals";

describe("literal application", () => {
  it("should wrap a valid literal", () => {
    expect(PosInt(42).value).toBe(42);
    expect(PosLong(5n).value).toBe(5n);
    expect(PosFloat(0.1).value).toBe(Math.fround(0.1));
    expect(NumericChar("4").value).toBe(52);
  });

  it("should reject an invalid value at run time with the literal message", () => {
    expect(() => Reflect.apply(PosInt, undefined, [0])).toThrow(
      "PosInt(...) can only be invoked on a positive (x > 0) literal, like PosInt(42)."
    );
    expect(() => Reflect.apply(PosInt, undefined, [0])).toThrow(InvariantError);
  });

  it("should expose the type name and kind", () => {
    expect(PosZDouble.typeName).toBe("PosZDouble");
    expect(PosZDouble.kind).toBe("double");
    expect(NumericChar.kind).toBe("char");
  });
});

describe("from", () => {
  it("should accept the boundary of a non-negative type", () => {
    const zero = PosZDouble.from(0.0);
    expect(zero).toBeDefined();
    expect(zero?.value).toBe(0);
    expect(PosZDouble.from(-0.00001)).toBeUndefined();
  });

  it("should reject values that are not exact values of the kind", () => {
    expect(PosInt.from(0)).toBeUndefined();
    expect(PosInt.from(1.5)).toBeUndefined();
    expect(PosInt.from(2 ** 31)).toBeUndefined();
    expect(PosInt.from(-0)).toBeUndefined();
    expect(PosInt.from(INT_MAX)?.value).toBe(INT_MAX);
  });

  it("should take a long as a bigint or an integral number", () => {
    expect(PosLong.from(5)?.value).toBe(5n);
    expect(PosLong.from(2 ** 53)?.value).toBe(2n ** 53n);
    expect(PosLong.from(1.5)).toBeUndefined();
    expect(PosLong.from(2n ** 63n)).toBeUndefined();
  });

  it("should round float inputs to binary32 before checking", () => {
    expect(PosFloat.from(0.1)?.value).toBe(Math.fround(0.1));
    expect(PosFloat.from(1e-50)).toBeUndefined();
  });

  it("should convert a bigint input for the floating types", () => {
    expect(PosZDouble.from(8n)?.value).toBe(8);
    expect(PosZDouble(8n).value).toBe(8);
    expect(PosFloat.ensuringValid(2n ** 60n).value).toBe(2 ** 60);
    expect(PosFloat.from(2n ** 24n + 1n)?.value).toBe(2 ** 24);
    expect(PosDouble.from(0n)).toBeUndefined();
    expect(() => PosDouble.ensuringValid(-2n)).toThrow("-2 was not a valid PosDouble");
  });

  it("should admit infinities only into the non-finite types", () => {
    expect(PosFloat.from(Infinity)?.value).toBe(Infinity);
    expect(PosDouble.from(Infinity)?.value).toBe(Infinity);
    expect(PosFiniteDouble.from(Infinity)).toBeUndefined();
    expect(PosZFiniteDouble.from(Infinity)).toBeUndefined();
    expect(PosZFiniteDouble.from(0)?.value).toBe(0);
  });

  it("should admit NaN only into the non-zero types", () => {
    expect(NonZeroDouble.from(Number.NaN)?.value).toBeNaN();
    expect(PosDouble.from(Number.NaN)).toBeUndefined();
    expect(PosZDouble.from(Number.NaN)).toBeUndefined();
  });

  it("should take a numeric char as a digit or a code", () => {
    expect(NumericChar.from("7")?.value).toBe(55);
    expect(NumericChar.from(48)?.value).toBe(48);
    expect(NumericChar.from("a")).toBeUndefined();
    expect(NumericChar.from("45")).toBeUndefined();
  });
});

describe("ensuringValid", () => {
  it("should return the instance for a valid value", () => {
    expect(PosInt.ensuringValid(3).value).toBe(3);
  });

  it("should throw an InvariantError naming the value and type", () => {
    expect(() => PosInt.ensuringValid(0)).toThrow(InvariantError);
    expect(() => PosInt.ensuringValid(0)).toThrow("0 was not a valid PosInt");
    expect(() => NumericChar.ensuringValid("x")).toThrow('"x" was not a valid NumericChar');
  });
});

describe("fallback and result paths", () => {
  it("should fall back to the default", () => {
    expect(PosInt.fromOrElse(-1, PosInt(1)).value).toBe(1);
    expect(PosInt.fromOrElse(7, PosInt(1)).value).toBe(7);
  });

  it("should produce Good or Bad", () => {
    const good = PosInt.goodOrElse(5, (n) => `${n} is not positive`);
    expect(isGood(good) && good.value.value).toBe(5);
    expect(PosInt.goodOrElse(-5, (n) => `${n} is not positive`)).toEqual({
      _tag: "Bad",
      error: "-5 is not positive",
    });
  });

  it("should produce Pass or Fail", () => {
    expect(PosInt.passOrElse(5, (n) => `${n}!`)).toBe(Pass);
    expect(PosInt.passOrElse(0, (n) => `${n}!`)).toEqual({ _tag: "Fail", error: "0!" });
  });

  it("should produce Success or Failure", () => {
    const success = PosInt.tryingValid(5);
    expect(success._tag).toBe("Success");

    const failure = PosInt.tryingValid(0);
    expect(isFailure(failure)).toBe(true);
    if (isFailure(failure)) {
      expect(failure.error).toBeInstanceOf(InvariantError);
      expect(failure.error.message).toBe("0 was not a valid PosInt");
    }
  });

  it("should report validity", () => {
    expect(PosZInt.isValid(0)).toBe(true);
    expect(PosZInt.isValid(-1)).toBe(false);
  });
});

describe("bounds", () => {
  it("should cache MinValue and MaxValue as instances", () => {
    expect(PosInt.MinValue.value).toBe(1);
    expect(PosInt.MaxValue.value).toBe(INT_MAX);
    expect(NonZeroInt.MinValue.value).toBe(INT_MIN);
    expect(PosLong.MaxValue.value).toBe(LONG_MAX);
    expect(PosFloat.MinValue.value).toBe(FLOAT_MIN_POSITIVE);
    expect(PosDouble.MinValue.value).toBe(Number.MIN_VALUE);
    expect(NumericChar.MinValue.toString()).toBe("NumericChar(0)");
    expect(NumericChar.MaxValue.toString()).toBe("NumericChar(9)");
  });

  it("should match the instance built from the largest float", () => {
    expect(PosZFloat.MaxValue.equals(PosZFloat.from(FLOAT_MAX))).toBe(true);
    expect(PosFloat.MaxValue.equals(PosFloat.from(FLOAT_MAX))).toBe(true);
  });
});

describe("ordering and equality", () => {
  it("should sort instances with compare", () => {
    const values = [2.2, 0, 1.1, 3.3].map((v) => PosZDouble.ensuringValid(v));
    expect(values.sort(PosZDouble.compare).map((v) => v.value)).toEqual([0, 1.1, 2.2, 3.3]);
  });

  it("should sort -0.0 before 0.0", () => {
    const values = [PosZDouble.ensuringValid(0), PosZDouble.ensuringValid(-0)];
    expect(values.sort(PosZDouble.compare).map((v) => Object.is(v.value, -0))).toEqual([true, false]);
  });

  it("should sort NaN last", () => {
    const values = [Number.NaN, 1, -1].map((v) => NonZeroDouble.ensuringValid(v));
    expect(values.sort(NonZeroDouble.compare).map((v) => v.toString())).toEqual([
      "NonZeroDouble(-1.0)",
      "NonZeroDouble(1.0)",
      "NonZeroDouble(NaN)",
    ]);
  });

  it("should compare type and value for equality", () => {
    expect(PosInt(3).equals(PosInt(3))).toBe(true);
    expect(PosInt(3).equals(PosZInt(3))).toBe(false);
    expect(PosInt(3).equals(3)).toBe(false);
    expect(PosInt.equal(PosInt(3), PosInt(4))).toBe(false);
    expect(NonZeroDouble.from(Number.NaN)?.equals(NonZeroDouble.from(Number.NaN))).toBe(true);
  });

  it("should freeze instances and companions", () => {
    expect(Object.isFrozen(PosInt(1))).toBe(true);
    expect(Object.isFrozen(PosInt)).toBe(true);
  });
});

describe("toString", () => {
  it("should print the type name and the canonical value", () => {
    expect(PosInt(42).toString()).toBe("PosInt(42)");
    expect(PosLong(42n).toString()).toBe("PosLong(42)");
    expect(PosZDouble(42.0).toString()).toBe("PosZDouble(42.0)");
    expect(PosFloat(0.1).toString()).toBe("PosFloat(0.1)");
    expect(PosZDouble(1e7).toString()).toBe("PosZDouble(1.0E7)");
    expect(NumericChar("7").toString()).toBe("NumericChar(7)");
    expect(`${PosInt(5)}`).toBe("PosInt(5)");
  });
});
