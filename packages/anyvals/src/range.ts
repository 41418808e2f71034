/**
 * Numeric Ranges
 *
 * `PosInt(1).to(10)` and `PosInt(1).until(10, 3)` produce a NumericRange:
 * a lazy, restartable sequence `start, start + step, start + 2*step, ...`
 * that stops once the end is passed. Elements are computed from the index,
 * never accumulated, so float ranges do not drift.
 */

import { coerce, convert, formatPrimitive, type Input, type PrimitiveKind, type Rep } from "./primitives.js";

// ============================================================================
// Per-Kind Stepping
// ============================================================================

interface Stepping<R> {
  /** Element `index` of a range starting at `start` */
  at(start: R, step: R, index: number): R;
  /** Whether `value` lies past `end` in the direction of travel */
  passed(value: R, end: R, ascending: boolean, inclusive: boolean): boolean;
  isZero(step: R): boolean;
  isPositive(step: R): boolean;
}

function numberStepping(round: (value: number) => number): Stepping<number> {
  return {
    at: (start, step, index) => round(start + index * step),
    passed: (value, end, ascending, inclusive) =>
      ascending
        ? inclusive
          ? value > end
          : value >= end
        : inclusive
          ? value < end
          : value <= end,
    isZero: (step) => step === 0,
    isPositive: (step) => step > 0,
  };
}

const identity = (value: number): number => value;

const bigintStepping: Stepping<bigint> = {
  at: (start, step, index) => start + BigInt(index) * step,
  passed: (value, end, ascending, inclusive) =>
    ascending
      ? inclusive
        ? value > end
        : value >= end
      : inclusive
        ? value < end
        : value <= end,
  isZero: (step) => step === 0n,
  isPositive: (step) => step > 0n,
};

const STEPPING: { [K in PrimitiveKind]: Stepping<Rep<K>> } = {
  byte: numberStepping(identity),
  short: numberStepping(identity),
  char: numberStepping(identity),
  int: numberStepping(identity),
  long: bigintStepping,
  float: numberStepping(Math.fround),
  double: numberStepping(identity),
};

/** A bound or step as a value of the range's kind; integral kinds never round */
function boundary<K extends PrimitiveKind>(kind: K, role: string, input: Input<K>): Rep<K> {
  const value = coerce(kind, input);
  if (value === undefined) {
    throw new RangeError(`${role} ${String(input)} is not a valid ${kind}`);
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new RangeError(`${role} of a ${kind} range must be finite, got ${formatPrimitive(kind, value)}`);
  }
  return value;
}

// ============================================================================
// NumericRange
// ============================================================================

export class NumericRange<K extends PrimitiveKind> implements Iterable<Rep<K>> {
  readonly start: Rep<K>;
  readonly end: Rep<K>;
  readonly step: Rep<K>;

  /**
   * Bounds and step are coerced to the kind: float inputs round to binary32,
   * and an integral kind rejects a value it cannot hold exactly.
   */
  constructor(
    readonly kind: K,
    start: Input<K>,
    end: Input<K>,
    step: Input<K>,
    readonly inclusive: boolean,
  ) {
    this.start = boundary(kind, "start", start);
    this.end = boundary(kind, "end", end);
    this.step = boundary(kind, "step", step);
    if (STEPPING[kind].isZero(this.step)) {
      throw new RangeError("step cannot be 0");
    }
    Object.freeze(this);
  }

  /** A range over `[start, end]` or `[start, end)` with step 1 */
  static of<K extends PrimitiveKind>(
    kind: K,
    start: Input<K>,
    end: Input<K>,
    inclusive: boolean,
  ): NumericRange<K> {
    return new NumericRange(kind, start, end, convert(1, kind), inclusive);
  }

  /** The same bounds with a different step */
  by(step: Input<K>): NumericRange<K> {
    return new NumericRange(this.kind, this.start, this.end, step, this.inclusive);
  }

  *[Symbol.iterator](): Generator<Rep<K>, void, undefined> {
    const stepping = STEPPING[this.kind];
    const ascending = stepping.isPositive(this.step);
    for (let index = 0; ; index++) {
      const value = stepping.at(this.start, this.step, index);
      if (stepping.passed(value, this.end, ascending, this.inclusive)) return;
      yield value;
    }
  }

  isEmpty(): boolean {
    return this[Symbol.iterator]().next().done === true;
  }

  toArray(): Rep<K>[] {
    return Array.from(this);
  }

  toString(): string {
    const show = (value: number | bigint) => formatPrimitive(this.kind, value);
    const unit = this.step === convert(1, this.kind);
    const head = `${show(this.start)} ${this.inclusive ? "to" : "until"} ${show(this.end)}`;
    return unit ? `NumericRange(${head})` : `NumericRange(${head} by ${show(this.step)})`;
  }
}
