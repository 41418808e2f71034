/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)`: assertion that fails fast
 * - `unreachable(value?)`: mark impossible code paths
 *
 * @example
 * ```typescript
 * type Shape = { kind: "circle" } | { kind: "square" };
 * function area(shape: Shape): number {
 *   switch (shape.kind) {
 *     case "circle": return Math.PI;
 *     case "square": return 1;
 *     default: return unreachable(shape);
 *   }
 * }
 * ```
 */

/**
 * Thrown when a caller-asserted invariant does not hold. This is a
 * programming error, not a recoverable condition.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
 * Runtime invariant check.
 *
 * @throws InvariantError if condition is false
 */
export function invariant(condition: boolean, message?: string | (() => string)): asserts condition {
  if (!condition) {
    const text = typeof message === "function" ? message() : message;
    throw new InvariantError(text ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 */
export function unreachable(_value?: never): never {
  throw new InvariantError("Unreachable code reached");
}
