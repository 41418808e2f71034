/**
 * Result Data Types
 *
 * The validated construction paths report failure through three small
 * tagged unions:
 *
 * - `Or<G, B>` is `Good<G>` or `Bad<B>`: a value or the caller's error value
 * - `Validation<E>` is `Pass` or `Fail<E>`: a check with no payload on success
 * - `Try<A>` is `Success<A>` or `Failure`: a value or the error that was thrown
 */

// ============================================================================
// Or
// ============================================================================

export type Or<G, B> = Good<G> | Bad<B>;

export interface Good<G> {
  readonly _tag: "Good";
  readonly value: G;
}

export interface Bad<B> {
  readonly _tag: "Bad";
  readonly error: B;
}

export function Good<G, B = never>(value: G): Or<G, B> {
  return { _tag: "Good", value };
}

export function Bad<B, G = never>(error: B): Or<G, B> {
  return { _tag: "Bad", error };
}

export function isGood<G, B>(or: Or<G, B>): or is Good<G> {
  return or._tag === "Good";
}

export function isBad<G, B>(or: Or<G, B>): or is Bad<B> {
  return or._tag === "Bad";
}

// ============================================================================
// Validation
// ============================================================================

export type Validation<E> = Pass | Fail<E>;

export interface Pass {
  readonly _tag: "Pass";
}

export interface Fail<E> {
  readonly _tag: "Fail";
  readonly error: E;
}

/** The single Pass value */
export const Pass: Pass = Object.freeze({ _tag: "Pass" });

export function Fail<E>(error: E): Validation<E> {
  return { _tag: "Fail", error };
}

export function isPass<E>(validation: Validation<E>): validation is Pass {
  return validation._tag === "Pass";
}

export function isFail<E>(validation: Validation<E>): validation is Fail<E> {
  return validation._tag === "Fail";
}

// ============================================================================
// Try
// ============================================================================

export type Try<A> = Success<A> | Failure;

export interface Success<A> {
  readonly _tag: "Success";
  readonly value: A;
}

export interface Failure {
  readonly _tag: "Failure";
  readonly error: Error;
}

export function Success<A>(value: A): Try<A> {
  return { _tag: "Success", value };
}

export function Failure<A = never>(error: Error): Try<A> {
  return { _tag: "Failure", error };
}

export function isSuccess<A>(result: Try<A>): result is Success<A> {
  return result._tag === "Success";
}

export function isFailure<A>(result: Try<A>): result is Failure {
  return result._tag === "Failure";
}

/**
 * Run a thunk, capturing a thrown Error as a Failure. Anything thrown that
 * is not an Error is rethrown.
 */
export function attempt<A>(thunk: () => A): Try<A> {
  try {
    return Success(thunk());
  } catch (error) {
    if (error instanceof Error) return Failure(error);
    throw error;
  }
}
