/**
 * Result type
 *
 * Errors in the tokenizer, parser and evaluator travel as values rather
 * than exceptions, so a caller can branch on them (the session driver's
 * statement-then-expression fallback does exactly that).
 */

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

export const map = <A, B, E>(r: Result<A, E>, f: (a: A) => B): Result<B, E> =>
  r.ok ? ok(f(r.value)) : r;

export const andThen = <A, B, E, F>(
  r: Result<A, E>,
  f: (a: A) => Result<B, F>,
): Result<B, E | F> => (r.ok ? f(r.value) : r);

export const unwrapOr = <T, E>(r: Result<T, E>, fallback: T): T =>
  r.ok ? r.value : fallback;

export const match = <T, E, R>(
  r: Result<T, E>,
  arms: { ok: (value: T) => R; err: (error: E) => R },
): R => (r.ok ? arms.ok(r.value) : arms.err(r.error));
