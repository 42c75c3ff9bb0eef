/** Success variant of a Result */
export type OkType<T> = { isOk: true; isErr: false; value: T; error: null };

/** Failure variant of a Result */
export type ErrType<E> = { isOk: false; isErr: true; value: null; error: E };

/**
 * Result pattern: every fallible operation returns one of the two variants
 * instead of throwing. Narrow on `isOk` / `isErr` before reading `value` or `error`.
 */
export type Result<T, E> = OkType<T> | ErrType<E>;

export function Ok<T>(value: T): OkType<T> {
  return { isOk: true, isErr: false, value, error: null };
}

export function Err<E>(error: E): ErrType<E> {
  return { isOk: false, isErr: true, value: null, error };
}

/**
 * Runs a sync or async function and captures a throw or rejection as an Err.
 * Always async, so call sites read the same regardless of what `fn` returns.
 *
 * @example
 * const body = await safeTry(() => c.req.json());
 * if (body.isErr) { ... }
 */
export async function safeTry<T>(
  fn: () => T | Promise<T>
): Promise<Result<T, unknown>> {
  try {
    return Ok(await fn());
  } catch (error) {
    return Err(error);
  }
}
