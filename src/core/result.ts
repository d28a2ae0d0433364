/**
 * Discriminated union for operations that can fail expectedly
 * (a session that cannot load, a setup flow that halts, a config that does not validate).
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/** Create a successful Result. */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Create a failed Result. */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Type guard for successful Result. */
export function isOk<T, E>(
  result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
  return result.ok;
}

/** Type guard for failed Result. */
export function isErr<T, E>(
  result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
  return !result.ok;
}

/**
 * Run an async operation and capture any thrown value as a failed Result.
 * `mapError` turns the thrown value into the caller's error type.
 */
export async function attempt<T, E>(
  operation: () => Promise<T>,
  mapError: (thrown: unknown) => E,
): Promise<Result<T, E>> {
  try {
    return ok(await operation());
  } catch (thrown: unknown) {
    return err(mapError(thrown));
  }
}

/**
 * Unwrap a Result, throwing the error if it failed.
 * The CLI uses this at its boundary, where every failure becomes an exit code.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error instanceof Error ? result.error : new Error(String(result.error));
}
