/**
 * Tagged success/failure value returned by every step that can fail on user input.
 * Programmer mistakes are thrown instead (see ConfigurationError).
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export const OK_VOID: Result<void, never> = { ok: true, value: undefined };
