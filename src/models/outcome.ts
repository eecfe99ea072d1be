/**
 * Success-or-failure value for expected branches (no tracked data, an
 * unresolved feature name) that should not travel as exceptions.
 */
export type Outcome<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Outcome<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Outcome<never, E> {
  return { ok: false, error };
}

export function unwrapOr<T, E>(outcome: Outcome<T, E>, fallback: T): T {
  return outcome.ok ? outcome.value : fallback;
}
