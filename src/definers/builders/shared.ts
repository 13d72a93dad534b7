/**
 * Returns a frozen copy of a builder state with `patch` applied. Builders
 * never mutate the state they were created from.
 */
export function patchState<S extends object>(state: S, patch: Partial<S>): S {
  const next: S = { ...state, ...patch };
  Object.freeze(next);
  return next;
}
