import {
  getContextRegistry,
  type ContextRegistry,
} from "./models/ContextRegistry";
import { InheritingPollable } from "./models/InheritingPollable";
import type { IPollable } from "./types/poll";
import { symbolInheritingPollable } from "./types/symbols";

export interface InheritOptions {
  /** Defaults to the process-wide registry. */
  registry?: ContextRegistry;
}

/**
 * Captures the inheritable locals active right now and returns a pollable
 * that makes them visible to `pollable` on every poll. Hand the result to
 * the host's spawn function exactly as `pollable` would have been.
 *
 * Values set after this call are not seen by the child, and the child's
 * own scopes never leak back into the caller.
 */
export function inherit<T>(
  pollable: IPollable<T>,
  options: InheritOptions = {},
): InheritingPollable<T> {
  const registry = options.registry ?? getContextRegistry();
  return new InheritingPollable(
    pollable,
    registry.snapshotCurrent(),
    registry,
  );
}

export { inherit as wrap };

export function isInheritingPollable(
  value: unknown,
): value is InheritingPollable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    symbolInheritingPollable in value
  );
}
