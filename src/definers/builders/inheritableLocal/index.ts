import { makeInheritableLocalBuilder } from "./fluent-builder";
import type { InheritableLocalFluentBuilder } from "./fluent-builder.interface";
import type { BuilderState } from "./types";

export * from "./fluent-builder.interface";
export * from "./fluent-builder";
export * from "./types";

/**
 * Entry point for declaring an inheritable local through a builder.
 */
export function inheritableLocalBuilder<T = unknown>(
  id: string,
): InheritableLocalFluentBuilder<T> {
  const initial: BuilderState<T> = Object.freeze({
    id,
    meta: {},
  });

  return makeInheritableLocalBuilder(initial);
}

export const inheritableLocal = inheritableLocalBuilder;
