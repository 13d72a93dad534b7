import type { IInheritableLocalMeta } from "../../../types/meta";
import { defineInheritableLocal } from "../../defineInheritableLocal";
import type { InheritableLocalFluentBuilder } from "./fluent-builder.interface";
import type { BuilderState } from "./types";
import { patchState } from "../shared";

/**
 * Creates an InheritableLocalFluentBuilder from the given state.
 */
export function makeInheritableLocalBuilder<T>(
  state: BuilderState<T>,
): InheritableLocalFluentBuilder<T> {
  const builder: InheritableLocalFluentBuilder<T> = {
    id: state.id,

    schema(schema) {
      const next = patchState(state, { schema });
      return makeInheritableLocalBuilder(next);
    },

    dispose(fn) {
      const next = patchState(state, { dispose: fn });
      return makeInheritableLocalBuilder(next);
    },

    meta<TNewMeta extends IInheritableLocalMeta>(m: TNewMeta) {
      const next = patchState(state, { meta: m });
      return makeInheritableLocalBuilder(next);
    },

    registry(registry) {
      const next = patchState(state, { registry });
      return makeInheritableLocalBuilder(next);
    },

    build() {
      return defineInheritableLocal<T>({
        id: state.id,
        schema: state.schema,
        dispose: state.dispose,
        meta: state.meta,
        registry: state.registry,
      });
    },
  };

  return builder;
}
