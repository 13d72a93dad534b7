import type { DefaultErrorType } from "../../../types/error";
import type { IErrorMeta } from "../../../types/meta";
import { deepFreeze } from "../../../tools/deepFreeze";
import { defineError } from "../../defineError";
import type { ErrorFluentBuilder } from "./fluent-builder.interface";
import type { BuilderState } from "./types";
import { patchState } from "../shared";

/**
 * Creates an ErrorFluentBuilder from the given state.
 */
export function makeErrorBuilder<TData extends DefaultErrorType>(
  state: BuilderState<TData>,
): ErrorFluentBuilder<TData> {
  const builder: ErrorFluentBuilder<TData> = {
    id: state.id,

    format(fn: (data: TData) => string) {
      const next = patchState(state, { format: fn });
      return makeErrorBuilder(next);
    },

    remediation(advice: string | ((data: TData) => string)) {
      const next = patchState(state, { remediation: advice });
      return makeErrorBuilder(next);
    },

    fatal() {
      const next = patchState(state, { fatal: true });
      return makeErrorBuilder(next);
    },

    meta<TNewMeta extends IErrorMeta>(m: TNewMeta) {
      const next = patchState(state, { meta: m });
      return makeErrorBuilder(next);
    },

    build() {
      return deepFreeze(
        defineError<TData>({
          id: state.id,
          format: state.format,
          remediation: state.remediation,
          fatal: state.fatal,
          meta: state.meta,
        }),
      );
    },
  };

  return builder;
}
