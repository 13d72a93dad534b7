import type { DefaultErrorType, IErrorHelper } from "../../../types/error";
import type { IErrorMeta } from "../../../types/meta";

export interface ErrorFluentBuilder<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format(fn: (data: TData) => string): ErrorFluentBuilder<TData>;
  /**
   * Attach remediation advice that explains how to fix this error.
   * Appears in the message after the formatted text.
   */
  remediation(
    advice: string | ((data: TData) => string),
  ): ErrorFluentBuilder<TData>;
  /** Marks the error as an internal invariant violation. */
  fatal(): ErrorFluentBuilder<TData>;
  meta<TNewMeta extends IErrorMeta>(m: TNewMeta): ErrorFluentBuilder<TData>;
  build(): IErrorHelper<TData>;
}
