import { symbolError } from "./symbols";
import type { IErrorMeta } from "./meta";

export type DefaultErrorType = Record<string, unknown>;

export interface IErrorDefinition<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format?: (data: TData) => string;
  /**
   * Advice appended to the message explaining how to fix the problem.
   */
  remediation?: string | ((data: TData) => string);
  /**
   * Fatal errors signal a broken internal invariant. They are logged at
   * `critical` before being thrown and are never meant to be recovered from.
   */
  fatal?: boolean;
  meta?: IErrorMeta;
}

/**
 * Runtime helper returned by defineError()/r.error().
 * Contains helpers to throw typed errors and perform type-safe checks.
 */
export interface IErrorHelper<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  /** Unique id, also used as the thrown error's name */
  id: string;
  fatal: boolean;
  meta: IErrorMeta;
  /** Throw a typed error with the given data */
  throw(data: TData): never;
  /** Type guard for checking if an unknown error is this error */
  is(error: unknown): error is IInheritanceError<TData>;
  /** Brand symbol for runtime detection */
  [symbolError]: true;
}

export interface IInheritanceError<
  TData extends DefaultErrorType = DefaultErrorType,
> extends Error {
  readonly id: string;
  readonly data: TData;
  readonly fatal: boolean;
}
