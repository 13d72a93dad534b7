import type { ContextRegistry } from "../models/ContextRegistry";
import type { IInheritableLocalMeta } from "./meta";
import type { IPollable } from "./poll";
import { symbolInheritableLocal } from "./symbols";
import type { IValidationSchema } from "./utilities";

/** Reasons a read of an inheritable local can fail. */
export type InheritableAccessError = "NotSet";

export type AccessResult<R> =
  | { readonly ok: true; readonly value: R }
  | { readonly ok: false; readonly error: InheritableAccessError };

export interface IInheritableLocalDefinition<T> {
  /** Human readable label used in errors and logs. Identity is per declaration. */
  id: string;
  /** Validates (and may transform) every value entering a scope. */
  schema?: IValidationSchema<T>;
  /**
   * Runs once, when the last scope or snapshot holding a value lets go of it.
   */
  dispose?: (value: T) => void;
  meta?: IInheritableLocalMeta;
  /** Defaults to the process-wide registry. */
  registry?: ContextRegistry;
}

/**
 * A task-local variable whose active value is inherited by pollables wrapped
 * with `inherit()`.
 */
export interface IInheritableLocal<T> {
  readonly id: string;
  /** Declaration identity. */
  readonly key: symbol;
  readonly meta: IInheritableLocalMeta;
  [symbolInheritableLocal]: true;

  /**
   * Makes `value` the active value for every poll of `body`.
   */
  scope<R>(value: T, body: IPollable<R>): IPollable<R>;
  /**
   * Makes `value` the active value while `fn` runs. `fn` must finish
   * synchronously; promises it returns settle outside the scope.
   */
  syncScope<R>(value: T, fn: () => R): R;
  /** Reads the active value, throwing `notSetError` when there is none. */
  with<R>(fn: (value: T) => R): R;
  tryWith<R>(fn: (value: T) => R): AccessResult<R>;
  get(): T;
  isSet(): boolean;
}
