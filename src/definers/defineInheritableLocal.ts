import { notSetError } from "../errors";
import {
  getContextRegistry,
  type IRegistryEntry,
} from "../models/ContextRegistry";
import { ScopedCell } from "../models/ScopedCell";
import { ScopedPollable } from "../models/ScopedPollable";
import { SharedHandle } from "../models/SharedHandle";
import { currentWorker } from "../models/WorkerContext";
import { releaseOrReport } from "../models/utils/releaseOrReport";
import { deepFreeze } from "../tools/deepFreeze";
import type {
  AccessResult,
  IInheritableLocal,
  IInheritableLocalDefinition,
} from "../types/inheritableLocal";
import type { IPollable } from "../types/poll";
import { symbolInheritableLocal } from "../types/symbols";

/**
 * Declares a task-local variable whose active value is inherited by
 * pollables wrapped with `inherit()`.
 *
 * Declare at module top level: the declaration registers itself right away,
 * and only declarations registered before the registry is first queried
 * take part in inheritance.
 */
export function defineInheritableLocal<T>(
  def: IInheritableLocalDefinition<T>,
): IInheritableLocal<T> {
  const label = def.id;
  const key = Symbol(label);
  const cell = new ScopedCell<T>(label);
  const registry = def.registry ?? getContextRegistry();

  const entry: IRegistryEntry = {
    key,
    label,
    isActive: (worker) => cell.top(worker) !== undefined,
    capture(worker) {
      const top = cell.top(worker);
      if (!top) {
        return notSetError.throw({ local: label });
      }
      const handle = top.retain();
      return {
        key,
        label,
        handle,
        install: (target) => cell.push(handle, target),
        uninstall: (target) => cell.pop(handle, target),
      };
    },
  };
  registry.register(entry);

  const open = (value: T): SharedHandle<T> =>
    new SharedHandle(
      def.schema ? def.schema.parse(value) : value,
      label,
      def.dispose,
    );

  const local: IInheritableLocal<T> = {
    id: label,
    key,
    meta: def.meta ?? {},
    [symbolInheritableLocal]: true,

    scope<R>(value: T, body: IPollable<R>): IPollable<R> {
      return new ScopedPollable(cell, open(value), body);
    },

    syncScope<R>(value: T, fn: () => R): R {
      const handle = open(value);
      const worker = currentWorker();
      cell.push(handle, worker);
      try {
        return fn();
      } finally {
        cell.pop(handle, worker);
        releaseOrReport(
          () => handle.release(),
          `the scoped value of "${label}"`,
        );
      }
    },

    with<R>(fn: (value: T) => R): R {
      const top = cell.top();
      if (!top) {
        return notSetError.throw({ local: label });
      }
      return fn(top.value);
    },

    tryWith<R>(fn: (value: T) => R): AccessResult<R> {
      const top = cell.top();
      if (!top) {
        return { ok: false, error: "NotSet" };
      }
      return { ok: true, value: fn(top.value) };
    },

    get(): T {
      return local.with((value) => value);
    },

    isSet(): boolean {
      return cell.top() !== undefined;
    },
  };

  return deepFreeze(local);
}

export function isInheritableLocal(
  value: unknown,
): value is IInheritableLocal<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    symbolInheritableLocal in value
  );
}
