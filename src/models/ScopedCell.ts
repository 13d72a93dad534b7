import { scopeNestingError } from "../errors";
import type { SharedHandle } from "./SharedHandle";
import { currentWorker, type WorkerContext } from "./WorkerContext";

/**
 * Per-declaration storage: one LIFO stack of active handles per worker.
 * The top of the polling worker's stack is the visible value.
 */
export class ScopedCell<T> {
  private readonly stacks = new WeakMap<WorkerContext, SharedHandle<T>[]>();

  constructor(readonly label: string) {}

  push(handle: SharedHandle<T>, worker: WorkerContext = currentWorker()): void {
    const stack = this.stacks.get(worker);
    if (stack) {
      stack.push(handle);
    } else {
      this.stacks.set(worker, [handle]);
    }
  }

  /**
   * Pops `handle`, which must be the top of the worker's stack.
   */
  pop(handle: SharedHandle<T>, worker: WorkerContext = currentWorker()): void {
    const stack = this.stacks.get(worker);
    const top = stack?.[stack.length - 1];
    if (!stack || top !== handle) {
      return scopeNestingError.throw({
        local: this.label,
        worker: worker.name,
        depth: stack?.length ?? 0,
      });
    }
    stack.pop();
    if (stack.length === 0) {
      this.stacks.delete(worker);
    }
  }

  top(worker: WorkerContext = currentWorker()): SharedHandle<T> | undefined {
    const stack = this.stacks.get(worker);
    return stack?.[stack.length - 1];
  }

  depth(worker: WorkerContext = currentWorker()): number {
    return this.stacks.get(worker)?.length ?? 0;
  }
}
