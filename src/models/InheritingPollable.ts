import { pollAfterCompletionError } from "../errors";
import type { IPollable, Poll, Waker } from "../types/poll";
import { symbolInheritingPollable } from "../types/symbols";
import type { ContextRegistry } from "./ContextRegistry";
import type { InheritanceSnapshot } from "./InheritanceSnapshot";
import { releaseOrReport } from "./utils/releaseOrReport";

export type InheritingState = "unpolled" | "polling" | "completed" | "cancelled";

/**
 * Wraps a pollable so that every poll runs with the captured snapshot
 * installed on the polling worker.
 *
 * Install and restore happen on every single poll, never once per task:
 * the host may move the task to another worker between polls.
 */
export class InheritingPollable<T> implements IPollable<T> {
  readonly [symbolInheritingPollable] = true as const;
  private currentState: InheritingState = "unpolled";

  constructor(
    private readonly inner: IPollable<T>,
    private readonly snapshot: InheritanceSnapshot,
    private readonly registry: ContextRegistry,
  ) {}

  get state(): InheritingState {
    return this.currentState;
  }

  /** Number of inheritable locals this pollable carries. */
  get inherited(): number {
    return this.snapshot.size;
  }

  poll(wake: Waker): Poll<T> {
    if (this.currentState === "completed" || this.currentState === "cancelled") {
      return pollAfterCompletionError.throw({
        pollable: "Inheriting pollable",
        state: this.currentState,
      });
    }
    this.currentState = "polling";

    let outcome: Poll<T>;
    try {
      outcome = this.pollOnce(wake);
    } catch (error) {
      // a throwing poll ends the task; the error passes through untouched
      this.complete();
      throw error;
    }

    if (outcome.ready) {
      this.complete();
    }
    return outcome;
  }

  cancel(): void {
    if (this.currentState === "completed" || this.currentState === "cancelled") {
      return;
    }
    this.currentState = "cancelled";
    try {
      this.inner.cancel?.();
    } finally {
      this.releaseSnapshot();
    }
  }

  private pollOnce(wake: Waker): Poll<T> {
    const token = this.registry.install(this.snapshot);
    try {
      return this.inner.poll(wake);
    } finally {
      this.registry.restore(token);
    }
  }

  private complete() {
    this.currentState = "completed";
    this.releaseSnapshot();
  }

  private releaseSnapshot() {
    releaseOrReport(() => this.snapshot.release(), "inherited values");
  }
}
