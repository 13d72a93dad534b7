import { pollAfterCompletionError } from "../errors";
import type { IPollable, Poll, Waker } from "../types/poll";
import type { ScopedCell } from "./ScopedCell";
import type { SharedHandle } from "./SharedHandle";
import { releaseOrReport } from "./utils/releaseOrReport";
import { currentWorker } from "./WorkerContext";

/**
 * Pushes one handle for the duration of every poll of `body`. The scope owns
 * one count on the handle and gives it up once the body is done or dropped.
 */
export class ScopedPollable<T, R> implements IPollable<R> {
  private state: "active" | "completed" | "cancelled" = "active";

  constructor(
    private readonly cell: ScopedCell<T>,
    private readonly handle: SharedHandle<T>,
    private readonly body: IPollable<R>,
  ) {}

  poll(wake: Waker): Poll<R> {
    if (this.state !== "active") {
      return pollAfterCompletionError.throw({
        pollable: `Scope of "${this.cell.label}"`,
        state: this.state,
      });
    }

    let outcome: Poll<R>;
    try {
      outcome = this.pollOnce(wake);
    } catch (error) {
      this.finish("completed");
      throw error;
    }

    if (outcome.ready) {
      this.finish("completed");
    }
    return outcome;
  }

  cancel(): void {
    if (this.state !== "active") return;
    this.state = "cancelled";
    try {
      this.body.cancel?.();
    } finally {
      this.releaseHandle();
    }
  }

  private pollOnce(wake: Waker): Poll<R> {
    const worker = currentWorker();
    this.cell.push(this.handle, worker);
    try {
      return this.body.poll(wake);
    } finally {
      this.cell.pop(this.handle, worker);
    }
  }

  private finish(state: "completed" | "cancelled") {
    this.state = state;
    this.releaseHandle();
  }

  private releaseHandle() {
    releaseOrReport(
      () => this.handle.release(),
      `the scoped value of "${this.cell.label}"`,
    );
  }
}
