import { getLogger } from "./config";
import { executorStalledError, taskCancelledError } from "./errors";
import type { Logger } from "./models/Logger";
import { WorkerContext } from "./models/WorkerContext";
import { PENDING, readyPoll, type IPollable, type Poll } from "./types/poll";

type TaskOutcome<T> =
  | { readonly status: "pending" }
  | { readonly status: "ready"; readonly value: T }
  | { readonly status: "failed"; readonly error: unknown }
  | { readonly status: "cancelled" };

interface IRunnable {
  readonly id: number;
  readonly finished: boolean;
  pollOnce(): void;
}

class SpawnedTask<T> implements IRunnable {
  private outcome: TaskOutcome<T> = { status: "pending" };
  private scheduled = true;
  private readonly joiners = new Set<() => void>();
  readonly wake = () => {
    if (this.finished || this.scheduled) return;
    this.scheduled = true;
    this.enqueue(this);
  };

  constructor(
    readonly id: number,
    private readonly pollable: IPollable<T>,
    private readonly enqueue: (task: IRunnable) => void,
    private readonly onSettled: () => void,
    private readonly logger: Logger,
  ) {}

  get finished(): boolean {
    return this.outcome.status !== "pending";
  }

  get current(): TaskOutcome<T> {
    return this.outcome;
  }

  pollOnce(): void {
    if (this.finished) return;
    this.scheduled = false;
    let polled: Poll<T>;
    try {
      polled = this.pollable.poll(this.wake);
    } catch (error) {
      this.logger.debug(`Task #${this.id} failed`, { error });
      this.finish({ status: "failed", error });
      return;
    }
    if (polled.ready) {
      this.finish({ status: "ready", value: polled.value });
    }
  }

  cancel(): void {
    if (this.finished) return;
    this.finish({ status: "cancelled" });
    this.pollable.cancel?.();
  }

  join(wake: () => void): void {
    this.joiners.add(wake);
  }

  private finish(outcome: TaskOutcome<T>) {
    this.outcome = outcome;
    this.onSettled();
    for (const joiner of this.joiners) joiner();
    this.joiners.clear();
  }
}

/**
 * Awaitable view of a spawned task. Polling it yields the task's value or
 * rethrows the exact error the task failed with.
 */
export class JoinHandle<T> implements IPollable<T> {
  constructor(private readonly task: SpawnedTask<T>) {}

  get id(): number {
    return this.task.id;
  }

  get finished(): boolean {
    return this.task.finished;
  }

  get outcome(): TaskOutcome<T> {
    return this.task.current;
  }

  poll(wake: () => void): Poll<T> {
    const outcome = this.task.current;
    switch (outcome.status) {
      case "ready":
        return readyPoll(outcome.value);
      case "failed":
        throw outcome.error;
      case "cancelled":
        return taskCancelledError.throw({ task: this.task.id });
      case "pending":
        this.task.join(wake);
        return PENDING;
    }
  }

  /** Cancels the task itself, not just this handle. */
  abort(): void {
    this.task.cancel();
  }
}

export interface TestExecutorOptions {
  /** Number of logical workers polls rotate over. Defaults to 2. */
  workers?: number;
}

/**
 * In-process stand-in for a multi-worker cooperative scheduler. Every poll
 * goes to the next worker in round-robin order, so any task polled more
 * than once migrates between workers.
 */
export class TestExecutor {
  readonly workers: ReadonlyArray<WorkerContext>;
  private readonly runQueue: IRunnable[] = [];
  private unfinished = 0;
  private nextTaskId = 1;
  private nextWorker = 0;
  private pollCount = 0;
  private readonly logger: Logger;

  constructor(options: TestExecutorOptions = {}) {
    const count = Math.max(1, options.workers ?? 2);
    this.workers = Array.from(
      { length: count },
      (_, i) => new WorkerContext(`test-worker-${i}`),
    );
    this.logger = getLogger().with({ source: "testExecutor" });
  }

  /** Total polls performed so far. */
  get polls(): number {
    return this.pollCount;
  }

  /** Spawned tasks that have not finished yet. */
  get pending(): number {
    return this.unfinished;
  }

  spawn<T>(pollable: IPollable<T>): JoinHandle<T> {
    const task = new SpawnedTask(
      this.nextTaskId++,
      pollable,
      (runnable) => this.runQueue.push(runnable),
      () => this.unfinished--,
      this.logger,
    );
    this.unfinished++;
    this.runQueue.push(task);
    return new JoinHandle(task);
  }

  /**
   * Polls runnable tasks until none is left. Returns the number of polls.
   */
  runUntilIdle(): number {
    const before = this.pollCount;
    let task = this.runQueue.shift();
    while (task) {
      this.pollTask(task);
      task = this.runQueue.shift();
    }
    return this.pollCount - before;
  }

  /**
   * Spawns `pollable` and drives the executor until it finishes, returning
   * its value or rethrowing its error.
   */
  blockOn<T>(pollable: IPollable<T>): T {
    const handle = this.spawn(pollable);
    while (!handle.finished) {
      const task = this.runQueue.shift();
      if (!task) {
        return executorStalledError.throw({ pending: this.pending });
      }
      this.pollTask(task);
    }
    const outcome = handle.outcome;
    switch (outcome.status) {
      case "ready":
        return outcome.value;
      case "failed":
        throw outcome.error;
      default:
        return taskCancelledError.throw({ task: handle.id });
    }
  }

  private pollTask(task: IRunnable) {
    if (task.finished) return;
    const worker = this.workers[this.nextWorker % this.workers.length];
    this.nextWorker++;
    this.pollCount++;
    worker.run(() => task.pollOnce());
  }
}

export function createTestExecutor(
  options?: TestExecutorOptions,
): TestExecutor {
  return new TestExecutor(options);
}
