let nextWorkerId = 1;
let current: WorkerContext | null = null;
let fallback: WorkerContext | null = null;

/**
 * A logical worker: the lane a host scheduler runs a poll on. Scoped cells
 * keep one value stack per worker, so a task migrating between workers sees
 * only what is installed on the worker currently polling it.
 */
export class WorkerContext {
  readonly id: number;

  constructor(readonly name: string = `worker-${nextWorkerId}`) {
    this.id = nextWorkerId++;
  }

  /**
   * Runs `fn` with this worker as the current one, restoring the previous
   * worker on every exit path.
   */
  run<T>(fn: () => T): T {
    const previous = current;
    current = this;
    try {
      return fn();
    } finally {
      current = previous;
    }
  }

  isCurrent(): boolean {
    return currentWorker() === this;
  }
}

/**
 * The worker polling right now. Outside any host lane this is a process-wide
 * default worker, so plain synchronous code can use scopes too.
 */
export function currentWorker(): WorkerContext {
  if (current) return current;
  if (!fallback) {
    fallback = new WorkerContext("main");
  }
  return fallback;
}
