import { pollAfterCompletionError, suspendNotReadyError } from "../errors";
import {
  PENDING,
  readyPoll,
  type IPollable,
  type Poll,
  type Waker,
} from "../types/poll";

/** Completes on the first poll with `value`. */
export function ready<T>(value: T): IPollable<T> {
  return { poll: () => readyPoll(value) };
}

/**
 * Completes on the first poll with `fn()`, evaluated inside whatever scopes
 * are installed during that poll. Every further poll calls `fn` again.
 */
export function lazy<T>(fn: () => T): IPollable<T> {
  return { poll: () => readyPoll(fn()) };
}

export function pollFn<T>(
  poll: (wake: Waker) => Poll<T>,
  cancel?: () => void,
): IPollable<T> {
  return { poll, cancel };
}

/**
 * Pending once (asking to be polled again right away), then ready. Lets a
 * task give its worker back, which is where hosts may migrate it.
 */
export function yieldNow(): IPollable<void> {
  let yielded = false;
  return {
    poll(wake) {
      if (yielded) return readyPoll(undefined);
      yielded = true;
      wake();
      return PENDING;
    },
  };
}

export function map<A, B>(
  source: IPollable<A>,
  fn: (value: A) => B,
): IPollable<B> {
  return {
    poll(wake) {
      const outcome = source.poll(wake);
      return outcome.ready ? readyPoll(fn(outcome.value)) : PENDING;
    },
    cancel: () => source.cancel?.(),
  };
}

/**
 * Runs `first`, then the pollable `next` builds from its result.
 */
export function andThen<A, B>(
  first: IPollable<A>,
  next: (value: A) => IPollable<B>,
): IPollable<B> {
  let second: IPollable<B> | null = null;
  return {
    poll(wake) {
      if (!second) {
        const outcome = first.poll(wake);
        if (!outcome.ready) return PENDING;
        second = next(outcome.value);
      }
      return second.poll(wake);
    },
    cancel() {
      if (second) second.cancel?.();
      else first.cancel?.();
    },
  };
}

/**
 * What a coroutine body yields while it waits. Produced by `suspend()`.
 */
export interface ISuspension {
  /** Polls the awaited pollable once; true once it is ready. */
  step(wake: Waker): boolean;
  cancel(): void;
}

class Suspension<T> implements ISuspension {
  outcome: Poll<T> = PENDING;

  constructor(private readonly pollable: IPollable<T>) {}

  step(wake: Waker): boolean {
    if (!this.outcome.ready) {
      this.outcome = this.pollable.poll(wake);
    }
    return this.outcome.ready;
  }

  cancel(): void {
    if (!this.outcome.ready) {
      this.pollable.cancel?.();
    }
  }
}

export type CoroutineBody<T> = Generator<ISuspension, T, void>;

/**
 * Waits for `pollable` inside a coroutine: `const v = yield* suspend(p)`.
 */
export function* suspend<T>(pollable: IPollable<T>): CoroutineBody<T> {
  const suspension = new Suspension(pollable);
  yield suspension;
  const { outcome } = suspension;
  if (!outcome.ready) {
    return suspendNotReadyError.throw({});
  }
  return outcome.value;
}

/**
 * Drives a generator as a pollable. Each `yield* suspend(p)` polls `p`
 * until it is ready; errors thrown by `p` are thrown back into the body,
 * so `try`/`catch` around `suspend()` works as it does around `await`.
 *
 * Cancelling cancels the pollable being waited on; the generator is simply
 * abandoned and its `finally` blocks do not run.
 */
export function coroutine<T>(body: () => CoroutineBody<T>): IPollable<T> {
  return new Coroutine(body());
}

class Coroutine<T> implements IPollable<T> {
  private waiting: ISuspension | null = null;
  private state: "active" | "completed" | "cancelled" = "active";

  constructor(private readonly iterator: CoroutineBody<T>) {}

  poll(wake: Waker): Poll<T> {
    if (this.state !== "active") {
      return pollAfterCompletionError.throw({
        pollable: "Coroutine",
        state: this.state,
      });
    }

    try {
      let next = this.waiting
        ? this.resume(this.waiting, wake)
        : this.iterator.next();
      while (next) {
        if (next.done) {
          this.finish();
          return readyPoll(next.value);
        }
        this.waiting = next.value;
        next = this.resume(next.value, wake);
      }
      return PENDING;
    } catch (error) {
      this.finish();
      throw error;
    }
  }

  cancel(): void {
    if (this.state !== "active") return;
    this.state = "cancelled";
    this.waiting?.cancel();
    this.waiting = null;
  }

  /**
   * Steps the awaited pollable; null while it is still pending.
   */
  private resume(
    suspension: ISuspension,
    wake: Waker,
  ): IteratorResult<ISuspension, T> | null {
    let isReady: boolean;
    try {
      isReady = suspension.step(wake);
    } catch (error) {
      return this.iterator.throw(error);
    }
    return isReady ? this.iterator.next() : null;
  }

  private finish() {
    this.state = "completed";
    this.waiting = null;
  }
}
