import { error } from "./definers/builders/error";
import type { IErrorHelper } from "./types/error";

export {
  InheritanceError,
  isInheritanceError,
} from "./definers/defineError";

// Reading a local with no active value in the calling context
export const notSetError: IErrorHelper<{ local: string }> = error<{
  local: string;
}>("inheritable.errors.notSet")
  .format(
    ({ local }) =>
      `Inheritable local "${local}" has no active value in this context.`,
  )
  .remediation(
    ({ local }) =>
      `Read "${local}" inside ${local}.scope()/syncScope(), or spawn the reading task with inherit() from inside such a scope. Use tryWith() to treat a missing value as a normal result.`,
  )
  .build();

// Restoring a token whose install was already undone
export const scopeAlreadyExitedError: IErrorHelper<{
  worker: string;
  bindings: number;
}> = error<{ worker: string; bindings: number }>(
  "inheritable.errors.scopeAlreadyExited",
)
  .format(
    ({ worker, bindings }) =>
      `Restore token for ${bindings} binding(s) on ${worker} was already restored.`,
  )
  .fatal()
  .build();

// Popping a handle that is not the innermost scope
export const scopeNestingError: IErrorHelper<{
  local: string;
  worker: string;
  depth: number;
}> = error<{ local: string; worker: string; depth: number }>(
  "inheritable.errors.scopeNesting",
)
  .format(
    ({ local, worker, depth }) =>
      `Scopes of "${local}" on ${worker} exited out of order (stack depth ${depth}).`,
  )
  .fatal()
  .build();

export const handleReleasedError: IErrorHelper<{
  local: string;
  operation: string;
}> = error<{ local: string; operation: string }>(
  "inheritable.errors.handleReleased",
)
  .format(
    ({ local, operation }) =>
      `Cannot ${operation} the shared handle of "${local}": its last holder already released it.`,
  )
  .fatal()
  .build();

export const pollAfterCompletionError: IErrorHelper<{
  pollable: string;
  state: string;
}> = error<{ pollable: string; state: string }>(
  "inheritable.errors.pollAfterCompletion",
)
  .format(
    ({ pollable, state }) => `${pollable} was polled after it was ${state}.`,
  )
  .remediation(
    "Hosts must stop polling a task once it returned ready, threw, or was cancelled.",
  )
  .fatal()
  .build();

// A coroutine body stepped past `yield* suspend(p)` while `p` was pending
export const suspendNotReadyError: IErrorHelper = error(
  "inheritable.errors.suspendNotReady",
)
  .format(() => "suspend() resumed before its pollable was ready.")
  .remediation(
    "Drive coroutine bodies through coroutine() instead of calling next() on them directly.",
  )
  .fatal()
  .build();

export const executorStalledError: IErrorHelper<{
  pending: number;
}> = error<{ pending: number }>("inheritable.errors.executorStalled")
  .format(
    ({ pending }) =>
      `Executor stalled: the root task is pending and none of the ${pending} pending task(s) was woken.`,
  )
  .remediation(
    "A pollable returned pending without arranging for its waker to be called.",
  )
  .build();

export const taskCancelledError: IErrorHelper<{
  task: number;
}> = error<{ task: number }>("inheritable.errors.taskCancelled")
  .format(({ task }) => `Task #${task} was cancelled before it completed.`)
  .build();
