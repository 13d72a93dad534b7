/**
 * Outcome of a single poll. `ready: false` means the pollable registered
 * interest in being woken and must be polled again later.
 */
export type Poll<T> =
  | { readonly ready: true; readonly value: T }
  | { readonly ready: false };

/** Schedules the task owning the pollable for another poll. */
export type Waker = () => void;

/**
 * A unit of cooperative work. Hosts drive it by calling `poll` until it
 * reports `ready`; each call may happen on a different worker.
 */
export interface IPollable<T> {
  poll(wake: Waker): Poll<T>;
  /**
   * Drops the pollable before completion, releasing whatever it holds.
   * Hosts call it at most once and never poll afterwards.
   */
  cancel?(): void;
}

export const PENDING: Poll<never> = Object.freeze({ ready: false });

export function readyPoll<T>(value: T): Poll<T> {
  return { ready: true, value };
}
