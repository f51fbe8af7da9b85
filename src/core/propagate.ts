import type { SignalInner } from "./cell.js";

/**
 * Calls every subscriber of `cell` synchronously, newest subscription first.
 *
 * The subscriber list is copied up front: callbacks subscribe, unsubscribe and dispose things
 * while they run, and none of that changes who is called in this pass. A nested pass triggered by
 * a callback runs to completion before the next callback of this pass.
 *
 * Subscribers that were disposed, or that are already running further up the stack, are skipped.
 * A skipped notification is dropped, not queued.
 */
export function triggerSubscribers<T>(cell: SignalInner<T>): void {
  const subscribers = Array.from(cell._subscribers.values());

  // Parents subscribe after their children, so going backwards runs outer computations first.
  for (let i = subscribers.length - 1; i >= 0; i--) {
    subscribers[i].invoke();
  }
}

/**
 * Replaces the value of `cell` and notifies its subscribers. There is no equality check: writing
 * the same value notifies too.
 */
export function writeSignal<T>(cell: SignalInner<T>, value: T): void {
  cell.update(value);
  triggerSubscribers(cell);
}
