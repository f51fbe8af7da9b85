import { OwnerState } from "./constants.js";
import type { AnySigRef } from "./cell.js";
import type { Computation } from "./computation.js";
import { DisposedObserverError, LeakedObserverError } from "./error.js";

/**
 * The stack of computations currently running. Reads register against the top entry only.
 *
 * There is one tracker per JavaScript realm (see `tracker` below). It starts empty and must be
 * empty again whenever control returns to code that is not inside a computation; a non-empty stack
 * at that point means a computation never exited.
 */
export class DependencyTracker {
  private _stack: Computation[] = [];

  get depth(): number {
    return this._stack.length;
  }

  enter(computation: Computation): void {
    this._stack.push(computation);
  }

  exit(): void {
    this._stack.pop();
  }

  /**
   * The computation reads are currently attributed to, or null at the top level.
   *
   * @throws `DisposedObserverError` if that computation was disposed before it finished running.
   */
  current(): Computation | null {
    const top = this._stack.at(-1);
    if (top === undefined) return null;
    if (top._state === OwnerState.Disposed) throw new DisposedObserverError(top._name);
    return top;
  }

  track(ref: AnySigRef): void {
    const current = this.current();
    if (current) current.addDependency(ref);
  }

  untracked<T>(fn: () => T): T {
    if (!this._stack.length) return fn();
    const stack = this._stack;
    this._stack = [];
    try {
      return fn();
    } finally {
      this._stack = stack;
    }
  }

  assertIdle(): void {
    if (this._stack.length) throw new LeakedObserverError(this._stack.length);
  }
}

export const tracker = new DependencyTracker();

/**
 * Returns the computation that reads are currently attributed to.
 */
export function getObserver(): Computation | null {
  return tracker.current();
}

/**
 * Runs `fn` without registering any of its reads as dependencies of the surrounding computation.
 * Ownership is unaffected: primitives created inside are still disposed with the current owner.
 */
export function untrack<T>(fn: () => T): T {
  return tracker.untracked(fn);
}

/**
 * @throws `LeakedObserverError` if a computation is still on the tracking stack.
 */
export function assertNoActiveObserver(): void {
  tracker.assertIdle();
}
