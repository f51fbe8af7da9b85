/**
 * Owner tracking gives nested computations automatic cleanup and carries context values down the
 * tree.
 *
 * If you write the following
 *
 *   createRoot(() => {            // a
 *     createEffect(() => {});     // b
 *     createEffect(() => {        // c
 *       createEffect(() => {});   // d
 *     });
 *     createEffect(() => {});     // e
 *   });
 *
 * The owner tree will look like this:
 *
 *    a
 *   /|\
 *  b c e
 *    |
 *    d
 *
 * Each owner keeps its children in reverse creation order (a -> e -> c -> b), which is also the
 * order in which they are disposed.
 *
 * The owner tree is orthogonal to the dependency graph: an effect depends on the cells it read,
 * but it is owned by whatever was running when it was created.
 */

import { OwnerState } from "./constants.js";
import { ContextNotFoundError, NoOwnerError } from "./error.js";
import { tracker } from "./tracker.js";

export type ContextRecord = Record<string | symbol, unknown>;

export interface Disposable {
  (): void;
}

let currentOwner: Owner | null = null;
const defaultContext: ContextRecord = {};

// Subscriptions only hold computations weakly; roots stay reachable until they are disposed.
const liveRoots = new Set<Owner>();

/**
 * Returns the currently executing parent owner.
 */
export function getOwner(): Owner | null {
  return currentOwner;
}

export function setOwner(owner: Owner | null): Owner | null {
  const out = currentOwner;
  currentOwner = owner;
  return out;
}

export class Owner {
  _parent: Owner | null = null;
  _firstChild: Owner | null = null;
  _nextSibling: Owner | null = null;

  _state: OwnerState = OwnerState.Idle;

  _disposal: Disposable | Disposable[] | null = null;
  _context: ContextRecord = defaultContext;

  constructor(parent: Owner | null = currentOwner) {
    if (parent) parent.append(this);
  }

  append(child: Owner): void {
    child._parent = this;
    child._nextSibling = this._firstChild;
    this._firstChild = child;
    child._context = this._context;
  }

  /**
   * Disposes every child owner, newest first. With `self` the owner itself is disposed too and
   * its cleanups run after its children's. Reads made by cleanups are not tracked.
   */
  dispose(self = true): void {
    if (this._state === OwnerState.Disposed) return;
    tracker.untracked(() => this._disposeTree(self));
  }

  _disposeTree(self: boolean): void {
    let child = this._firstChild;
    this._firstChild = null;
    while (child) {
      const next = child._nextSibling;
      child._parent = null;
      child._nextSibling = null;
      if (child._state !== OwnerState.Disposed) child._disposeTree(true);
      child = next;
    }

    if (self) this._disposeNode();
  }

  _disposeNode(): void {
    if (this._parent) this._parent._removeChild(this);
    this._parent = null;
    this._context = defaultContext;
    this._state = OwnerState.Disposed;
    liveRoots.delete(this);
    this.emptyDisposal();
  }

  _removeChild(child: Owner): void {
    if (this._firstChild === child) {
      this._firstChild = child._nextSibling;
    } else {
      let prev = this._firstChild;
      while (prev && prev._nextSibling !== child) prev = prev._nextSibling;
      if (prev) prev._nextSibling = child._nextSibling;
    }
    child._nextSibling = null;
  }

  emptyDisposal(): void {
    if (!this._disposal) return;

    const disposal = this._disposal;
    this._disposal = null;

    if (Array.isArray(disposal)) {
      for (let i = 0; i < disposal.length; i++) {
        const callable = disposal[i];
        callable.call(callable);
      }
    } else {
      disposal.call(disposal);
    }
  }
}

/**
 * Runs the given function when the current owner is disposed, or before the current computation
 * re-runs.
 */
export function onCleanup(fn: Disposable): Disposable {
  if (!currentOwner) return fn;

  const node = currentOwner;

  if (!node._disposal) {
    node._disposal = fn;
  } else if (Array.isArray(node._disposal)) {
    node._disposal.push(fn);
  } else {
    node._disposal = [node._disposal, fn];
  }
  return fn;
}

/**
 * Runs the given function with `owner` as the current owner, so that primitives created inside
 * are disposed with it. Tracking is left as it is.
 */
export function runWithOwner<T>(owner: Owner | null, fn: () => T): T {
  const prev = setOwner(owner);
  try {
    return fn();
  } finally {
    setOwner(prev);
  }
}

/**
 * Creates a new owner with manual disposal. Nested roots are disposed with their parent. A root
 * and everything it owns stay alive until it is disposed, whether or not `dispose` is kept.
 *
 * @returns the output of `init`.
 */
export function createRoot<T>(init: ((dispose: () => void) => T) | (() => T)): T {
  const owner = new Owner();
  liveRoots.add(owner);
  return runWithOwner(owner, () => init(() => owner.dispose()));
}

export interface Context<T> {
  readonly id: symbol;
  readonly defaultValue: T | undefined;
}

/**
 * Context provides a form of dependency injection. This function creates a new context object
 * that can be used with `getContext` and `setContext`.
 *
 * A default value can be provided here which will be used when a specific value is not provided
 * via a `setContext` call.
 */
export function createContext<T>(defaultValue?: T, description?: string): Context<T> {
  return { id: Symbol(description), defaultValue };
}

/**
 * Attempts to get a context value for the given key.
 *
 * @throws `NoOwnerError` if there's no owner at the time of call.
 * @throws `ContextNotFoundError` if a context value has not been set yet.
 */
export function getContext<T>(context: Context<T>, owner: Owner | null = currentOwner): T {
  if (!owner) {
    throw new NoOwnerError();
  }

  const value = hasContext(context, owner)
    ? (owner._context[context.id] as T)
    : context.defaultValue;

  if (value === undefined) {
    throw new ContextNotFoundError();
  }

  return value;
}

/**
 * Sets a context value on the given owner, visible to it and to owners created under it.
 *
 * @throws `NoOwnerError` if there's no owner at the time of call.
 */
export function setContext<T>(context: Context<T>, value?: T, owner: Owner | null = currentOwner) {
  if (!owner) {
    throw new NoOwnerError();
  }

  // Copy on write, so children created earlier and the parent keep their own view.
  owner._context = {
    ...owner._context,
    [context.id]: value === undefined ? context.defaultValue : value
  };
}

/**
 * Whether the given context is currently defined.
 */
export function hasContext(context: Context<unknown>, owner: Owner | null = currentOwner): boolean {
  return owner !== null && owner._context[context.id] !== undefined;
}
