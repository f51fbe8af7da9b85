import { Callback } from "./callback.js";
import { sigRefPtr, subscribeRef, unsubscribeRef, type AnySigRef, type AnySignalInner } from "./cell.js";
import { IS_DEV, OwnerState } from "./constants.js";
import { Owner, setOwner } from "./owner.js";
import { tracker } from "./tracker.js";

export interface ComputationOptions {
  name?: string;
}

// Nothing else would keep computations created outside an owner reachable.
const unowned = new Set<Computation>();

/**
 * A function that re-runs whenever a cell it read during its last run is written.
 *
 * Edges are rebuilt on every run: the computation unsubscribes from everything before running and
 * subscribes to what it read once it is done. Nested computations therefore subscribe before their
 * parent, which is what lets `triggerSubscribers` run parents first.
 */
export class Computation extends Owner {
  _fn: (() => void) | null;
  _name: string | undefined;
  readonly _callback: Callback;
  readonly _dependencies = new Map<AnySignalInner, AnySigRef>();

  constructor(fn: () => void, options?: ComputationOptions) {
    super();
    this._fn = fn;
    this._callback = new Callback(this);
    if (IS_DEV) this._name = options?.name;

    if (!this._parent) {
      unowned.add(this);
      if (IS_DEV)
        console.warn(
          `Computation${this._name ? ` "${this._name}"` : ""} created outside a \`createRoot\` will never be disposed.`
        );
    }
  }

  addDependency(ref: AnySigRef): void {
    const ptr = sigRefPtr(ref);
    if (!this._dependencies.has(ptr)) this._dependencies.set(ptr, ref);
  }

  /**
   * Runs the computation and re-subscribes it to what it read. Returns false without running when
   * it is already running or disposed.
   */
  run(): boolean {
    if (this._state !== OwnerState.Idle || !this._fn) return false;
    const fn = this._fn;
    this._state = OwnerState.Running;

    tracker.untracked(() => {
      this.dispose(false);
      this.emptyDisposal();
    });
    this._retireEdges();

    const prevOwner = setOwner(this);
    tracker.enter(this);
    try {
      fn();
    } finally {
      tracker.exit();
      setOwner(prevOwner);
      // Disposed from inside its own run: keep no edges.
      if (this._state === OwnerState.Running) {
        for (const ref of this._dependencies.values()) subscribeRef(ref, this._callback);
        this._state = OwnerState.Idle;
      }
    }
    return true;
  }

  _retireEdges(): void {
    for (const ref of this._dependencies.values()) unsubscribeRef(ref, this._callback.ptr);
    this._dependencies.clear();
  }

  override _disposeNode(): void {
    this._retireEdges();
    this._fn = null;
    unowned.delete(this);
    super._disposeNode();
  }
}
