import { OwnerState } from "./constants.js";
import type { Computation } from "./computation.js";

export type CallbackPtr = number;

export type CallbackLookup =
  | { readonly alive: true; readonly target: Computation }
  | { readonly alive: false };

let nextPtr = 0;

/**
 * A subscriber entry. Cells hold callbacks strongly, callbacks hold their computation weakly, so a
 * subscription never extends the life of the computation behind it.
 */
export class Callback {
  readonly ptr: CallbackPtr = nextPtr++;
  private readonly _target: WeakRef<Computation>;

  constructor(target: Computation) {
    this._target = new WeakRef(target);
  }

  tryCallback(): CallbackLookup {
    const target = this._target.deref();
    if (target === undefined || target._state === OwnerState.Disposed) return { alive: false };
    return { alive: true, target };
  }

  /**
   * Runs the computation behind this callback. Returns false without doing anything when the
   * computation is gone or is already running further up the stack.
   */
  invoke(): boolean {
    const lookup = this.tryCallback();
    return lookup.alive ? lookup.target.run() : false;
  }
}
