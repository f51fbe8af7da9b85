import type { InspectOptions } from "node:util";
import {
  dynamicRef,
  leakCell,
  SignalInner,
  staticRef,
  type AnySigRef
} from "./cell.js";
import { triggerSubscribers, writeSignal } from "./propagate.js";
import { tracker } from "./tracker.js";

export interface ReadSignal<T> {
  /** Returns the current value and, inside a computation, subscribes that computation to it. */
  get(): T;
  /** Returns the current value without subscribing anything. */
  getUntracked(): T;
}

export interface WriteSignal<T> extends ReadSignal<T> {
  set(value: T): void;
  triggerSubscribers(): void;
  handle(): ReadSignal<T>;
}

export type Reviver<T> = (raw: unknown) => T;

export const inspectCustom = Symbol.for("nodejs.util.inspect.custom");

export function isEqual<T>(a: T, b: T): boolean {
  return a === b;
}

function parse<T>(text: string, revive: Reviver<T>): T {
  const raw: unknown = JSON.parse(text);
  return revive(raw);
}

export abstract class BaseReadSignal<T> implements ReadSignal<T> {
  readonly _cell: SignalInner<T>;
  readonly _ref: AnySigRef;

  constructor(cell: SignalInner<T>, ref: AnySigRef) {
    this._cell = cell;
    this._ref = ref;
  }

  get(): T {
    // Outside a computation (teardown, plain code) there is nothing to track and this is a no-op.
    tracker.track(this._ref);
    return this._cell._value;
  }

  getUntracked(): T {
    return this._cell._value;
  }

  /** Compares current values, not identities. */
  equals(other: ReadSignal<T>): boolean {
    return isEqual(this.getUntracked(), other.getUntracked());
  }

  /** Serializes as the bare value, so `JSON.stringify` sees through the handle. */
  toJSON(): T {
    return this.getUntracked();
  }

  abstract get [Symbol.toStringTag](): string;

  toString(): string {
    return `${this[Symbol.toStringTag]}(${String(this.getUntracked())})`;
  }

  /** Prints `DynSignal(<value>)` and friends in `console.log` and `util.inspect`. */
  [inspectCustom](
    _depth: number,
    options: InspectOptions,
    inspect: (value: unknown, options?: InspectOptions) => string
  ): string {
    return `${this[Symbol.toStringTag]}(${inspect(this.getUntracked(), options)})`;
  }
}

/**
 * A read-only handle on a cell that is never reclaimed.
 *
 * Returned by functions that provide a handle to access state. Use `StaticSignal.handle` to get
 * one from a `StaticSignal`.
 */
export class StaticReadSignal<T> extends BaseReadSignal<T> {
  constructor(cell: SignalInner<T>) {
    super(cell, staticRef(cell));
  }

  override get [Symbol.toStringTag](): string {
    return "StaticReadSignal";
  }

  static fromJSON<T>(text: string, revive: Reviver<T>): StaticReadSignal<T> {
    return StaticSignal.fromJSON(text, revive).handle();
  }
}

/**
 * A read-only handle on a cell that lives as long as its longest-lived handle or subscriber.
 *
 * Use `DynSignal.handle` to get one from a `DynSignal`.
 */
export class DynReadSignal<T> extends BaseReadSignal<T> {
  constructor(cell: SignalInner<T>) {
    super(cell, dynamicRef(cell));
  }

  override get [Symbol.toStringTag](): string {
    return "DynReadSignal";
  }

  static fromJSON<T>(text: string, revive: Reviver<T>): DynReadSignal<T> {
    return DynSignal.fromJSON(text, revive).handle();
  }
}

/**
 * State that can be set, stored in a cell pinned for the rest of the process. Meant for state that
 * outlives every observer.
 *
 * ```typescript
 * const state = new StaticSignal(0);
 * state.get(); // 0
 * state.set(1);
 * state.get(); // 1
 * ```
 */
export class StaticSignal<T> extends StaticReadSignal<T> implements WriteSignal<T> {
  constructor(initial: T) {
    super(leakCell(new SignalInner(initial)));
  }

  override get [Symbol.toStringTag](): string {
    return "StaticSignal";
  }

  /**
   * Sets the current value and runs every computation that depends on it, before returning.
   */
  set(value: T): void {
    writeSignal(this._cell, value);
  }

  /**
   * Runs the subscribers without changing the value, for values that were mutated in place.
   * Prefer `set` otherwise.
   */
  triggerSubscribers(): void {
    triggerSubscribers(this._cell);
  }

  handle(): StaticReadSignal<T> {
    return new StaticReadSignal(this._cell);
  }

  static override fromJSON<T>(text: string, revive: Reviver<T>): StaticSignal<T> {
    return new StaticSignal(parse(text, revive));
  }
}

/**
 * State that can be set, stored in a cell that is garbage collected with its last handle.
 *
 * ```typescript
 * const state = new DynSignal(0);
 * state.get(); // 0
 * state.set(1);
 * state.get(); // 1
 * ```
 */
export class DynSignal<T> extends DynReadSignal<T> implements WriteSignal<T> {
  constructor(initial: T) {
    super(new SignalInner(initial));
  }

  override get [Symbol.toStringTag](): string {
    return "DynSignal";
  }

  set(value: T): void {
    writeSignal(this._cell, value);
  }

  triggerSubscribers(): void {
    triggerSubscribers(this._cell);
  }

  handle(): DynReadSignal<T> {
    return new DynReadSignal(this._cell);
  }

  static override fromJSON<T>(text: string, revive: Reviver<T>): DynSignal<T> {
    return new DynSignal(parse(text, revive));
  }
}
