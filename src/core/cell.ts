import type { Callback, CallbackPtr } from "./callback.js";

/** Type-erased view of a cell, enough to add and remove graph edges. */
export interface AnySignalInner {
  subscribe(handler: Callback): void;
  unsubscribe(handler: CallbackPtr): void;
}

export class SignalInner<T> implements AnySignalInner {
  _value: T;
  // Insertion order decides notification order, see triggerSubscribers.
  readonly _subscribers = new Map<CallbackPtr, Callback>();

  constructor(value: T) {
    this._value = value;
  }

  /** Adds a handler to the subscriber list. Does nothing if it is already a subscriber. */
  subscribe(handler: Callback): void {
    if (!this._subscribers.has(handler.ptr)) this._subscribers.set(handler.ptr, handler);
  }

  /** Removes a handler from the subscriber list. Does nothing if it is not a subscriber. */
  unsubscribe(handler: CallbackPtr): void {
    this._subscribers.delete(handler);
  }

  /** Replaces the value. Subscribers are not called; use `triggerSubscribers` for that. */
  update(value: T): void {
    this._value = value;
  }
}

const staticCells: AnySignalInner[] = [];

/**
 * A reference to a cell from the dependency graph. Static cells are pinned for the life of the
 * process, dynamic cells live as long as someone holds a handle or a reference on them.
 */
export type AnySigRef =
  | { readonly kind: "static"; readonly cell: AnySignalInner }
  | { readonly kind: "dynamic"; readonly cell: AnySignalInner };

/** Pins a cell for the rest of the process. */
export function leakCell<T>(cell: SignalInner<T>): SignalInner<T> {
  staticCells.push(cell);
  return cell;
}

export function staticRef(cell: AnySignalInner): AnySigRef {
  return { kind: "static", cell };
}

export function dynamicRef(cell: AnySignalInner): AnySigRef {
  return { kind: "dynamic", cell };
}

export function sigRefPtr(ref: AnySigRef): AnySignalInner {
  return ref.cell;
}

export function subscribeRef(ref: AnySigRef, handler: Callback): void {
  ref.cell.subscribe(handler);
}

export function unsubscribeRef(ref: AnySigRef, handler: CallbackPtr): void {
  ref.cell.unsubscribe(handler);
}

export function staticCellCount(): number {
  return staticCells.length;
}
