export {
  ContextNotFoundError,
  DisposedObserverError,
  LeakedObserverError,
  NoOwnerError
} from "./error.js";
export { Callback, type CallbackLookup, type CallbackPtr } from "./callback.js";
export {
  SignalInner,
  sigRefPtr,
  staticCellCount,
  type AnySigRef,
  type AnySignalInner
} from "./cell.js";
export { Computation, type ComputationOptions } from "./computation.js";
export {
  createContext,
  createRoot,
  getContext,
  getOwner,
  hasContext,
  onCleanup,
  Owner,
  runWithOwner,
  setContext,
  type Context,
  type ContextRecord,
  type Disposable
} from "./owner.js";
export { triggerSubscribers, writeSignal } from "./propagate.js";
export {
  DynReadSignal,
  DynSignal,
  isEqual,
  StaticReadSignal,
  StaticSignal,
  type ReadSignal,
  type Reviver,
  type WriteSignal
} from "./signal.js";
export {
  assertNoActiveObserver,
  DependencyTracker,
  getObserver,
  tracker,
  untrack
} from "./tracker.js";
