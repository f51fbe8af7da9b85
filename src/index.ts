export {
  ContextNotFoundError,
  DisposedObserverError,
  LeakedObserverError,
  NoOwnerError,
  assertNoActiveObserver,
  createContext,
  createRoot,
  getContext,
  getObserver,
  getOwner,
  hasContext,
  isEqual,
  onCleanup,
  runWithOwner,
  setContext,
  untrack,
  DynReadSignal,
  DynSignal,
  StaticReadSignal,
  StaticSignal
} from "./core/index.js";
export type {
  Context,
  ContextRecord,
  Disposable,
  Owner,
  ReadSignal,
  Reviver,
  WriteSignal
} from "./core/index.js";
export * from "./signals.js";
