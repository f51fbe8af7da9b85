declare const __DEV__: boolean | undefined;

/** Replaced at bundle time; unbundled builds and tests run in development mode. */
export const IS_DEV: boolean = typeof __DEV__ === "undefined" ? true : __DEV__;

export const enum OwnerState {
  Idle = 0,
  Running = 1,
  Disposed = 2
}
