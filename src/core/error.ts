import { IS_DEV } from "./constants.js";

/**
 * A computation was torn down while it was still on the tracking stack. Continuing would register
 * edges on a dead node, so this is never caught by the core.
 */
export class DisposedObserverError extends Error {
  constructor(name?: string) {
    super(
      IS_DEV
        ? `Computation${name ? ` "${name}"` : ""} was disposed while it was running and then read a signal.`
        : ""
    );
  }
}

export class LeakedObserverError extends Error {
  constructor(depth: number) {
    super(IS_DEV ? `Expected no active computation, found ${depth} on the tracking stack.` : "");
  }
}

export class NoOwnerError extends Error {
  constructor() {
    super(
      IS_DEV
        ? "No owner exists at time of call. Make sure `getContext` is called within an owner or create one first via `createRoot`."
        : ""
    );
  }
}

export class ContextNotFoundError extends Error {
  constructor() {
    super(
      IS_DEV
        ? "Must provide either a default context value or set one via `setContext` before getting."
        : ""
    );
  }
}
