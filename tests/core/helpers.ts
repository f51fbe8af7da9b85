import { Computation, createRoot } from "../../src/core/index.js";

/** A computation owned by a throwaway root, created but not run. */
export function computation(fn: () => void = () => {}): Computation {
  return createRoot(() => new Computation(fn));
}
