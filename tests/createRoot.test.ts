import { setFlagsFromString } from "node:v8";
import { runInNewContext } from "node:vm";
import {
  createEffect,
  createMemo,
  createRoot,
  createSignal,
  getOwner,
  onCleanup,
  runWithOwner
} from "../src/index.js";

it("should dispose of inner computations", () => {
  const $x = createSignal(10);
  const memo = vi.fn(() => $x.get() + 10);

  createRoot(dispose => {
    createMemo(memo);
    dispose();
  });
  expect(memo).toHaveBeenCalledTimes(1);

  $x.set(50);
  expect(memo).toHaveBeenCalledTimes(1);
});

it("should return result", () => {
  const result = createRoot(dispose => {
    dispose();
    return 10;
  });

  expect(result).toBe(10);
});

it("should set and restore the owner", () => {
  expect(getOwner()).toBeNull();
  const owner = createRoot(() => getOwner());
  expect(owner).not.toBeNull();
  expect(getOwner()).toBeNull();
});

it("should dispose nested roots with their parent", () => {
  const $x = createSignal(0);
  const effect = vi.fn();

  const dispose = createRoot(dispose => {
    createRoot(() => createEffect(() => effect($x.get())));
    return dispose;
  });
  dispose();
  $x.set(1);

  expect(effect).toHaveBeenCalledTimes(1);
});

it("should not dispose the parent with a nested root", () => {
  const $x = createSignal(0);
  const effect = vi.fn();

  createRoot(() => {
    createEffect(() => effect($x.get()));
    createRoot(dispose => dispose());
  });
  $x.set(1);

  expect(effect).toHaveBeenCalledTimes(2);
});

it("should run code under another owner", () => {
  const cleanup = vi.fn();
  const [owner, dispose] = createRoot(dispose => [getOwner(), dispose] as const);

  runWithOwner(owner, () => onCleanup(cleanup));
  expect(getOwner()).toBeNull();

  dispose();
  expect(cleanup).toHaveBeenCalledTimes(1);
});

it("should restore the owner when the callback throws", () => {
  expect(() =>
    createRoot(() => {
      throw new Error("init failed");
    })
  ).toThrow("init failed");
  expect(getOwner()).toBeNull();
});

setFlagsFromString("--expose-gc");
const gc: () => void = runInNewContext("gc");

async function collectGarbage(): Promise<void> {
  // Weak references read in the current job stay alive until it ends.
  for (let i = 0; i < 5; i++) {
    await new Promise(resolve => setTimeout(resolve, 0));
    gc();
  }
}

it("should keep an undisposed root reacting after garbage collection", async () => {
  const $x = createSignal(0);
  const seen: number[] = [];

  createRoot(() => createEffect(() => void seen.push($x.get())));
  $x.set(1);
  await collectGarbage();
  $x.set(2);

  expect(seen).toEqual([0, 1, 2]);
});

it("should keep a memo owned by a root up to date after garbage collection", async () => {
  const $x = createSignal(1);
  const $double = createRoot(() => createMemo(() => $x.get() * 2));

  await collectGarbage();
  $x.set(5);

  expect($double.get()).toBe(10);
});
