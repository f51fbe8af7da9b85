import { inspect } from "node:util";
import {
  createSignal,
  createStaticSignal,
  DynReadSignal,
  DynSignal,
  StaticReadSignal,
  StaticSignal
} from "../src/index.js";
import { staticCellCount } from "../src/core/index.js";

it("should store and return value on read", () => {
  const $x = createSignal(1);
  expect($x).toBeInstanceOf(DynSignal);
  expect($x.get()).toBe(1);
  expect($x.getUntracked()).toBe(1);
});

it("should update signal via set", () => {
  const $x = createSignal(1);
  $x.set(2);
  expect($x.get()).toBe(2);
});

it("should share the cell between a signal and its handles", () => {
  const $x = createSignal("a");
  const handle = $x.handle();

  expect(handle).toBeInstanceOf(DynReadSignal);
  expect(handle).not.toBeInstanceOf(DynSignal);
  expect(handle._cell).toBe($x._cell);

  $x.set("b");
  expect(handle.get()).toBe("b");
});

it("should pin static cells once per signal", () => {
  const before = staticCellCount();

  const $x = createStaticSignal(0);
  expect($x).toBeInstanceOf(StaticSignal);
  expect(staticCellCount()).toBe(before + 1);

  const handle = $x.handle();
  expect(handle).toBeInstanceOf(StaticReadSignal);
  expect(staticCellCount()).toBe(before + 1);

  createSignal(0);
  expect(staticCellCount()).toBe(before + 1);
});

it("should keep earlier snapshots when a new value is set", () => {
  const $x = createSignal({ count: 1 });
  const first = $x.get();

  $x.set({ count: 2 });

  expect(first).toEqual({ count: 1 });
  expect($x.get()).toEqual({ count: 2 });
  expect($x.get()).not.toBe(first);
});

it("should compare signals by value", () => {
  expect(createSignal(1).equals(createStaticSignal(1))).toBe(true);
  expect(createSignal(1).equals(createSignal(2).handle())).toBe(false);
  expect(createSignal({}).equals(createSignal({}))).toBe(false);
});

it("should accept functions as values", () => {
  const $fn = createSignal<() => number>(() => 10);
  expect($fn.get()()).toBe(10);
  $fn.set(() => 20);
  expect($fn.get()()).toBe(20);
});

it("should name the handle type in its string form", () => {
  const $x = createSignal(1);

  expect(String($x)).toBe("DynSignal(1)");
  expect(String($x.handle())).toBe("DynReadSignal(1)");
  expect(String(createStaticSignal("a"))).toBe("StaticSignal(a)");
  expect(String(createStaticSignal(true).handle())).toBe("StaticReadSignal(true)");
  expect(Object.prototype.toString.call($x)).toBe("[object DynSignal]");
});

it("should inspect the current value", () => {
  const $x = createSignal({ count: 1 });

  expect(inspect($x)).toBe("DynSignal({ count: 1 })");
  $x.set({ count: 2 });
  expect(inspect($x.handle())).toBe("DynReadSignal({ count: 2 })");
  expect(inspect(createStaticSignal("a"))).toBe("StaticSignal('a')");
});
