import { createEffect, createRoot, createSelector, createSignal, untrack } from "../src/index.js";

const name = createSignal("");

createRoot(() => {
  const hasName = createSelector(() => name.get() !== "");

  createEffect(() => {
    console.log(`Hello ${hasName.get() ? untrack(() => name.get()) : "World"}!`);
  });
});

name.set("Ada");
name.set("");
