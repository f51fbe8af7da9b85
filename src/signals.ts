import {
  Computation,
  DynSignal,
  isEqual,
  StaticSignal,
  type ComputationOptions,
  type DynReadSignal
} from "./core/index.js";

export type EffectOptions = ComputationOptions;

export interface MemoOptions<T> {
  name?: string;
  /** Skips notifying when it returns true for the previous and next value. Defaults to never. */
  equals?: false | ((prev: T, next: T) => boolean);
}

/**
 * Creates reactive state whose cell is garbage collected with its last handle.
 *
 * ```typescript
 * const count = createSignal(0);
 * createEffect(() => console.log(count.get()));
 * count.set(1); // logs 1 before returning
 * ```
 */
export function createSignal<T>(value: T): DynSignal<T> {
  return new DynSignal(value);
}

/**
 * Creates reactive state whose cell is never reclaimed. Use it for state that lives as long as the
 * program.
 */
export function createStaticSignal<T>(value: T): StaticSignal<T> {
  return new StaticSignal(value);
}

/**
 * Runs `fn` now and again, synchronously, every time one of the signals it read is set.
 *
 * The effect belongs to the current owner; effects created during a run belong to the effect and
 * are disposed before it runs again.
 */
export function createEffect(fn: () => void, options?: EffectOptions): void {
  new Computation(fn, options).run();
}

/**
 * Creates a read-only signal holding the result of `fn`, recomputed whenever a signal `fn` read is
 * set. Dependents are notified on every recomputation unless `options.equals` reports the value
 * unchanged.
 */
export function createMemo<T>(fn: () => T, options?: MemoOptions<T>): DynReadSignal<T> {
  const equals = options?.equals ?? false;
  const memo: { signal: DynSignal<T> | null } = { signal: null };

  createEffect(
    () => {
      const next = fn();
      if (memo.signal === null) memo.signal = new DynSignal(next);
      else if (!equals || !equals(memo.signal.getUntracked(), next)) memo.signal.set(next);
    },
    { name: options?.name }
  );

  if (memo.signal === null) throw new Error("Memo was not computed on creation.");
  return memo.signal.handle();
}

/**
 * Like `createMemo`, but only notifies dependents when the value changes according to `equals`.
 *
 * ```typescript
 * const name = createSignal("");
 * const hasName = createSelector(() => name.get() !== "");
 * ```
 */
export function createSelector<T>(
  fn: () => T,
  equals: (prev: T, next: T) => boolean = isEqual
): DynReadSignal<T> {
  return createMemo(fn, { equals });
}
