import type { EntriesView } from "../core/containers";
import { ACCESSOR_BRAND } from "../core/constants";
import type { Accessor, Entry, Getter, Updated, Updater } from "../core/types";
import { safeStringify } from "../utils/logging";
import { requireView } from "./require-view";

/**
 * Traverse every value except those stored under one of `keys`.
 *
 * Excluded entries are carried over untouched on update and contribute
 * nothing to the gathered results. Keys are compared with SameValueZero,
 * after the same conversion `key()` applies (number keys match record keys
 * such as `"1"`).
 *
 * @example
 * ```ts
 * const input = { a: { b: 1 }, c: { b: 2 }, d: { b: 3 } };
 *
 * getIn(input, [skipKeys(["d"]), "b"]);
 * // => [1, 2]
 *
 * updateIn(input, [skipKeys(["d"]), "b"], (n) => Number(n) + 1);
 * // => { a: { b: 2 }, c: { b: 3 }, d: { b: 3 } }
 * ```
 */
export function skipKeys(
  keys: readonly unknown[] | ReadonlySet<unknown>,
): Accessor<"many"> {
  const excluded: ReadonlySet<unknown> = new Set(keys);
  const label = `skipKeys(${safeStringify(Array.from(excluded))})`;

  return {
    [ACCESSOR_BRAND]: "many",
    label,
    get<R>(data: unknown, next: Getter<R>): R[] {
      const view = requireView(data, label);
      const skipped = storedKeys(view, excluded);
      return view
        .entries()
        .filter(([key]) => !skipped.has(key))
        .map(([, value]) => next(value));
    },
    getAndUpdate(data: unknown, next: Updater): Updated<unknown[]> {
      const view = requireView(data, label);
      const skipped = storedKeys(view, excluded);
      const gets: unknown[] = [];
      const kept: Entry[] = [];
      for (const entry of view.entries()) {
        const [key, value] = entry;
        if (skipped.has(key)) {
          kept.push(entry);
          continue;
        }
        const step = next(value);
        if (step.type === "keep") {
          gets.push(step.got);
          kept.push([key, step.value]);
        } else {
          gets.push(value);
        }
      }
      return [gets, view.rebuild(kept)];
    },
  };
}

function storedKeys(
  view: EntriesView,
  keys: ReadonlySet<unknown>,
): ReadonlySet<unknown> {
  return new Set(Array.from(keys, (k) => view.keyOf(k)));
}
