import { ACCESSOR_BRAND } from "../core/constants";
import type { Accessor, Entry, Getter, Updated, Updater } from "../core/types";
import { requireView } from "./require-view";

/**
 * Traverse every value of a record, Map or keyword list, ignoring keys.
 *
 * @example
 * ```ts
 * getIn({ a: { b: 1 }, c: { b: 2 } }, [allKeys(), "b"]);
 * // => [1, 2]
 *
 * popIn({ a: { b: 1 }, c: { b: 2 } }, [allKeys(), "b"]);
 * // => [[1, 2], { a: {}, c: {} }]
 * ```
 */
export function allKeys(): Accessor<"many"> {
  const label = "allKeys()";
  return {
    [ACCESSOR_BRAND]: "many",
    label,
    get<R>(data: unknown, next: Getter<R>): R[] {
      return requireView(data, label)
        .entries()
        .map(([, value]) => next(value));
    },
    getAndUpdate(data: unknown, next: Updater): Updated<unknown[]> {
      const view = requireView(data, label);
      const gets: unknown[] = [];
      const kept: Entry[] = [];
      for (const [key, value] of view.entries()) {
        const step = next(value);
        if (step.type === "keep") {
          gets.push(step.got);
          kept.push([key, step.value]);
        } else {
          // popped entries surface their original value
          gets.push(value);
        }
      }
      return [gets, view.rebuild(kept)];
    },
  };
}
