import { viewOf } from "../core/containers";
import { ACCESSOR_BRAND } from "../core/constants";
import type { Accessor, Getter, Updated, Updater } from "../core/types";
import { safeStringify } from "../utils/logging";

/**
 * Traverse a single key that may be missing.
 *
 * A key that is absent, or bound to `null` or `undefined`, short-circuits to
 * `null` without calling the continuation; on update the container is
 * returned as is. Values that are not containers are treated the same way.
 *
 * @example
 * ```ts
 * getIn({ a: { b: 1 }, c: { d: 2 } }, [allKeys(), optionalKey("b")]);
 * // => [1, null]
 * ```
 */
export function optionalKey(key: unknown): Accessor<"one"> {
  const label = `optionalKey(${safeStringify(key)})`;

  return {
    [ACCESSOR_BRAND]: "one",
    label,
    get<R>(data: unknown, next: Getter<R>): R | null {
      const found = viewOf(data)?.lookup(key);
      if (found === undefined || !found.found || found.value == null) {
        return null;
      }
      return next(found.value);
    },
    getAndUpdate(data: unknown, next: Updater): Updated<unknown> {
      const view = viewOf(data);
      const found = view?.lookup(key);
      if (!view || found === undefined || !found.found || found.value == null) {
        return [null, data];
      }

      const step = next(found.value);
      if (step.type === "keep") {
        return [step.got, view.put(key, step.value)];
      }
      return [found.value, view.remove(key)];
    },
  };
}
