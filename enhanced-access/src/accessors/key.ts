import { viewOf } from "../core/containers";
import { ACCESSOR_BRAND } from "../core/constants";
import { UnsupportedContainerError } from "../core/errors";
import type { Accessor, Getter, Updated, Updater } from "../core/types";
import { safeStringify } from "../utils/logging";

/**
 * Plain single-key step. Bare keys in a path are shorthand for this accessor.
 *
 * Reading a missing key (or reading through `null`) yields `null` and keeps
 * walking; updating a missing key binds it, appending it to the container.
 * Use `key()` explicitly for keys that are not strings, numbers or symbols,
 * such as object keys of a Map.
 */
export function key(k: unknown): Accessor<"one"> {
  const label = safeStringify(k);

  return {
    [ACCESSOR_BRAND]: "one",
    label,
    get<R>(data: unknown, next: Getter<R>): R {
      if (data == null) return next(null);
      const view = viewOf(data);
      if (!view) {
        throw new UnsupportedContainerError(data, `key ${label}`);
      }
      const found = view.lookup(k);
      return next(found.found ? (found.value ?? null) : null);
    },
    getAndUpdate(data: unknown, next: Updater): Updated<unknown> {
      const view = viewOf(data);
      if (!view) {
        throw new UnsupportedContainerError(
          data,
          `key ${label}`,
          data == null ? "could not update a key on a missing value" : undefined,
        );
      }
      const found = view.lookup(k);
      const current = found.found ? (found.value ?? null) : null;

      const step = next(current);
      if (step.type === "keep") {
        return [step.got, view.put(k, step.value)];
      }
      return [current, view.remove(k)];
    },
  };
}
