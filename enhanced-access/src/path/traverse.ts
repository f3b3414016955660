/**
 * Path driver.
 *
 * Chains accessors along a path: each segment is invoked with the value the
 * previous segment handed it and a continuation that runs the rest of the
 * path. Bare keys are shorthand for `key(segment)`.
 */

import { key } from "../accessors/key";
import { PathError } from "../core/errors";
import { createLogger, type LogLevel } from "../core/logger";
import {
  REMOVE,
  isAccessor,
  keep,
  type Accessor,
  type Path,
  type PathSegment,
  type Transition,
  type Updated,
  type Updater,
} from "../core/types";
import { safeStringify } from "../utils/logging";

/**
 * Options for createTraverser().
 */
export interface TraverserOptions {
  /**
   * Log level for path steps. `"trace"` logs every accessor invocation.
   *
   * @default "warn"
   */
  logLevel?: LogLevel;
}

export interface Traverser {
  /** Read through `path`; multi-entry accessors gather nested arrays */
  getIn: (data: unknown, path: Path) => unknown;
  /** Read and update in one pass; `fn` returns `keep(got, next)` or `REMOVE` */
  getAndUpdateIn: (data: unknown, path: Path, fn: Updater) => Updated<unknown>;
  /** Replace every value the path reaches with `fn(value)` */
  updateIn: (data: unknown, path: Path, fn: (value: unknown) => unknown) => unknown;
  /** Remove every value the path reaches, returning what was removed */
  popIn: (data: unknown, path: Path) => Updated<unknown>;
}

export function toAccessor(segment: PathSegment): Accessor {
  return isAccessor(segment) ? segment : key(segment);
}

/**
 * Render a path for logs and error messages.
 *
 * @example
 * ```ts
 * describePath([allKeys(), "b", optionalKey("c")]);
 * // => '[allKeys(), "b", optionalKey("c")]'
 * ```
 */
export function describePath(path: Path): string {
  const parts = path.map((segment) =>
    isAccessor(segment) ? segment.label : safeStringify(segment),
  );
  return `[${parts.join(", ")}]`;
}

export function createTraverser(options: TraverserOptions = {}): Traverser {
  const log = createLogger(options.logLevel);

  const stepAt = (path: Path, depth: number, op: string): Accessor => {
    const accessor = toAccessor(path[depth]);
    log.trace(`[${op}] step`, { depth, segment: accessor.label });
    return accessor;
  };

  const getIn = (data: unknown, path: Path): unknown => {
    const walk = (value: unknown, depth: number): unknown => {
      if (depth === path.length) return value;
      return stepAt(path, depth, "getIn").get(value, (child) =>
        walk(child, depth + 1),
      );
    };
    return walk(data, 0);
  };

  const getAndUpdateIn = (
    data: unknown,
    path: Path,
    fn: Updater,
  ): Updated<unknown> => {
    if (path.length === 0) {
      throw new PathError(describePath(path), "cannot update through an empty path");
    }
    const last = path.length - 1;

    const walk = (value: unknown, depth: number): Updated<unknown> => {
      const accessor = stepAt(path, depth, "getAndUpdateIn");
      if (depth === last) return accessor.getAndUpdate(value, fn);
      return accessor.getAndUpdate(value, (child): Transition => {
        const [got, updated] = walk(child, depth + 1);
        return keep(got, updated);
      });
    };
    return walk(data, 0);
  };

  const updateIn = (
    data: unknown,
    path: Path,
    fn: (value: unknown) => unknown,
  ): unknown => getAndUpdateIn(data, path, (value) => keep(null, fn(value)))[1];

  const popIn = (data: unknown, path: Path): Updated<unknown> => {
    if (data == null) {
      throw new PathError(describePath(path), "cannot pop from a missing value");
    }
    if (path.length === 0) {
      throw new PathError(describePath(path), "cannot pop through an empty path");
    }
    const last = path.length - 1;

    const walk = (value: unknown, depth: number): Updated<unknown> => {
      const accessor = stepAt(path, depth, "popIn");
      if (depth === last) return accessor.getAndUpdate(value, () => REMOVE);
      return accessor.getAndUpdate(value, (child): Transition => {
        // a missing intermediate value removes the entry that held it
        if (child == null) return REMOVE;
        const [got, updated] = walk(child, depth + 1);
        return keep(got, updated);
      });
    };

    const result = walk(data, 0);
    log.debug("[popIn] done", { path: describePath(path) });
    return result;
  };

  return { getIn, getAndUpdateIn, updateIn, popIn };
}

const defaultTraverser = createTraverser();

export const getIn = defaultTraverser.getIn;
export const getAndUpdateIn = defaultTraverser.getAndUpdateIn;
export const updateIn = defaultTraverser.updateIn;
export const popIn = defaultTraverser.popIn;
