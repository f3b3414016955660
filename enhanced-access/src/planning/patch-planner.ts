// Patch planner
//
// Responsibility:
// - Diff a previous plain state against the next one computed by the path driver
// - Emit the smallest set of keyed writes that turns one into the other
// - Stay independent of the target (Y types, Valtio proxies) that applies them

import { isPlainObject, ownKeysOf } from "../core/types";

export type PatchPath = ReadonlyArray<string | number | symbol>;

export interface SetPatchOp {
  readonly type: "set";
  readonly path: PatchPath;
  readonly value: unknown;
}

export interface DeletePatchOp {
  readonly type: "delete";
  readonly path: PatchPath;
}

/**
 * Replace `deleteCount` items of the array at `path`, starting at `index`,
 * with `items`. Items outside that window are left in place.
 */
export interface SplicePatchOp {
  readonly type: "splice";
  readonly path: PatchPath;
  readonly index: number;
  readonly deleteCount: number;
  readonly items: readonly unknown[];
}

export type PatchOp = SetPatchOp | DeletePatchOp | SplicePatchOp;

/**
 * Plans the writes that turn `prev` into `next`.
 *
 * Records are diffed key by key, symbol keys included (deletes first, then
 * sets in `next` order). Arrays of equal length are diffed index by index.
 * When the length changed, the unchanged head and tail stay where they are
 * and only the window between them is spliced. Any other change is a `set`
 * at its path, so a `set` with an empty path means the root changed kind.
 *
 * @param prev - State before the update
 * @param next - State after the update
 * @returns Ordered patch operations
 */
export function planPatch(prev: unknown, next: unknown): PatchOp[] {
  const ops: PatchOp[] = [];
  diffInto(prev, next, [], ops);
  return ops;
}

function isUnchanged(prev: unknown, next: unknown): boolean {
  const ops: PatchOp[] = [];
  diffInto(prev, next, [], ops);
  return ops.length === 0;
}

function diffInto(
  prev: unknown,
  next: unknown,
  path: Array<string | number | symbol>,
  ops: PatchOp[],
): void {
  if (Object.is(prev, next)) return;

  if (isPlainObject(prev) && isPlainObject(next)) {
    for (const key of ownKeysOf(prev)) {
      if (!Object.hasOwn(next, key)) {
        ops.push({ type: "delete", path: [...path, key] });
      }
    }
    for (const key of ownKeysOf(next)) {
      const value: unknown = Reflect.get(next, key);
      if (Object.hasOwn(prev, key)) {
        diffInto(Reflect.get(prev, key), value, [...path, key], ops);
      } else {
        ops.push({ type: "set", path: [...path, key], value });
      }
    }
    return;
  }

  if (Array.isArray(prev) && Array.isArray(next)) {
    if (prev.length === next.length) {
      next.forEach((value: unknown, index) => {
        diffInto(prev[index], value, [...path, index], ops);
      });
      return;
    }

    const shorter = Math.min(prev.length, next.length);
    let head = 0;
    while (head < shorter && isUnchanged(prev[head], next[head])) head++;
    let tail = 0;
    while (
      tail < shorter - head &&
      isUnchanged(prev[prev.length - 1 - tail], next[next.length - 1 - tail])
    ) {
      tail++;
    }
    ops.push({
      type: "splice",
      path,
      index: head,
      deleteCount: prev.length - head - tail,
      items: next.slice(head, next.length - tail),
    });
    return;
  }

  ops.push({ type: "set", path, value: next });
}
