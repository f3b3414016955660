/**
 * Run accessor paths against Valtio proxies.
 *
 * Reads go through `snapshot()`. Writes compute the next state from that
 * snapshot and patch the proxy in place, so subscribers only see the keys
 * that actually changed.
 */

import { snapshot } from "valtio/vanilla";
import { PatchError } from "../core/errors";
import { createLogger, type LogLevel } from "../core/logger";
import { isPlainObject, keep, ownKeysOf, type Path, type Updater } from "../core/types";
import {
  planPatch,
  type PatchOp,
  type PatchPath,
} from "../planning/patch-planner";
import { createTraverser, getIn } from "../path/traverse";

export interface ProxyPathOptions {
  logLevel?: LogLevel;
}

export function getInProxy(state: object, path: Path): unknown {
  return getIn(snapshot(state), path);
}

/**
 * Read and update through `path`, patching `state` in place.
 *
 * @returns The gathered `got` values
 */
export function getAndUpdateInProxy(
  state: object,
  path: Path,
  fn: Updater,
  options: ProxyPathOptions = {},
): unknown {
  const prev: unknown = snapshot(state);
  const [got, next] = createTraverser(options).getAndUpdateIn(prev, path, fn);
  applyPatch(state, planPatch(prev, next), options);
  return got;
}

export function updateInProxy(
  state: object,
  path: Path,
  fn: (value: unknown) => unknown,
  options: ProxyPathOptions = {},
): void {
  getAndUpdateInProxy(state, path, (value) => keep(null, fn(value)), options);
}

/**
 * Remove every value `path` reaches from `state`.
 *
 * @returns The removed values
 */
export function popInProxy(
  state: object,
  path: Path,
  options: ProxyPathOptions = {},
): unknown {
  const prev: unknown = snapshot(state);
  const [popped, next] = createTraverser(options).popIn(prev, path);
  applyPatch(state, planPatch(prev, next), options);
  return popped;
}

// Snapshots are frozen; assign fresh copies so the proxy can wrap them.
function toMutable(value: unknown): unknown {
  if (Array.isArray(value)) return value.map((item: unknown) => toMutable(item));
  if (value instanceof Map) {
    return new Map(
      Array.from(value.entries(), ([k, v]): [unknown, unknown] => [
        k,
        toMutable(v),
      ]),
    );
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      ownKeysOf(value).map((k): [string | symbol, unknown] => [
        k,
        toMutable(Reflect.get(value, k)),
      ]),
    );
  }
  return value;
}

function resolve(state: object, path: PatchPath): unknown {
  let node: unknown = state;
  for (const segment of path) {
    if (typeof node !== "object" || node === null) return undefined;
    node = Reflect.get(node, segment);
  }
  return node;
}

function applyPatch(
  state: object,
  ops: PatchOp[],
  options: ProxyPathOptions,
): void {
  const log = createLogger(options.logLevel);
  for (const op of ops) {
    log.trace("[proxy] apply", { type: op.type, path: op.path });

    if (op.type === "splice") {
      const target = resolve(state, op.path);
      if (!Array.isArray(target)) {
        throw new PatchError(op.path, "no proxy array at this path");
      }
      target.splice(
        op.index,
        op.deleteCount,
        ...op.items.map((item) => toMutable(item)),
      );
      continue;
    }

    if (op.path.length === 0) {
      throw new PatchError(op.path, "the root proxy cannot change kind");
    }

    const parent = resolve(state, op.path.slice(0, -1));
    if (typeof parent !== "object" || parent === null) {
      throw new PatchError(op.path, "no proxy container at this path");
    }

    const last = op.path[op.path.length - 1];
    if (op.type === "delete") {
      Reflect.deleteProperty(parent, last);
    } else {
      Reflect.set(parent, last, toMutable(op.value));
    }
  }
}
