/**
 * Run accessor paths against Yjs shared containers.
 *
 * The next state is always computed purely on a plain snapshot first; only
 * the diff between snapshot and result is written back, inside a single
 * transaction, so untouched subtrees keep their Y identity.
 */

import { ENHANCED_ACCESS_ORIGIN } from "../core/constants";
import {
  plainObjectToYType,
  validateDeepForSharedState,
  validateKeyForSharedState,
  yTypeToPlainObject,
} from "../core/converter";
import {
  PatchError,
  SharedStateTransactionError,
  formatPatchPath,
} from "../core/errors";
import { isYArray, isYMap, type YSharedContainer } from "../core/guards";
import { createLogger, type Logger, type LogLevel } from "../core/logger";
import { keep, type Path, type Updater } from "../core/types";
import { planPatch, type PatchOp, type PatchPath } from "../planning/patch-planner";
import { createTraverser, getIn } from "../path/traverse";

/**
 * Options for the shared-state writers.
 */
export interface SharedPathOptions {
  logLevel?: LogLevel;
  /**
   * Transaction origin for the write.
   *
   * @default ENHANCED_ACCESS_ORIGIN
   */
  origin?: unknown;
}

/**
 * Read through `path` from a plain snapshot of a Y.Map or Y.Array.
 */
export function getInShared(root: YSharedContainer, path: Path): unknown {
  return getIn(yTypeToPlainObject(root), path);
}

/**
 * Read and update through `path`, writing the changes back into `root`.
 *
 * @returns The gathered `got` values
 */
export function getAndUpdateInShared(
  root: YSharedContainer,
  path: Path,
  fn: Updater,
  options: SharedPathOptions = {},
): unknown {
  const log = createLogger(options.logLevel);
  const prev = yTypeToPlainObject(root);
  const [got, next] = createTraverser({ logLevel: options.logLevel }).getAndUpdateIn(
    prev,
    path,
    fn,
  );
  commit(root, planPatch(prev, next), options, log);
  return got;
}

export function updateInShared(
  root: YSharedContainer,
  path: Path,
  fn: (value: unknown) => unknown,
  options: SharedPathOptions = {},
): void {
  getAndUpdateInShared(root, path, (value) => keep(null, fn(value)), options);
}

/**
 * Remove every value `path` reaches from `root`.
 *
 * @returns The removed values
 */
export function popInShared(
  root: YSharedContainer,
  path: Path,
  options: SharedPathOptions = {},
): unknown {
  const log = createLogger(options.logLevel);
  const prev = yTypeToPlainObject(root);
  const [popped, next] = createTraverser({ logLevel: options.logLevel }).popIn(
    prev,
    path,
  );
  commit(root, planPatch(prev, next), options, log);
  return popped;
}

function commit(
  root: YSharedContainer,
  ops: PatchOp[],
  options: SharedPathOptions,
  log: Logger,
): void {
  if (ops.length === 0) {
    log.debug("[shared] nothing to write");
    return;
  }

  // Validate everything before opening the transaction to fail fast
  for (const op of ops) {
    const splicesRootList = op.type === "splice" && isYArray(root);
    if (op.path.length === 0 && !splicesRootList) {
      throw new PatchError(op.path, "the root shared container cannot change kind");
    }
    op.path.forEach(validateKeyForSharedState);
    if (op.type === "set") validateDeepForSharedState(op.value);
    if (op.type === "splice") op.items.forEach(validateDeepForSharedState);
  }

  const doc = root.doc;
  if (!doc) {
    throw new PatchError([], "the shared container is not attached to a Y.Doc");
  }

  doc.transact(() => {
    for (const op of ops) {
      log.trace("[shared] apply", { type: op.type, path: op.path });
      try {
        applyOp(root, op);
      } catch (err) {
        log.error("[shared] Error applying patch", {
          type: op.type,
          path: op.path,
          error: err,
        });
        throw new SharedStateTransactionError(
          `Failed to apply ${op.type} at /${formatPatchPath(op.path)}`,
          op.type,
          err,
        );
      }
    }
  }, options.origin ?? ENHANCED_ACCESS_ORIGIN);
}

function childOf(node: unknown, segment: PropertyKey): unknown {
  if (isYMap(node) && typeof segment === "string") return node.get(segment);
  if (isYArray(node) && typeof segment === "number") return node.get(segment);
  return undefined;
}

function resolve(root: YSharedContainer, path: PatchPath): unknown {
  let node: unknown = root;
  for (const segment of path) {
    node = childOf(node, segment);
  }
  return node;
}

function applyOp(root: YSharedContainer, op: PatchOp): void {
  if (op.type === "splice") {
    // Items outside the spliced window keep their Y identity
    const target = resolve(root, op.path);
    if (!isYArray(target)) {
      throw new PatchError(op.path, "no shared array at this path");
    }
    if (op.deleteCount > 0) target.delete(op.index, op.deleteCount);
    if (op.items.length > 0) {
      target.insert(
        op.index,
        op.items.map((item) => plainObjectToYType(item)),
      );
    }
    return;
  }

  const parent = resolve(root, op.path.slice(0, -1));
  const last = op.path[op.path.length - 1];

  if (isYMap(parent) && typeof last === "string") {
    if (op.type === "delete") {
      parent.delete(last);
    } else {
      parent.set(last, plainObjectToYType(op.value));
    }
    return;
  }

  if (isYArray(parent) && typeof last === "number") {
    parent.delete(last, 1);
    if (op.type === "set") {
      parent.insert(last, [plainObjectToYType(op.value)]);
    }
    return;
  }

  throw new PatchError(op.path, "no shared container at this path");
}
