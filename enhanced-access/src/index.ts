/**
 * enhanced-access: composable accessors for nested records, Maps and keyword lists
 *
 * This is a barrel file that re-exports the public API.
 */

// Accessors
export { allKeys } from "./accessors/all-keys";
export { skipKeys } from "./accessors/skip-keys";
export { optionalKey } from "./accessors/optional-key";
export { key } from "./accessors/key";

// Path driver
export {
  createTraverser,
  describePath,
  getIn,
  getAndUpdateIn,
  updateIn,
  popIn,
} from "./path/traverse";
export type { Traverser, TraverserOptions } from "./path/traverse";

// Transitions and protocol types
export { REMOVE, keep, isRemove, isAccessor } from "./core/types";
export type {
  Accessor,
  Arity,
  Entry,
  Gathered,
  Getter,
  Keep,
  KeywordList,
  Path,
  PathKey,
  PathSegment,
  Remove,
  Transition,
  Updated,
  Updater,
} from "./core/types";

// Container views
export { viewOf } from "./core/containers";
export type { ContainerKind, EntriesView } from "./core/containers";
export { isContainer, isKeywordList } from "./core/guards";

// Shared-state bindings
export {
  getInShared,
  getAndUpdateInShared,
  updateInShared,
  popInShared,
} from "./bindings/yjs-binding";
export type { SharedPathOptions } from "./bindings/yjs-binding";
export {
  getInProxy,
  getAndUpdateInProxy,
  updateInProxy,
  popInProxy,
} from "./bindings/valtio-binding";
export type { ProxyPathOptions } from "./bindings/valtio-binding";
export { planPatch } from "./planning/patch-planner";
export type {
  DeletePatchOp,
  PatchOp,
  PatchPath,
  SetPatchOp,
  SplicePatchOp,
} from "./planning/patch-planner";

// Constants
export { ENHANCED_ACCESS_ORIGIN } from "./core/constants";

// Logging
export { createLogger } from "./core/logger";
export type { Logger, LogLevel } from "./core/logger";

// Error classes
export {
  EnhancedAccessError,
  UnsupportedContainerError,
  InvalidKeyError,
  PathError,
  PatchError,
  SharedStateValidationError,
  SharedStateTransactionError,
  isEnhancedAccessError,
  isUnsupportedContainerError,
  isPathError,
  isSharedStateValidationError,
  isSharedStateTransactionError,
} from "./core/errors";
export type { ValidationErrorType } from "./core/errors";
