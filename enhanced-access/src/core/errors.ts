/**
 * Error types for enhanced-access.
 *
 * The combinators themselves never raise on absent keys; these classes cover
 * the protocol layer (shapes an accessor cannot traverse, malformed paths)
 * and the shared-state bindings.
 */

import { safeStringify } from "../utils/logging";

/**
 * Base class for all enhanced-access errors.
 */
export class EnhancedAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnhancedAccessError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an accessor is handed a value that is neither a record, a Map
 * nor a keyword list.
 *
 * @example
 * ```typescript
 * getIn({ a: 1 }, [allKeys(), allKeys()]);
 * // UnsupportedContainerError: allKeys() cannot traverse 1
 * ```
 */
export class UnsupportedContainerError extends EnhancedAccessError {
  constructor(
    public readonly value: unknown,
    public readonly accessor: string,
    detail?: string,
  ) {
    super(
      `${accessor} cannot traverse ${safeStringify(value)}` +
        (detail ? `: ${detail}` : ""),
    );
    this.name = "UnsupportedContainerError";
  }
}

/**
 * Thrown when a key cannot be stored in the target container kind
 * (records only hold string and symbol keys).
 */
export class InvalidKeyError extends EnhancedAccessError {
  constructor(public readonly key: unknown) {
    super(
      `Record keys must be strings, numbers or symbols, got ${safeStringify(key)}`,
    );
    this.name = "InvalidKeyError";
  }
}

/**
 * Thrown by the path driver when a path cannot be run at all
 * (empty update path, pop on a missing root).
 */
export class PathError extends EnhancedAccessError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Invalid path ${path}: ${reason}`);
    this.name = "PathError";
  }
}

/**
 * Thrown when a computed patch cannot be written back into shared state.
 */
export class PatchError extends EnhancedAccessError {
  constructor(
    public readonly path: ReadonlyArray<PropertyKey>,
    public readonly reason: string,
  ) {
    super(`Cannot patch at /${formatPatchPath(path)}: ${reason}`);
    this.name = "PatchError";
  }
}

export function formatPatchPath(path: ReadonlyArray<PropertyKey>): string {
  return path.map((segment) => String(segment)).join("/");
}

/**
 * Error types for values rejected before they reach a Y.Doc.
 */
export type ValidationErrorType =
  | "undefined"
  | "undefined-in-object"
  | "function"
  | "symbol"
  | "bigint"
  | "non-finite"
  | "non-plain"
  | "reparenting";

/**
 * Thrown when an updated value cannot be stored in a Y.Doc.
 *
 * Nothing has been written when this is raised: validation runs before the
 * transaction opens.
 *
 * @example
 * ```typescript
 * try {
 *   updateInShared(yRoot, ["settings", "theme"], () => Symbol("dark"));
 * } catch (err) {
 *   if (err instanceof SharedStateValidationError) {
 *     console.log(`Invalid ${err.errorType}: ${err.message}`);
 *   }
 * }
 * ```
 */
export class SharedStateValidationError extends EnhancedAccessError {
  constructor(
    message: string,
    public readonly value: unknown,
    public readonly errorType: ValidationErrorType,
  ) {
    super(message);
    this.name = "SharedStateValidationError";
  }

  /**
   * Returns suggested fixes for this error.
   */
  getSuggestedFix(): string {
    switch (this.errorType) {
      case "undefined":
      case "undefined-in-object":
        return "Replace 'undefined' with null, or return REMOVE to drop the entry.";
      case "function":
        return "Store data only. Keep functions out of shared state.";
      case "symbol":
        return "Replace symbols with strings or numbers.";
      case "bigint":
        return "Convert BigInt to string: bigIntValue.toString()";
      case "non-finite":
        return "Replace with null or a string representation.";
      case "non-plain":
        return "Convert to plain object. For Date: date.toISOString(), for Map: Object.fromEntries(map)";
      case "reparenting":
        return "Create a deep clone at the application layer before assigning.";
      default:
        return "";
    }
  }
}

/**
 * Thrown when applying a patch fails inside a Yjs transaction.
 */
export class SharedStateTransactionError extends EnhancedAccessError {
  constructor(
    message: string,
    public readonly operation: "set" | "delete" | "splice",
    public readonly cause: unknown,
  ) {
    super(message);
    this.name = "SharedStateTransactionError";
  }
}

export function isEnhancedAccessError(
  error: unknown,
): error is EnhancedAccessError {
  return error instanceof EnhancedAccessError;
}

export function isUnsupportedContainerError(
  error: unknown,
): error is UnsupportedContainerError {
  return error instanceof UnsupportedContainerError;
}

export function isPathError(error: unknown): error is PathError {
  return error instanceof PathError;
}

export function isSharedStateValidationError(
  error: unknown,
): error is SharedStateValidationError {
  return error instanceof SharedStateValidationError;
}

export function isSharedStateTransactionError(
  error: unknown,
): error is SharedStateTransactionError {
  return error instanceof SharedStateTransactionError;
}
