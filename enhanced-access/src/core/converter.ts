import * as Y from "yjs";
import { isYAbstractType, isYArray, isYMap } from "./guards";
import { isPlainObject, ownKeysOf } from "./types";
import { SharedStateValidationError } from "./errors";

const ERROR_UNDEFINED =
  "[enhanced-access] undefined is not allowed in shared state. Use null or return REMOVE.";
const ERROR_UNDEFINED_IN_OBJECT =
  "[enhanced-access] undefined is not allowed in objects for shared state. Use null or omit the field.";
const ERROR_FUNCTION =
  "[enhanced-access] Unable to convert function. Functions are not allowed in shared state.";
const ERROR_SYMBOL =
  "[enhanced-access] Unable to convert symbol. Symbols are not allowed in shared state.";
const ERROR_SYMBOL_KEY =
  "[enhanced-access] Unable to store a symbol key. Shared maps only hold string keys.";
const ERROR_BIGINT =
  "[enhanced-access] Unable to convert BigInt. BigInt is not allowed in shared state.";
const ERROR_NON_FINITE =
  "[enhanced-access] Infinity and NaN are not allowed in shared state. Only finite numbers are supported.";
const ERROR_REPARENTING =
  "[enhanced-access] Cannot re-assign a collaborative object that is already in the document. " +
  "Create a deep clone of it before writing it to a new location.";

const createUnsupportedObjectError = (ctorName: string): string =>
  `[enhanced-access] Unable to convert non-plain object of type "${ctorName}". ` +
  "Only plain objects/arrays/primitives are supported.";

function throwIfReparenting(yType: Y.AbstractType<unknown>): void {
  if (yType.parent !== null) {
    throw new SharedStateValidationError(ERROR_REPARENTING, yType, "reparenting");
  }
}

function constructorName(value: object): string {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "UnknownObject";
}

/**
 * Recursively converts a Yjs shared container into plain records and arrays.
 * Leaf Y types (Y.Text, Y.Xml*) are kept as they are.
 */
export function yTypeToPlainObject(yValue: unknown): unknown {
  if (isYMap(yValue)) {
    const entries = Array.from(yValue.entries()).map(
      ([key, value]) => [key, yTypeToPlainObject(value)] as const,
    );
    return Object.fromEntries(entries);
  }
  if (isYArray(yValue)) {
    return yValue.toArray().map(yTypeToPlainObject);
  }
  return yValue;
}

function validatePrimitive(jsValue: unknown): void {
  if (jsValue === undefined) {
    throw new SharedStateValidationError(ERROR_UNDEFINED, jsValue, "undefined");
  }
  if (typeof jsValue === "function") {
    throw new SharedStateValidationError(ERROR_FUNCTION, jsValue, "function");
  }
  if (typeof jsValue === "symbol") {
    throw new SharedStateValidationError(ERROR_SYMBOL, jsValue, "symbol");
  }
  if (typeof jsValue === "bigint") {
    throw new SharedStateValidationError(ERROR_BIGINT, jsValue, "bigint");
  }
  if (typeof jsValue === "number" && !Number.isFinite(jsValue)) {
    throw new SharedStateValidationError(ERROR_NON_FINITE, jsValue, "non-finite");
  }
}

/**
 * Rejects keys a Y.Map cannot hold.
 */
export function validateKeyForSharedState(key: PropertyKey): void {
  if (typeof key === "symbol") {
    throw new SharedStateValidationError(ERROR_SYMBOL_KEY, key, "symbol");
  }
}

/**
 * Recursively validates a value before it is written to a Y.Doc.
 * Throws synchronously so nothing is written when any part is unsupported.
 */
export function validateDeepForSharedState(jsValue: unknown): void {
  // Y types are valid, but check for forbidden re-parenting
  if (isYAbstractType(jsValue)) {
    throwIfReparenting(jsValue);
    return;
  }

  if (jsValue === null || typeof jsValue !== "object") {
    validatePrimitive(jsValue);
    return;
  }

  if (Array.isArray(jsValue)) {
    for (const item of jsValue) {
      validateDeepForSharedState(item);
    }
    return;
  }

  if (isPlainObject(jsValue)) {
    for (const key of ownKeysOf(jsValue)) {
      validateKeyForSharedState(key);
    }
    for (const value of Object.values(jsValue)) {
      if (value === undefined) {
        throw new SharedStateValidationError(
          ERROR_UNDEFINED_IN_OBJECT,
          jsValue,
          "undefined-in-object",
        );
      }
      validateDeepForSharedState(value);
    }
    return;
  }

  throw new SharedStateValidationError(
    createUnsupportedObjectError(constructorName(jsValue)),
    jsValue,
    "non-plain",
  );
}

/**
 * Recursively converts a validated plain value into Yjs shared types.
 *
 * Callers MUST call validateDeepForSharedState() first.
 */
export function plainObjectToYType(jsValue: unknown): unknown {
  if (isYAbstractType(jsValue)) {
    throwIfReparenting(jsValue);
    return jsValue;
  }

  if (Array.isArray(jsValue)) {
    const yArray = new Y.Array<unknown>();
    yArray.insert(0, jsValue.map((v: unknown) => plainObjectToYType(v)));
    return yArray;
  }

  if (isPlainObject(jsValue)) {
    const yMap = new Y.Map<unknown>();
    for (const [key, value] of Object.entries(jsValue)) {
      yMap.set(key, plainObjectToYType(value));
    }
    return yMap;
  }

  return jsValue;
}
