/**
 * Core types for enhanced-access
 *
 * This file contains:
 * - Entry and keyword list shapes
 * - The update transition union (keep / remove)
 * - The accessor protocol shared by every combinator
 * - Utility type predicates
 */

import { ACCESSOR_BRAND } from "./constants";

// ============================================================================
// Entries
// ============================================================================

export type Entry = readonly [key: unknown, value: unknown];

/**
 * Ordered key-value sequence. Keys may repeat; the first entry for a key is
 * the one lookups see.
 */
export type KeywordList = ReadonlyArray<Entry>;

export type Lookup =
  | { readonly found: true; readonly value: unknown }
  | { readonly found: false };

// ============================================================================
// Transitions (what an update continuation returns)
// ============================================================================

export interface Keep<R = unknown> {
  readonly type: "keep";
  readonly got: R;
  readonly value: unknown;
}

export interface Remove {
  readonly type: "remove";
}

export type Transition<R = unknown> = Keep<R> | Remove;

/**
 * Sentinel a continuation returns to drop the current entry.
 */
export const REMOVE: Remove = Object.freeze({ type: "remove" });

export function keep<R>(got: R, value: unknown): Keep<R> {
  return { type: "keep", got, value };
}

export function isRemove(transition: Transition): transition is Remove {
  return transition.type === "remove";
}

// ============================================================================
// Accessor protocol
// ============================================================================

/**
 * "many" accessors (allKeys, skipKeys) gather one result per traversed entry;
 * "one" accessors (optionalKey, key) address a single slot.
 */
export type Arity = "many" | "one";

export type Gathered<A extends Arity, R> = A extends "many" ? R[] : R | null;

export type Getter<R> = (value: unknown) => R;
export type Updater = (value: unknown) => Transition;

export type Updated<G> = readonly [got: G, data: unknown];

export interface Accessor<A extends Arity = Arity> {
  readonly [ACCESSOR_BRAND]: A;
  /** Rendered form used in logs and error messages, e.g. `skipKeys(["d"])` */
  readonly label: string;
  get<R>(data: unknown, next: Getter<R>): Gathered<A, R>;
  getAndUpdate(data: unknown, next: Updater): Updated<Gathered<A, unknown>>;
}

export type PathKey = string | number | symbol;
export type PathSegment = Accessor | PathKey;
export type Path = ReadonlyArray<PathSegment>;

// ============================================================================
// Utility Type Predicates
// ============================================================================

/**
 * Check if a value is a plain object (created by object literal or with null prototype).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Own enumerable keys of an object, symbols included, in property order.
 */
export function ownKeysOf(value: object): Array<string | symbol> {
  return Reflect.ownKeys(value).filter((key) =>
    Object.prototype.propertyIsEnumerable.call(value, key),
  );
}

export function isAccessor(value: unknown): value is Accessor {
  return typeof value === "object" && value !== null && ACCESSOR_BRAND in value;
}

/**
 * SameValueZero, the key equality used by Map and Set.
 */
export function sameKey(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}
