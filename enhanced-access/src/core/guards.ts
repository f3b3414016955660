import * as Y from "yjs";
import { isPlainObject, type Entry, type KeywordList } from "./types";

export type YSharedContainer = Y.Map<unknown> | Y.Array<unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value);
}

export function isEntry(value: unknown): value is Entry {
  return Array.isArray(value) && value.length === 2;
}

export function isKeywordList(value: unknown): value is KeywordList {
  return Array.isArray(value) && value.every(isEntry);
}

export function isContainer(value: unknown): boolean {
  return value instanceof Map || isKeywordList(value) || isRecord(value);
}

export function isYSharedContainer(value: unknown): value is YSharedContainer {
  return value instanceof Y.Map || value instanceof Y.Array;
}

export function isYMap(value: unknown): value is Y.Map<unknown> {
  return value instanceof Y.Map;
}

export function isYArray(value: unknown): value is Y.Array<unknown> {
  return value instanceof Y.Array;
}

export function isYAbstractType(
  value: unknown,
): value is Y.AbstractType<unknown> {
  return value instanceof Y.AbstractType;
}
