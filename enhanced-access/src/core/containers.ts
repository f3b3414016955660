/**
 * Container views.
 *
 * Every supported container kind is exposed through the same ordered-entries
 * interface so accessors are written once. Views never mutate the container
 * they wrap; `rebuild`, `put` and `remove` return a new container of the same
 * concrete kind.
 */

import { InvalidKeyError } from "./errors";
import { isKeywordList, isRecord } from "./guards";
import { ownKeysOf, sameKey, type Entry, type KeywordList, type Lookup } from "./types";

export type ContainerKind = "record" | "map" | "keyword";

export interface EntriesView {
  readonly kind: ContainerKind;
  /** Entries in iteration order */
  entries(): Entry[];
  /** A new container of the same kind holding exactly these entries */
  rebuild(entries: readonly Entry[]): unknown;
  /** The key as this container stores it (records hold numbers as strings) */
  keyOf(key: unknown): unknown;
  lookup(key: unknown): Lookup;
  /** Binds `key`, keeping its position when it already exists */
  put(key: unknown, value: unknown): unknown;
  /** Drops every entry for `key` */
  remove(key: unknown): unknown;
}

const NOT_FOUND: Lookup = { found: false };

function toRecordKey(key: unknown): string | symbol {
  if (typeof key === "string" || typeof key === "symbol") return key;
  if (typeof key === "number") return String(key);
  throw new InvalidKeyError(key);
}

class RecordView implements EntriesView {
  readonly kind = "record";

  constructor(private readonly record: Readonly<Record<string, unknown>>) {}

  entries(): Entry[] {
    return ownKeysOf(this.record).map((key): Entry => [
      key,
      Reflect.get(this.record, key),
    ]);
  }

  rebuild(entries: readonly Entry[]): Record<string, unknown> {
    return Object.fromEntries(
      entries.map(([key, value]): [string | symbol, unknown] => [
        toRecordKey(key),
        value,
      ]),
    );
  }

  keyOf(key: unknown): unknown {
    return typeof key === "number" ? String(key) : key;
  }

  lookup(key: unknown): Lookup {
    const k = this.keyOf(key);
    if (typeof k !== "string" && typeof k !== "symbol") return NOT_FOUND;
    return Object.hasOwn(this.record, k)
      ? { found: true, value: Reflect.get(this.record, k) }
      : NOT_FOUND;
  }

  put(key: unknown, value: unknown): Record<string, unknown> {
    return this.rebuild(putEntry(this.entries(), toRecordKey(key), value));
  }

  remove(key: unknown): Record<string, unknown> {
    if (!this.lookup(key).found) return { ...this.record };
    const k = this.keyOf(key);
    return this.rebuild(this.entries().filter(([entryKey]) => entryKey !== k));
  }
}

class MapView implements EntriesView {
  readonly kind = "map";

  constructor(private readonly map: ReadonlyMap<unknown, unknown>) {}

  entries(): Entry[] {
    return Array.from(this.map.entries());
  }

  rebuild(entries: readonly Entry[]): Map<unknown, unknown> {
    return new Map(entries);
  }

  keyOf(key: unknown): unknown {
    return key;
  }

  lookup(key: unknown): Lookup {
    return this.map.has(key)
      ? { found: true, value: this.map.get(key) }
      : NOT_FOUND;
  }

  put(key: unknown, value: unknown): Map<unknown, unknown> {
    const next = new Map(this.map);
    next.set(key, value);
    return next;
  }

  remove(key: unknown): Map<unknown, unknown> {
    const next = new Map(this.map);
    next.delete(key);
    return next;
  }
}

class KeywordView implements EntriesView {
  readonly kind = "keyword";

  constructor(private readonly list: KeywordList) {}

  entries(): Entry[] {
    return this.list.map(([key, value]): Entry => [key, value]);
  }

  rebuild(entries: readonly Entry[]): Entry[] {
    return entries.map(([key, value]): Entry => [key, value]);
  }

  keyOf(key: unknown): unknown {
    return key;
  }

  lookup(key: unknown): Lookup {
    const entry = this.list.find(([entryKey]) => sameKey(entryKey, key));
    return entry ? { found: true, value: entry[1] } : NOT_FOUND;
  }

  put(key: unknown, value: unknown): Entry[] {
    return putEntry(this.entries(), key, value);
  }

  remove(key: unknown): Entry[] {
    return this.list
      .filter(([entryKey]) => !sameKey(entryKey, key))
      .map(([k, v]): Entry => [k, v]);
  }
}

// Replace the first entry for `key` in place and drop later duplicates; append when absent.
function putEntry(entries: Entry[], key: unknown, value: unknown): Entry[] {
  const result: Entry[] = [];
  let placed = false;
  for (const entry of entries) {
    if (!sameKey(entry[0], key)) {
      result.push(entry);
    } else if (!placed) {
      result.push([entry[0], value]);
      placed = true;
    }
  }
  if (!placed) result.push([key, value]);
  return result;
}

/**
 * Resolve the entries view for a container, or `undefined` when the value is
 * not a record, a Map or a keyword list.
 */
export function viewOf(value: unknown): EntriesView | undefined {
  if (value instanceof Map) return new MapView(value);
  if (isKeywordList(value)) return new KeywordView(value);
  if (isRecord(value)) return new RecordView(value);
  return undefined;
}
