import { describe, expect, it } from "vitest";
import { viewOf } from "./containers";
import { InvalidKeyError } from "./errors";

describe("viewOf()", () => {
  it("recognises records, Maps and keyword lists", () => {
    expect(viewOf({ a: 1 })?.kind).toBe("record");
    expect(viewOf(Object.create(null))?.kind).toBe("record");
    expect(viewOf(new Map())?.kind).toBe("map");
    expect(viewOf([["a", 1]])?.kind).toBe("keyword");
    expect(viewOf([])?.kind).toBe("keyword");
  });

  it("returns undefined for anything else", () => {
    expect(viewOf(null)).toBeUndefined();
    expect(viewOf(undefined)).toBeUndefined();
    expect(viewOf(42)).toBeUndefined();
    expect(viewOf("ab")).toBeUndefined();
    expect(viewOf([1, 2])).toBeUndefined();
    expect(viewOf([["a", 1], ["b"]])).toBeUndefined();
    expect(viewOf(new Date(0))).toBeUndefined();
    expect(viewOf(new Set([1]))).toBeUndefined();
  });
});

describe("record view", () => {
  it("lists entries in insertion order", () => {
    expect(viewOf({ b: 1, a: 2 })?.entries()).toEqual([
      ["b", 1],
      ["a", 2],
    ]);
  });

  it("distinguishes absent keys from keys bound to undefined", () => {
    const view = viewOf({ a: 1, u: undefined });
    expect(view?.lookup("a")).toEqual({ found: true, value: 1 });
    expect(view?.lookup("u")).toEqual({ found: true, value: undefined });
    expect(view?.lookup("missing")).toEqual({ found: false });
    expect(view?.lookup(Symbol("a"))).toEqual({ found: false });
  });

  it("puts existing keys in place and appends new ones", () => {
    const input = { a: 1, b: 2, c: 3 };
    const view = viewOf(input);

    const replaced = view?.put("b", 20);
    expect(replaced).toEqual({ a: 1, b: 20, c: 3 });
    expect(Object.keys(replaced ?? {})).toEqual(["a", "b", "c"]);

    const appended = view?.put("d", 4);
    expect(Object.keys(appended ?? {})).toEqual(["a", "b", "c", "d"]);

    expect(input).toEqual({ a: 1, b: 2, c: 3 });
  });

  it("stores number keys as strings", () => {
    expect(viewOf({})?.put(1, "x")).toEqual({ "1": "x" });
    expect(viewOf({ "1": "x" })?.lookup(1)).toEqual({ found: true, value: "x" });
  });

  it("rejects keys a record cannot hold", () => {
    expect(() => viewOf({})?.put(true, 1)).toThrow(InvalidKeyError);
    expect(() => viewOf({})?.put({}, 1)).toThrow(
      "Record keys must be strings, numbers or symbols, got {}",
    );
  });

  describe("symbol keys", () => {
    const tag = Symbol("tag");

    it("lists enumerable symbol entries after string entries", () => {
      const record = { [tag]: 2, a: 1 };
      Object.defineProperty(record, Symbol("hidden"), {
        value: 3,
        enumerable: false,
      });
      expect(viewOf(record)?.entries()).toEqual([
        ["a", 1],
        [tag, 2],
      ]);
    });

    it("looks up, puts and removes symbol keys", () => {
      const view = viewOf({ a: 1, [tag]: 2 });
      expect(view?.lookup(tag)).toEqual({ found: true, value: 2 });

      const put = viewOf(view?.put(tag, 20));
      expect(put?.lookup(tag)).toEqual({ found: true, value: 20 });
      expect(put?.lookup("a")).toEqual({ found: true, value: 1 });

      const removed = viewOf(view?.remove(tag));
      expect(removed?.entries()).toEqual([["a", 1]]);
    });

    it("keeps symbol entries through a rebuild", () => {
      const view = viewOf({ a: 1, [tag]: 2 });
      const rebuilt = viewOf(view?.rebuild(view?.entries() ?? []));
      expect(rebuilt?.entries()).toEqual([
        ["a", 1],
        [tag, 2],
      ]);
    });

    it("keeps symbol entries when removing a string key", () => {
      const removed = viewOf(viewOf({ a: 1, [tag]: 2 })?.remove("a"));
      expect(removed?.entries()).toEqual([[tag, 2]]);
    });
  });

  it("removes keys without touching the input", () => {
    const input = { a: 1, b: 2 };
    expect(viewOf(input)?.remove("a")).toEqual({ b: 2 });
    expect(viewOf(input)?.remove("zzz")).toEqual({ a: 1, b: 2 });
    expect(input).toEqual({ a: 1, b: 2 });
  });
});

describe("keyOf()", () => {
  it("stores number keys as strings only in records", () => {
    expect(viewOf({})?.keyOf(1)).toBe("1");
    expect(viewOf({})?.keyOf("a")).toBe("a");
    expect(viewOf(new Map())?.keyOf(1)).toBe(1);
    expect(viewOf([])?.keyOf(1)).toBe(1);
  });
});

describe("Map view", () => {
  it("keeps arbitrary keys, including objects and NaN", () => {
    const objKey = { id: 1 };
    const view = viewOf(
      new Map<unknown, unknown>([
        [objKey, "obj"],
        [NaN, "nan"],
      ]),
    );
    expect(view?.lookup(objKey)).toEqual({ found: true, value: "obj" });
    expect(view?.lookup({ id: 1 })).toEqual({ found: false });
    expect(view?.lookup(NaN)).toEqual({ found: true, value: "nan" });
  });

  it("rebuilds, puts and removes into new Maps", () => {
    const input = new Map([
      ["a", 1],
      ["b", 2],
    ]);
    const view = viewOf(input);

    const put = view?.put("a", 10);
    expect(put).toBeInstanceOf(Map);
    expect(put).toEqual(
      new Map([
        ["a", 10],
        ["b", 2],
      ]),
    );
    expect(view?.remove("a")).toEqual(new Map([["b", 2]]));
    expect(view?.rebuild([])).toEqual(new Map());
    expect(input.get("a")).toBe(1);
  });
});

describe("keyword list view", () => {
  const list = [
    ["a", 1],
    ["b", 2],
    ["a", 3],
  ];

  it("looks up the first entry for a key", () => {
    expect(viewOf(list)?.lookup("a")).toEqual({ found: true, value: 1 });
  });

  it("replaces the first entry on put and drops later duplicates", () => {
    expect(viewOf(list)?.put("a", 9)).toEqual([
      ["a", 9],
      ["b", 2],
    ]);
  });

  it("appends on put when the key is absent", () => {
    expect(viewOf(list)?.put("c", 4)).toEqual([
      ["a", 1],
      ["b", 2],
      ["a", 3],
      ["c", 4],
    ]);
  });

  it("removes every entry for a key", () => {
    expect(viewOf(list)?.remove("a")).toEqual([["b", 2]]);
  });

  it("rebuilds without merging duplicates", () => {
    expect(
      viewOf([])?.rebuild([
        ["a", 1],
        ["a", 2],
      ]),
    ).toEqual([
      ["a", 1],
      ["a", 2],
    ]);
  });

  it("never mutates the input list", () => {
    viewOf(list)?.put("a", 0);
    viewOf(list)?.remove("b");
    expect(list).toEqual([
      ["a", 1],
      ["b", 2],
      ["a", 3],
    ]);
  });
});
