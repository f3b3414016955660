import { describe, expect, it } from "vitest";
import {
  EnhancedAccessError,
  PatchError,
  PathError,
  SharedStateTransactionError,
  UnsupportedContainerError,
  isEnhancedAccessError,
  isPathError,
  isSharedStateTransactionError,
  isUnsupportedContainerError,
} from "./errors";

describe("errors", () => {
  it("names the accessor and the rejected value", () => {
    const err = new UnsupportedContainerError(new Map([["a", 1]]), "allKeys()");
    expect(err.message).toBe('allKeys() cannot traverse {"[Map]":[["a",1]]}');
    expect(err.name).toBe("UnsupportedContainerError");
  });

  it("appends the detail when given", () => {
    expect(new UnsupportedContainerError(3, "allKeys()", "expected a record").message).toBe(
      "allKeys() cannot traverse 3: expected a record",
    );
  });

  it("formats path and patch locations", () => {
    expect(new PathError("[]", "cannot update through an empty path").message).toBe(
      "Invalid path []: cannot update through an empty path",
    );
    expect(new PatchError(["users", 0, "age"], "no shared container at this path").message).toBe(
      "Cannot patch at /users/0/age: no shared container at this path",
    );
    expect(new PatchError(["meta", Symbol("tag")], "symbol key").message).toBe(
      "Cannot patch at /meta/Symbol(tag): symbol key",
    );
  });

  it("keeps the cause of a failed transaction", () => {
    const cause = new Error("inner");
    const err = new SharedStateTransactionError("Failed to apply set at /a", "set", cause);
    expect(err.cause).toBe(cause);
    expect(err.operation).toBe("set");
  });

  it("shares one base class and narrows with guards", () => {
    const err = new PathError("[]", "reason");
    expect(err).toBeInstanceOf(EnhancedAccessError);
    expect(err).toBeInstanceOf(Error);
    expect(isEnhancedAccessError(err)).toBe(true);
    expect(isPathError(err)).toBe(true);
    expect(isUnsupportedContainerError(err)).toBe(false);
    expect(isSharedStateTransactionError(new Error("plain"))).toBe(false);
  });
});
