import { describe, it, expect, vi } from "vitest";
import { NO_DEFAULT, resolveDefault, toDefaultSpec, validateDefault } from "../defaults.js";
import { EnumType, IntegerType, StringType } from "../types/index.js";

describe("toDefaultSpec", () => {
  it("tags each kind of default", () => {
    const produce = () => "x";
    expect(toDefaultSpec(NO_DEFAULT)).toEqual({ kind: "none" });
    expect(toDefaultSpec(produce)).toEqual({ kind: "producer", produce });
    expect(toDefaultSpec(0)).toEqual({ kind: "literal", value: 0 });
    expect(toDefaultSpec(null)).toEqual({ kind: "literal", value: null });
  });
});

describe("resolveDefault", () => {
  it("reads no default as null", () => {
    expect(resolveDefault({ kind: "none" })).toBeNull();
  });

  it("returns primitive literals as given", () => {
    expect(resolveDefault({ kind: "literal", value: "draft" })).toBe("draft");
    expect(resolveDefault({ kind: "literal", value: 0 })).toBe(0);
  });

  it("copies object literals on every resolution", () => {
    const value = { tags: ["a"], since: new Date(0) };
    const copy = resolveDefault({ kind: "literal", value });
    expect(copy).toEqual(value);
    expect(copy).not.toBe(value);
    if (typeof copy === "object" && copy !== null) {
      expect(Reflect.get(copy, "tags")).not.toBe(value.tags);
      expect(Reflect.get(copy, "since")).not.toBe(value.since);
    }
  });

  it("keeps class instances as they are", () => {
    class Money {
      constructor(readonly cents: number) {}
    }
    const value = new Money(100);
    expect(resolveDefault({ kind: "literal", value })).toBe(value);
  });

  it("calls producers on every resolution", () => {
    const produce = vi.fn(() => []);
    const first = resolveDefault({ kind: "producer", produce });
    const second = resolveDefault({ kind: "producer", produce });
    expect(produce).toHaveBeenCalledTimes(2);
    expect(first).not.toBe(second);
  });

  it("lets producer failures propagate", () => {
    const spec = toDefaultSpec(() => {
      throw new Error("clock unavailable");
    });
    expect(() => resolveDefault(spec)).toThrow("clock unavailable");
  });
});

describe("validateDefault", () => {
  it("accepts literals the type can cast", () => {
    expect(validateDefault("qty", toDefaultSpec("12"), new IntegerType())).toEqual([]);
    expect(validateDefault("name", toDefaultSpec("x"), new StringType())).toEqual([]);
  });

  it("reports literals the type turns into null", () => {
    expect(validateDefault("qty", toDefaultSpec("lots"), new IntegerType())).toEqual([
      "DEFAULT ERROR: qty has invalid default value for type:integer",
    ]);
  });

  it("reports literals a strict type rejects", () => {
    expect(validateDefault("role", toDefaultSpec("x"), new EnumType(["A", "B"]))).toEqual([
      "DEFAULT ERROR: role: 'x' is not a valid enum (expected one of A, B)",
    ]);
  });

  it("skips producers, null and NO_DEFAULT", () => {
    const type = new IntegerType();
    expect(validateDefault("a", toDefaultSpec(() => "lots"), type)).toEqual([]);
    expect(validateDefault("a", toDefaultSpec(null), type)).toEqual([]);
    expect(validateDefault("a", toDefaultSpec(NO_DEFAULT), type)).toEqual([]);
  });
});
