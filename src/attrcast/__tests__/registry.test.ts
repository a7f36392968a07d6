import { describe, it, expect } from "vitest";
import { NO_DEFAULT } from "../defaults.js";
import { UnknownAttributeError } from "../errors.js";
import { TypeRegistry } from "../registry.js";
import { IntegerType, StringType } from "../types/index.js";

describe("TypeRegistry", () => {
  it("fails lookups for names never registered", () => {
    const registry = new TypeRegistry("products");
    expect(() => registry.lookup("nope")).toThrow(UnknownAttributeError);
    expect(() => registry.lookup("nope")).toThrow("unknown attribute 'nope' for products");
  });

  it("fills in descriptor defaults and freezes it", () => {
    const registry = new TypeRegistry();
    const type = new IntegerType();
    const descriptor = registry.register("age", type);

    expect(descriptor).toEqual({
      name: "age",
      typeObject: type,
      defaultSpec: { kind: "none" },
      userProvidedDefault: true,
      virtual: false,
    });
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(registry.lookup("age")).toBe(descriptor);
  });

  it("normalises literal and producer defaults", () => {
    const registry = new TypeRegistry();
    const produce = () => 1;

    expect(registry.register("a", new IntegerType(), 5).defaultSpec).toEqual({
      kind: "literal",
      value: 5,
    });
    expect(registry.register("b", new IntegerType(), produce).defaultSpec).toEqual({
      kind: "producer",
      produce,
    });
    expect(registry.register("c", new IntegerType(), NO_DEFAULT).defaultSpec).toEqual({
      kind: "none",
    });
  });

  it("lets the last registration for a name win", () => {
    const registry = new TypeRegistry();
    registry.register("code", new IntegerType());
    registry.register("code", new StringType(), "x", false, { virtual: true });

    const descriptor = registry.lookup("code");
    expect(descriptor.typeObject).toBeInstanceOf(StringType);
    expect(descriptor.userProvidedDefault).toBe(false);
    expect(descriptor.virtual).toBe(true);
    expect(registry.names()).toEqual(["code"]);
  });

  it("lists and clears its entries", () => {
    const registry = new TypeRegistry();
    registry.register("a", new IntegerType());
    registry.register("b", new StringType());

    expect(registry.has("a")).toBe(true);
    expect(registry.names()).toEqual(["a", "b"]);
    expect(registry.descriptors().map((d) => d.typeObject.name)).toEqual(["integer", "string"]);

    registry.clear();
    expect(registry.has("a")).toBe(false);
    expect(registry.names()).toEqual([]);
  });

  it("takes over the entries of another registry", () => {
    const live = new TypeRegistry("items");
    live.register("old", new StringType());
    const staged = new TypeRegistry("items");
    const id = staged.register("id", new IntegerType());

    live.replaceWith(staged);
    expect(live.names()).toEqual(["id"]);
    expect(live.lookup("id")).toBe(id);

    staged.register("later", new StringType());
    expect(live.has("later")).toBe(false);
  });
});
