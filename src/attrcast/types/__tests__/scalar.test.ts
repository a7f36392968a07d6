import { describe, it, expect } from "vitest";
import { CoercionError } from "../../errors.js";
import { BooleanType } from "../boolean.js";
import { DateTimeType, DateType } from "../date.js";
import { EnumType } from "../enum.js";
import { JsonType } from "../json.js";
import { StringType } from "../string.js";
import { ValueType } from "../value.js";

describe("ValueType", () => {
  it("keeps values as given", () => {
    const type = new ValueType();
    const raw = { a: 1 };
    expect(type.cast(raw)).toBe(raw);
    expect(type.serialize(raw)).toBe(raw);
    expect(type.cast(undefined)).toBeNull();
  });
});

describe("BooleanType", () => {
  const type = new BooleanType();

  it("maps false spellings to false", () => {
    for (const raw of [false, 0, "0", "f", "F", "false", "FALSE", "off", "OFF"]) {
      expect(type.cast(raw)).toBe(false);
    }
  });

  it("maps anything else to true", () => {
    expect(type.cast("yes")).toBe(true);
    expect(type.cast("true")).toBe(true);
    expect(type.cast(1)).toBe(true);
  });

  it("casts the empty string to null", () => {
    expect(type.cast("")).toBeNull();
  });

  it("serializes through cast", () => {
    expect(type.serialize(false)).toBe(false);
    expect(type.serialize(null)).toBeNull();
  });
});

describe("StringType", () => {
  it("spells booleans as t and f", () => {
    const type = new StringType();
    expect(type.cast(true)).toBe("t");
    expect(type.cast(false)).toBe("f");
  });

  it("takes custom boolean spellings", () => {
    const type = new StringType({ trueValue: "1", falseValue: "0" });
    expect(type.cast(true)).toBe("1");
    expect(type.cast(false)).toBe("0");
  });

  it("stringifies numbers and dates", () => {
    const type = new StringType();
    expect(type.cast(42)).toBe("42");
    expect(type.cast(new Date(Date.UTC(2024, 0, 2)))).toBe("2024-01-02T00:00:00.000Z");
  });
});

describe("DateType", () => {
  const type = new DateType();

  it("parses ISO dates as UTC midnight", () => {
    expect(type.cast("2024-02-29")?.toISOString()).toBe("2024-02-29T00:00:00.000Z");
  });

  it("rejects days that do not exist", () => {
    expect(type.cast("2023-02-29")).toBeNull();
  });

  it("returns null for unparseable strings", () => {
    expect(type.cast("not a date")).toBeNull();
  });

  it("drops the time of a Date", () => {
    const day = type.cast(new Date("2024-03-05T15:30:00Z"));
    expect(day?.toISOString()).toBe("2024-03-05T00:00:00.000Z");
  });

  it("serializes to YYYY-MM-DD", () => {
    expect(type.serialize(new Date(Date.UTC(2024, 2, 5)))).toBe("2024-03-05");
  });

  it("compares by instant", () => {
    expect(type.isEqual(new Date(Date.UTC(2024, 0, 1)), new Date(Date.UTC(2024, 0, 1)))).toBe(true);
    expect(type.isEqual(new Date(Date.UTC(2024, 0, 1)), null)).toBe(false);
  });
});

describe("DateTimeType", () => {
  it("keeps milliseconds by default", () => {
    const type = new DateTimeType();
    expect(type.cast("2024-03-05T15:30:45.678Z")?.toISOString()).toBe("2024-03-05T15:30:45.678Z");
  });

  it("truncates to the configured precision", () => {
    const type = new DateTimeType({ precision: 0 });
    expect(type.cast("2024-03-05T15:30:45.678Z")?.toISOString()).toBe("2024-03-05T15:30:45.000Z");
  });

  it("returns null for blank and invalid input", () => {
    const type = new DateTimeType();
    expect(type.cast("")).toBeNull();
    expect(type.cast("garbage")).toBeNull();
  });

  it("serializes to ISO-8601", () => {
    const type = new DateTimeType();
    expect(type.serialize(new Date(Date.UTC(2024, 0, 1, 8)))).toBe("2024-01-01T08:00:00.000Z");
  });
});

describe("JsonType", () => {
  const type = new JsonType();

  it("keeps cast values as given", () => {
    const raw = { a: 1 };
    expect(type.cast(raw)).toBe(raw);
  });

  it("parses stored JSON text", () => {
    expect(type.deserialize('{"a":[1,2]}')).toEqual({ a: [1, 2] });
  });

  it("keeps text that does not parse", () => {
    expect(type.deserialize("{oops")).toBe("{oops");
  });

  it("passes through string and number scalars a driver already decoded", () => {
    expect(type.deserialize("hello")).toBe("hello");
    expect(type.deserialize("123")).toBe("123");
    expect(type.deserialize(123)).toBe(123);
    expect(type.deserialize(false)).toBe(false);
  });

  it("round-trips scalars", () => {
    for (const value of ["hello", "123", "{x", 42, true]) {
      expect(type.deserialize(type.serialize(value))).toBe(value);
    }
  });

  it("passes through objects a driver already decoded", () => {
    const decoded = { a: 1 };
    expect(type.deserialize(decoded)).toBe(decoded);
  });

  it("serializes to JSON text", () => {
    expect(type.serialize({ b: true })).toBe('{"b":true}');
    expect(type.serialize("hello")).toBe('"hello"');
    expect(type.serialize(7)).toBe(7);
    expect(type.serialize(null)).toBeNull();
  });
});

describe("EnumType", () => {
  const type = new EnumType(["ADMIN", "STUDENT"], "user_role");

  it("matches labels case-insensitively", () => {
    expect(type.cast("admin")).toBe("ADMIN");
    expect(type.deserialize("STUDENT")).toBe("STUDENT");
  });

  it("throws on labels it does not declare", () => {
    expect(() => type.cast("guest")).toThrow(CoercionError);
    expect(() => type.cast("guest")).toThrow(
      "'guest' is not a valid user_role (expected one of ADMIN, STUDENT)"
    );
  });
});
