import { describe, it, expect } from "vitest";
import { ValueOutOfRangeError } from "../../errors.js";
import { BigIntegerType, DecimalType, FloatType, IntegerType } from "../numeric.js";

describe("IntegerType", () => {
  const type = new IntegerType();

  it("truncates decimal strings", () => {
    expect(type.cast("27.43")).toBe(27);
  });

  it("truncates numbers toward zero", () => {
    expect(type.cast(27.9)).toBe(27);
    expect(type.cast(-27.9)).toBe(-27);
    expect(type.cast(-0.4)).toBe(0);
  });

  it("reads the leading integer of a string", () => {
    expect(type.cast("  42abc")).toBe(42);
  });

  it("casts booleans to 1 and 0", () => {
    expect(type.cast(true)).toBe(1);
    expect(type.cast(false)).toBe(0);
  });

  it("returns null for blank, non-numeric and missing input", () => {
    expect(type.cast("")).toBeNull();
    expect(type.cast("abc")).toBeNull();
    expect(type.cast(null)).toBeNull();
    expect(type.cast(undefined)).toBeNull();
    expect(type.cast(Infinity)).toBeNull();
  });

  it("deserializes driver strings", () => {
    expect(type.deserialize("15")).toBe(15);
  });

  it("serializes within the 4-byte range and rejects values outside it", () => {
    expect(type.serialize(2147483647)).toBe(2147483647);
    expect(type.serialize(-2147483648)).toBe(-2147483648);
    expect(() => type.serialize(2147483648)).toThrow(ValueOutOfRangeError);
    expect(() => type.serialize(-2147483649)).toThrow(
      "-2147483649 is out of range for integer with limit 4 bytes"
    );
  });

  it("honours a smaller limit", () => {
    const small = new IntegerType({ limit: 2 });
    expect(small.serialize(32767)).toBe(32767);
    expect(() => small.serialize(40000)).toThrow(ValueOutOfRangeError);
  });

  it("passes null through serialize", () => {
    expect(type.serialize(null)).toBeNull();
  });
});

describe("BigIntegerType", () => {
  const type = new BigIntegerType();

  it("uses an 8-byte limit", () => {
    expect(type.name).toBe("big_integer");
    expect(type.limit).toBe(8);
  });

  it("keeps int8 values beyond 2^53 exact", () => {
    const value = type.deserialize("9007199254740993");
    expect(value).toBe(9007199254740993n);
    expect(type.serialize(value)).toBe("9007199254740993");
  });

  it("round-trips the largest int8", () => {
    const value = type.deserialize("9223372036854775807");
    expect(type.serialize(value)).toBe("9223372036854775807");
    expect(type.serialize(-9223372036854775808n)).toBe("-9223372036854775808");
  });

  it("rejects values outside the 8-byte range", () => {
    expect(() => type.serialize(9223372036854775808n)).toThrow(
      "9223372036854775808 is out of range for big_integer with limit 8 bytes"
    );
  });

  it("truncates numbers and decimal strings", () => {
    expect(type.cast(27.9)).toBe(27n);
    expect(type.cast("-27.43")).toBe(-27n);
    expect(type.cast(true)).toBe(1n);
  });

  it("returns null for blank, non-numeric and non-finite input", () => {
    expect(type.cast("")).toBeNull();
    expect(type.cast("abc")).toBeNull();
    expect(type.cast(NaN)).toBeNull();
  });
});

describe("FloatType", () => {
  const type = new FloatType();

  it("parses numeric strings", () => {
    expect(type.cast("3.5")).toBe(3.5);
    expect(type.cast(" -2.25 ")).toBe(-2.25);
  });

  it("recognises Infinity and NaN spellings", () => {
    expect(type.cast("Infinity")).toBe(Infinity);
    expect(type.cast("-Infinity")).toBe(-Infinity);
    expect(Number.isNaN(type.cast("NaN"))).toBe(true);
  });

  it("returns null for non-numeric strings", () => {
    expect(type.cast("x")).toBeNull();
  });

  it("casts false to 0", () => {
    expect(type.cast(false)).toBe(0);
  });
});

describe("DecimalType", () => {
  it("rounds to scale", () => {
    expect(new DecimalType({ scale: 2 }).cast("19.999")).toBe(20);
  });

  it("keeps precision significant digits", () => {
    expect(new DecimalType({ precision: 3 }).cast(12345)).toBe(12300);
  });

  it("applies precision then scale", () => {
    expect(new DecimalType({ precision: 5, scale: 2 }).cast("123.456")).toBe(123.46);
  });

  it("returns null for blank input", () => {
    expect(new DecimalType().cast(" ")).toBeNull();
  });
});
