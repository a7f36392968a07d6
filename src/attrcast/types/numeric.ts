// types/numeric.ts

import { ValueOutOfRangeError } from "../errors.js";
import { BaseType } from "./value.js";

const NUMERIC_START = /^\s*[+-]?\d/;

/* ===============================
 * SHARED HELPERS
 * =============================== */

/** Strings that cannot start a number (including blank ones) cast to null. */
export function isNumericString(value: string): boolean {
  return NUMERIC_START.test(value);
}

function toFloat(raw: unknown): number | null {
  if (typeof raw === "number") return raw;
  if (typeof raw === "bigint") return Number(raw);
  if (typeof raw === "boolean") return raw ? 1 : 0;
  if (typeof raw !== "string") return null;

  const text = raw.trim();
  if (text === "Infinity") return Infinity;
  if (text === "-Infinity") return -Infinity;
  if (text === "NaN") return NaN;
  if (!isNumericString(text)) return null;

  return parseFloat(text);
}

/* ===============================
 * INTEGER
 * =============================== */

export interface IntegerOptions {
  /** Storage size in bytes; bounds what serialize accepts. */
  limit?: number;
}

export class IntegerType extends BaseType<number> {
  readonly name: string = "integer";
  readonly limit: number;
  private readonly max: number;

  constructor(options: IntegerOptions = {}) {
    super();
    this.limit = options.limit ?? 4;
    this.max = 2 ** (this.limit * 8 - 1);
  }

  override serialize(value: number | null): number | null {
    if (value === null) return null;
    if (value < -this.max || value >= this.max) {
      throw new ValueOutOfRangeError(this.name, value, this.limit);
    }
    return value;
  }

  protected castValue(raw: unknown): number | null {
    if (typeof raw === "boolean") return raw ? 1 : 0;
    if (typeof raw === "bigint") return Number(raw);

    if (typeof raw === "number") {
      // -0 collapses to 0
      return Number.isFinite(raw) ? Math.trunc(raw) || 0 : null;
    }

    if (typeof raw === "string") {
      if (!isNumericString(raw)) return null;
      return parseInt(raw, 10);
    }

    return null;
  }
}

const LEADING_INTEGER = /^\s*([+-]?\d+)/;

/**
 * int8 values as bigint. Storage gets decimal text, which is also what pg
 * hands back for int8 columns.
 */
export class BigIntegerType extends BaseType<bigint> {
  readonly name: string = "big_integer";
  readonly limit: number;
  private readonly max: bigint;

  constructor(options: IntegerOptions = {}) {
    super();
    this.limit = options.limit ?? 8;
    this.max = 2n ** BigInt(this.limit * 8 - 1);
  }

  override serialize(value: bigint | null): string | null {
    if (value === null) return null;
    if (value < -this.max || value >= this.max) {
      throw new ValueOutOfRangeError(this.name, value, this.limit);
    }
    return value.toString();
  }

  protected castValue(raw: unknown): bigint | null {
    if (typeof raw === "bigint") return raw;
    if (typeof raw === "boolean") return raw ? 1n : 0n;

    if (typeof raw === "number") {
      return Number.isFinite(raw) ? BigInt(Math.trunc(raw)) : null;
    }

    if (typeof raw === "string") {
      const match = LEADING_INTEGER.exec(raw);
      return match?.[1] === undefined ? null : BigInt(match[1]);
    }

    return null;
  }
}

/* ===============================
 * FLOAT / DECIMAL
 * =============================== */

export class FloatType extends BaseType<number> {
  readonly name: string = "float";

  protected castValue(raw: unknown): number | null {
    return toFloat(raw);
  }
}

export interface DecimalOptions {
  /** Significant digits kept. */
  precision?: number;
  /** Digits kept after the decimal point. */
  scale?: number;
}

export class DecimalType extends BaseType<number> {
  readonly name: string = "decimal";
  readonly precision: number | undefined;
  readonly scale: number | undefined;

  constructor(options: DecimalOptions = {}) {
    super();
    this.precision = options.precision;
    this.scale = options.scale;
  }

  protected castValue(raw: unknown): number | null {
    let value = toFloat(raw);
    if (value === null || !Number.isFinite(value)) return value;

    if (this.precision !== undefined) {
      value = Number(value.toPrecision(this.precision));
    }
    if (this.scale !== undefined) {
      value = Number(value.toFixed(this.scale));
    }
    return value;
  }
}
