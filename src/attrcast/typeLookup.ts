// typeLookup.ts

import {
  DuplicateTypeError,
  InvalidTypeOptionsError,
  UnknownTypeError,
} from "./errors.js";
import {
  ArrayType,
  BigIntegerType,
  BooleanType,
  DateTimeType,
  DateType,
  DecimalType,
  EnumType,
  FloatType,
  IntegerType,
  JsonType,
  StringType,
  ValueType,
  type TypeObject,
} from "./types/index.js";
import { canonicalType } from "./utils/canonicalType.js";

export interface TypeOptions {
  limit?: number;
  precision?: number;
  scale?: number;
  /** Enum labels. */
  values?: readonly string[];
  trueValue?: string;
  falseValue?: string;
}

export type TypeFactory = (options: TypeOptions) => TypeObject;

function normName(name: string) {
  return name.trim().toLowerCase();
}

/* ===================================================== */
/* ================= SQL ALIASES ======================= */
/* ===================================================== */

// canonicalType() output -> registered type name (+ implied options)
const SQL_ALIASES: Record<string, { type: string; options?: TypeOptions }> = {
  INTEGER: { type: "integer" },
  SMALLINT: { type: "integer", options: { limit: 2 } },
  BIGINT: { type: "big_integer" },
  NUMERIC: { type: "decimal" },
  REAL: { type: "float" },
  "DOUBLE PRECISION": { type: "float" },
  BOOLEAN: { type: "boolean" },
  TEXT: { type: "string" },
  VARCHAR: { type: "string" },
  CHAR: { type: "string" },
  UUID: { type: "string" },
  TIME: { type: "string" },
  TIMETZ: { type: "string" },
  JSON: { type: "json" },
  JSONB: { type: "json" },
  DATE: { type: "date" },
  TIMESTAMP: { type: "datetime" },
  TIMESTAMPTZ: { type: "datetime" },
};

/* ===================================================== */
/* ================= TYPE LOOKUP ======================= */
/* ===================================================== */

export class TypeLookup {
  private factories = new Map<string, TypeFactory>();

  constructor(withBuiltins = true) {
    if (withBuiltins) registerBuiltins(this);
  }

  register(name: string, factory: TypeFactory, options: { override?: boolean } = {}) {
    const key = normName(name);
    if (this.factories.has(key) && !options.override) {
      throw new DuplicateTypeError(key);
    }
    this.factories.set(key, factory);
  }

  has(name: string): boolean {
    try {
      this.lookup(name);
      return true;
    } catch (err) {
      if (err instanceof UnknownTypeError || err instanceof InvalidTypeOptionsError) {
        return false;
      }
      throw err;
    }
  }

  /**
   * Resolve a type by registered name or SQL spelling. A trailing `[]`
   * wraps the element type in an ArrayType.
   */
  lookup(name: string, options: TypeOptions = {}): TypeObject {
    const trimmed = name.trim();
    if (trimmed.endsWith("[]")) {
      return new ArrayType(this.lookup(trimmed.slice(0, -2), options));
    }

    const direct = this.factories.get(normName(trimmed));
    if (direct) return direct(options);

    const alias = SQL_ALIASES[canonicalType(trimmed)];
    const aliased = alias && this.factories.get(alias.type);
    if (alias && aliased) return aliased({ ...alias.options, ...options });

    throw new UnknownTypeError(trimmed);
  }

  names(): string[] {
    return Array.from(this.factories.keys());
  }
}

function registerBuiltins(lookup: TypeLookup) {
  lookup.register("value", () => new ValueType());
  lookup.register("integer", (o) => new IntegerType(o));
  lookup.register("big_integer", (o) => new BigIntegerType(o));
  lookup.register("float", () => new FloatType());
  lookup.register("decimal", (o) => new DecimalType(o));
  lookup.register("boolean", () => new BooleanType());
  lookup.register("string", (o) => new StringType(o));
  lookup.register("immutable_string", (o) => new StringType(o));
  lookup.register("date", () => new DateType());
  lookup.register("datetime", (o) => new DateTimeType(o));
  lookup.register("json", () => new JsonType());
  lookup.register("enum", (o) => {
    if (!o.values || o.values.length === 0) {
      throw new InvalidTypeOptionsError("enum", "values must list at least one label");
    }
    return new EnumType(o.values);
  });
}

/* ===================================================== */
/* ================= SHARED INSTANCE =================== */
/* ===================================================== */

export const defaultTypes = new TypeLookup();

export function registerType(
  name: string,
  factory: TypeFactory,
  options?: { override?: boolean }
) {
  defaultTypes.register(name, factory, options);
}

export function lookupType(name: string, options?: TypeOptions): TypeObject {
  return defaultTypes.lookup(name, options);
}

export function hasType(name: string): boolean {
  return defaultTypes.has(name);
}
