// errors.ts

export type ErrorCode =
  | "UNKNOWN_ATTRIBUTE"
  | "COERCION"
  | "OUT_OF_RANGE"
  | "UNKNOWN_TYPE"
  | "DUPLICATE_TYPE"
  | "SCHEMA_NOT_LOADED"
  | "UNKNOWN_TABLE"
  | "INVALID_DEFAULT"
  | "CONFIG"
  | "INVALID_TYPE_OPTIONS";

export class AttrcastError extends Error {
  code: ErrorCode;
  details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class UnknownAttributeError extends AttrcastError {
  attribute: string;

  constructor(attribute: string, owner?: string) {
    super(
      "UNKNOWN_ATTRIBUTE",
      owner
        ? `unknown attribute '${attribute}' for ${owner}`
        : `unknown attribute '${attribute}'`
    );
    this.attribute = attribute;
  }
}

export class CoercionError extends AttrcastError {
  type: string;
  value: unknown;

  constructor(type: string, value: unknown, message?: string) {
    super(
      "COERCION",
      message ?? `${describe(value)} is not a valid ${type} value`,
      { type }
    );
    this.type = type;
    this.value = value;
  }
}

/** Thrown while serializing a number that does not fit the column limit. */
export class ValueOutOfRangeError extends CoercionError {
  constructor(type: string, value: number | bigint, limit: number) {
    super(
      type,
      value,
      `${value} is out of range for ${type} with limit ${limit} bytes`
    );
    this.code = "OUT_OF_RANGE";
  }
}

export class UnknownTypeError extends AttrcastError {
  constructor(type: string) {
    super("UNKNOWN_TYPE", `unknown type '${type}'`);
  }
}

export class DuplicateTypeError extends AttrcastError {
  constructor(type: string) {
    super(
      "DUPLICATE_TYPE",
      `type '${type}' is already registered (pass { override: true } to replace it)`
    );
  }
}

export class SchemaNotLoadedError extends AttrcastError {
  constructor(table: string) {
    super(
      "SCHEMA_NOT_LOADED",
      `schema for '${table}' is not loaded yet; await load() first`
    );
  }
}

export class UnknownTableError extends AttrcastError {
  constructor(table: string, schema?: string) {
    super(
      "UNKNOWN_TABLE",
      schema
        ? `table '${schema}.${table}' has no columns or does not exist`
        : `table '${table}' is not declared`
    );
  }
}

export class InvalidDefaultError extends AttrcastError {
  messages: string[];

  constructor(messages: string[]) {
    super("INVALID_DEFAULT", messages.join("\n"), { messages });
    this.messages = messages;
  }
}

export class ConfigError extends AttrcastError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

function describe(value: unknown): string {
  if (typeof value === "string") return `'${value}'`;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export class InvalidTypeOptionsError extends AttrcastError {
  constructor(type: string, message: string) {
    super("INVALID_TYPE_OPTIONS", `invalid options for type '${type}': ${message}`);
  }
}
