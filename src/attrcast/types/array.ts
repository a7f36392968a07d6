// types/array.ts

import { CoercionError } from "../errors.js";
import { BaseType, type TypeObject } from "./value.js";

/**
 * Parse a one-dimensional PostgreSQL array literal such as
 * `{a,"b c",NULL}`. Unquoted NULL is null; quoted "NULL" is the string.
 */
export function parsePgArray(literal: string): (string | null)[] {
  const text = literal.trim();
  if (!text.startsWith("{") || !text.endsWith("}")) {
    throw new CoercionError("array", literal, `'${literal}' is not an array literal`);
  }

  const body = text.slice(1, -1);
  const out: (string | null)[] = [];
  if (body.trim() === "") return out;

  let i = 0;
  for (;;) {
    if (body.charAt(i) === "{") {
      throw new CoercionError(
        "array",
        literal,
        "nested array literals are not supported"
      );
    }

    if (body.charAt(i) === '"') {
      let value = "";
      i++;
      while (i < body.length && body.charAt(i) !== '"') {
        if (body.charAt(i) === "\\") i++;
        value += body.charAt(i);
        i++;
      }
      if (i >= body.length) {
        throw new CoercionError("array", literal, "unterminated quoted element");
      }
      i++;
      out.push(value);
    } else {
      let end = body.indexOf(",", i);
      if (end === -1) end = body.length;
      const token = body.slice(i, end).trim();
      out.push(token.toUpperCase() === "NULL" ? null : token);
      i = end;
    }

    if (i >= body.length) break;
    if (body.charAt(i) !== ",") {
      throw new CoercionError("array", literal, `unexpected '${body.charAt(i)}'`);
    }
    i++;
  }

  return out;
}

export class ArrayType<T> extends BaseType<(T | null)[]> {
  readonly name: string;
  readonly subtype: TypeObject<T>;

  constructor(subtype: TypeObject<T>) {
    super();
    this.subtype = subtype;
    this.name = `${subtype.name}[]`;
  }

  override deserialize(stored: unknown): (T | null)[] | null {
    if (stored === null || stored === undefined) return null;
    const items = typeof stored === "string" ? parsePgArray(stored) : stored;
    if (!Array.isArray(items)) return [this.subtype.deserialize(items)];
    return items.map((item: unknown) => this.subtype.deserialize(item));
  }

  override serialize(value: (T | null)[] | null): unknown[] | null {
    if (value === null) return null;
    return value.map((item) => this.subtype.serialize(item));
  }

  override isEqual(a: (T | null)[] | null, b: (T | null)[] | null): boolean {
    if (a === null || b === null) return a === b;
    if (a.length !== b.length) return false;
    return a.every((item, i) => {
      const other = b[i] ?? null;
      return this.subtype.isEqual
        ? this.subtype.isEqual(item, other)
        : Object.is(item, other);
    });
  }

  protected castValue(raw: unknown): (T | null)[] {
    if (!Array.isArray(raw)) return [this.subtype.cast(raw)];
    return raw.map((item: unknown) => this.subtype.cast(item));
  }
}
