// types/json.ts

import { BaseType } from "./value.js";

// text a JSON object, array or string would start with
const ENCODED = /^\s*[{["]/;

/**
 * Values are kept as given on cast.
 *
 * pg decodes json/jsonb columns itself, so `deserialize` mostly sees
 * objects, numbers, booleans and plain strings, which pass through as they
 * are. Only strings that read as an encoded object, array or string are
 * parsed; those come from text storage or from `serialize`. A string that
 * fails to parse is kept as it is. Numbers and booleans are stored as they
 * are, since pg sends them as valid JSON text.
 */
export class JsonType extends BaseType<unknown> {
  readonly name: string = "json";

  override deserialize(stored: unknown): unknown {
    if (stored === null || stored === undefined) return null;
    if (typeof stored !== "string" || !ENCODED.test(stored)) return stored;
    try {
      return JSON.parse(stored);
    } catch (err) {
      if (err instanceof SyntaxError) return stored;
      throw err;
    }
  }

  override serialize(value: unknown): unknown {
    if (value === null || value === undefined) return null;
    if (typeof value === "number") return Number.isFinite(value) ? value : null;
    if (typeof value === "boolean") return value;
    return JSON.stringify(value);
  }

  override isEqual(a: unknown, b: unknown): boolean {
    return JSON.stringify(a ?? null) === JSON.stringify(b ?? null);
  }

  protected castValue(raw: unknown): unknown {
    return raw;
  }
}
