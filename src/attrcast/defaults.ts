// defaults.ts

import { CoercionError } from "./errors.js";
import type { TypeObject } from "./types/index.js";

/** Pass as a default to declare that an attribute has none; it reads as null. */
export const NO_DEFAULT: unique symbol = Symbol("attrcast.noDefault");

export type DefaultProducer = () => unknown;

export type DefaultSpec =
  | { kind: "none" }
  | { kind: "literal"; value: unknown }
  | { kind: "producer"; produce: DefaultProducer };

export function isProducer(value: unknown): value is DefaultProducer {
  return typeof value === "function";
}

/** NO_DEFAULT -> none, a function -> producer, anything else -> literal. */
export function toDefaultSpec(input: unknown): DefaultSpec {
  if (input === NO_DEFAULT) return { kind: "none" };
  if (isProducer(input)) return { kind: "producer", produce: input };
  return { kind: "literal", value: input };
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copy of a literal default: arrays, plain objects, dates, maps and sets are
 * copied deeply. Class instances are returned as they are; give those as a
 * producer.
 */
export function cloneLiteral(value: unknown): unknown {
  if (typeof value !== "object" || value === null) return value;
  if (Array.isArray(value)) return value.map((item) => cloneLiteral(item));
  if (value instanceof Date) return new Date(value.getTime());
  if (value instanceof Map) {
    return new Map(Array.from(value, ([k, v]) => [k, cloneLiteral(v)]));
  }
  if (value instanceof Set) return new Set(Array.from(value, (v) => cloneLiteral(v)));
  if (!isPlainObject(value)) return value;

  const copy: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) copy[key] = cloneLiteral(item);
  return copy;
}

/**
 * Evaluate a default. Literals are copied and producers run on every call,
 * so records never share a mutable default; whatever a producer throws
 * propagates.
 */
export function resolveDefault(spec: DefaultSpec): unknown {
  switch (spec.kind) {
    case "none":
      return null;
    case "literal":
      return cloneLiteral(spec.value);
    case "producer":
      return spec.produce();
  }
}

/* ===============================
 * LITERAL DEFAULT VALIDATION
 * =============================== */

/**
 * Check a literal default against the attribute type. A literal that the
 * type rejects, or turns into null, is reported. Producers are only known at
 * record construction and are skipped.
 */
export function validateDefault(
  name: string,
  spec: DefaultSpec,
  type: TypeObject,
  userProvided = true
): string[] {
  if (spec.kind !== "literal") return [];
  if (spec.value === null || spec.value === undefined) return [];

  try {
    const value = userProvided
      ? type.cast(spec.value)
      : type.deserialize(spec.value);
    if (value === null) {
      return [
        `DEFAULT ERROR: ${name} has invalid default value for type:${type.name}`,
      ];
    }
    return [];
  } catch (err) {
    if (err instanceof CoercionError) {
      return [`DEFAULT ERROR: ${name}: ${err.message}`];
    }
    throw err;
  }
}
