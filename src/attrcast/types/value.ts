// types/value.ts

/**
 * Anything the attribute layer can hand a value to.
 *
 * `cast` takes application input, `deserialize` takes what storage handed
 * back, and `serialize` produces what storage should receive. For every `v`
 * that `cast` or `deserialize` returns, `deserialize(serialize(v))` must
 * equal `v`.
 */
export interface TypeObject<T = unknown> {
  readonly name: string;
  cast(raw: unknown): T | null;
  deserialize(stored: unknown): T | null;
  serialize(value: T | null): unknown;
  /** Value equality for dirty tracking; identity when omitted. */
  isEqual?(a: T | null, b: T | null): boolean;
}

export abstract class BaseType<T> implements TypeObject<T> {
  abstract readonly name: string;

  cast(raw: unknown): T | null {
    if (raw === null || raw === undefined) return null;
    return this.castValue(raw);
  }

  deserialize(stored: unknown): T | null {
    return this.cast(stored);
  }

  serialize(value: T | null): unknown {
    return value;
  }

  isEqual(a: T | null, b: T | null): boolean {
    return Object.is(a, b);
  }

  /** Coercion shared by cast and deserialize. Never sees null. */
  protected abstract castValue(raw: unknown): T | null;
}

/** Identity type, used for untyped attributes and unrecognised columns. */
export class ValueType extends BaseType<unknown> {
  readonly name: string = "value";

  protected castValue(raw: unknown): unknown {
    return raw;
  }
}
