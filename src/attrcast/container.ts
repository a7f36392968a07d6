// container.ts

import { resolveDefault } from "./defaults.js";
import type { AttributeDescriptor, TypeRegistry } from "./registry.js";

export type Changes = Record<string, [unknown, unknown]>;

function sameStored(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((x, i) => sameStored(x, b[i]));
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return Object.is(a, b);
}

/**
 * Current attribute values of one record.
 *
 * Values from the application go through `cast`, values from storage through
 * `deserialize`, and values leaving for storage through `serialize`. Each
 * hook runs once per value; loaded values are never re-cast.
 */
export class AttributeContainer {
  private values = new Map<string, unknown>();
  private beforeTypeCast = new Map<string, unknown>();
  // storage form as of the last load / markPersisted
  private persisted = new Map<string, unknown>();
  private assigned = new Set<string>();

  constructor(readonly registry: TypeRegistry) {}

  set(name: string, rawValue: unknown) {
    const { typeObject } = this.registry.lookup(name);
    this.values.set(name, typeObject.cast(rawValue));
    this.beforeTypeCast.set(name, rawValue);
    this.assigned.add(name);
  }

  loadFromStorage(name: string, storedValue: unknown) {
    const { typeObject } = this.registry.lookup(name);
    const value = typeObject.deserialize(storedValue);
    this.values.set(name, value);
    this.beforeTypeCast.set(name, storedValue);
    this.persisted.set(name, storedValue);
    this.assigned.delete(name);
  }

  /** Current value; an attribute never set reads (and keeps) its default. */
  get(name: string): unknown {
    const descriptor = this.registry.lookup(name);
    if (this.values.has(name)) return this.values.get(name);

    const value = this.evaluateDefault(descriptor);
    this.values.set(name, value);
    return value;
  }

  exportForStorage(name: string): unknown {
    const { typeObject } = this.registry.lookup(name);
    return typeObject.serialize(this.get(name));
  }

  getBeforeTypeCast(name: string): unknown {
    this.registry.lookup(name);
    if (!this.beforeTypeCast.has(name)) this.get(name);
    return this.beforeTypeCast.get(name);
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  /* ===============================
   * DIRTY TRACKING
   * =============================== */

  /**
   * Loaded or persisted attributes compare the decoded snapshot with the
   * current value through the type's `isEqual`, or in serialized form when
   * the type has none. Attributes of a record that was never loaded are
   * changed once they are assigned.
   */
  isChanged(name: string): boolean {
    const { typeObject } = this.registry.lookup(name);
    if (!this.persisted.has(name)) return this.assigned.has(name);

    // drivers may hand back "5" for a stored 5, so decode the snapshot first
    const before = typeObject.deserialize(this.persisted.get(name));
    const current = this.get(name);
    if (typeObject.isEqual) return !typeObject.isEqual(before, current);
    return !sameStored(typeObject.serialize(before), typeObject.serialize(current));
  }

  changedNames(): string[] {
    return this.registry.names().filter((name) => this.isChanged(name));
  }

  /** `{ name: [before, after] }` for every changed attribute. */
  changes(): Changes {
    const out: Changes = {};
    for (const name of this.changedNames()) {
      const { typeObject } = this.registry.lookup(name);
      const before = this.persisted.has(name)
        ? typeObject.deserialize(this.persisted.get(name))
        : null;
      out[name] = [before, this.get(name)];
    }
    return out;
  }

  /** Snapshot every stored attribute; call after writing the record. */
  markPersisted() {
    for (const descriptor of this.registry.descriptors()) {
      if (descriptor.virtual) continue;
      this.persisted.set(descriptor.name, this.exportForStorage(descriptor.name));
    }
    this.assigned.clear();
  }

  /* ===============================
   * EXPORT
   * =============================== */

  /** Serialized values of every non-virtual attribute. */
  forStorage(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const descriptor of this.registry.descriptors()) {
      if (descriptor.virtual) continue;
      out[descriptor.name] = this.exportForStorage(descriptor.name);
    }
    return out;
  }

  toObject(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const name of this.registry.names()) {
      out[name] = this.get(name);
    }
    return out;
  }

  private evaluateDefault(descriptor: AttributeDescriptor): unknown {
    const raw = resolveDefault(descriptor.defaultSpec);
    this.beforeTypeCast.set(descriptor.name, raw);
    return descriptor.userProvidedDefault
      ? descriptor.typeObject.cast(raw)
      : descriptor.typeObject.deserialize(raw);
  }
}
