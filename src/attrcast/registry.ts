// registry.ts

import { UnknownAttributeError } from "./errors.js";
import { NO_DEFAULT, toDefaultSpec, type DefaultSpec } from "./defaults.js";
import type { TypeObject } from "./types/index.js";

export interface AttributeDescriptor {
  readonly name: string;
  readonly typeObject: TypeObject;
  readonly defaultSpec: DefaultSpec;
  /** Defaults given by the application are cast; storage defaults are deserialized. */
  readonly userProvidedDefault: boolean;
  /** No storage column behind the attribute. */
  readonly virtual: boolean;
}

export interface RegisterOptions {
  virtual?: boolean;
}

/**
 * Attribute name -> descriptor. Shared by every container built for the
 * same model; register during startup, read afterwards.
 */
export class TypeRegistry {
  private entries = new Map<string, AttributeDescriptor>();

  constructor(private readonly owner?: string) {}

  /**
   * Immediate. A second registration for the same name replaces the first.
   * `defaultValue` is a literal, a producer function or NO_DEFAULT.
   */
  register(
    name: string,
    typeObject: TypeObject,
    defaultValue: unknown = NO_DEFAULT,
    userProvidedDefault = true,
    options: RegisterOptions = {}
  ): AttributeDescriptor {
    const descriptor: AttributeDescriptor = Object.freeze({
      name,
      typeObject,
      defaultSpec: toDefaultSpec(defaultValue),
      userProvidedDefault,
      virtual: options.virtual ?? false,
    });
    this.entries.set(name, descriptor);
    return descriptor;
  }

  lookup(name: string): AttributeDescriptor {
    const descriptor = this.entries.get(name);
    if (!descriptor) throw new UnknownAttributeError(name, this.owner);
    return descriptor;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  descriptors(): AttributeDescriptor[] {
    return Array.from(this.entries.values());
  }

  clear() {
    this.entries.clear();
  }

  /** Take over every entry of `other`, dropping the current ones. */
  replaceWith(other: TypeRegistry) {
    this.entries = new Map(other.descriptors().map((d) => [d.name, d]));
  }
}
