// model-types.ts

import type { TypeOptions } from "./typeLookup.js";
import type { TypeObject } from "./types/index.js";

/** Options of a high-level attribute declaration. */
export interface AttributeOptions extends TypeOptions {
  /** Literal, producer function, or NO_DEFAULT. Omit to keep the column default. */
  default?: unknown;
  /** Defaults are cast unless this is false (then they are deserialized). */
  userProvidedDefault?: boolean;
  /** Wrap the type in an array type. */
  array?: boolean;
}

export interface AttributeDefinition extends AttributeOptions {
  /** Registered type name, SQL spelling, or a type object. Omit to keep the column type. */
  type?: string | TypeObject;
}

export interface ModelConfig {
  table: string;
  attributes?: Record<string, AttributeDefinition>;
  /** No storage table: every attribute is virtual and no schema is loaded. */
  virtualOnly?: boolean;
}
