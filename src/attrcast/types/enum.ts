// types/enum.ts

import { CoercionError } from "../errors.js";
import { BaseType } from "./value.js";

/** Strict: anything outside the declared labels throws CoercionError. */
export class EnumType extends BaseType<string> {
  readonly name: string;
  readonly values: readonly string[];
  private readonly byLower: Map<string, string>;

  constructor(values: readonly string[], name = "enum") {
    super();
    this.name = name;
    this.values = [...values];
    this.byLower = new Map(values.map((v) => [v.toLowerCase(), v]));
  }

  protected castValue(raw: unknown): string {
    if (typeof raw === "string" || typeof raw === "number") {
      const label = this.byLower.get(String(raw).toLowerCase());
      if (label !== undefined) return label;
    }
    throw new CoercionError(
      this.name,
      raw,
      `'${String(raw)}' is not a valid ${this.name} (expected one of ${this.values.join(", ")})`
    );
  }
}
