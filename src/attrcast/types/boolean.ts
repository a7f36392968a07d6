// types/boolean.ts

import { BaseType } from "./value.js";

const FALSE_VALUES = new Set<unknown>([
  false,
  0,
  "0",
  "f",
  "F",
  "false",
  "FALSE",
  "off",
  "OFF",
]);

export class BooleanType extends BaseType<boolean> {
  readonly name: string = "boolean";

  override serialize(value: boolean | null): boolean | null {
    return this.cast(value);
  }

  protected castValue(raw: unknown): boolean | null {
    if (raw === "") return null;
    return !FALSE_VALUES.has(raw);
  }
}
