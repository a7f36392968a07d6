// types/string.ts

import { BaseType } from "./value.js";

export interface StringOptions {
  trueValue?: string;
  falseValue?: string;
}

export class StringType extends BaseType<string> {
  readonly name: string = "string";
  readonly trueValue: string;
  readonly falseValue: string;

  constructor(options: StringOptions = {}) {
    super();
    this.trueValue = options.trueValue ?? "t";
    this.falseValue = options.falseValue ?? "f";
  }

  protected castValue(raw: unknown): string {
    if (typeof raw === "string") return raw;
    if (raw === true) return this.trueValue;
    if (raw === false) return this.falseValue;
    if (raw instanceof Date) return raw.toISOString();
    return String(raw);
  }
}
