// types/date.ts

import { BaseType } from "./value.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function sameInstant(a: Date | null, b: Date | null): boolean {
  if (a === null || b === null) return a === b;
  return a.getTime() === b.getTime();
}

function isValid(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/* ===============================
 * DATE (calendar day, UTC)
 * =============================== */

export class DateType extends BaseType<Date> {
  readonly name: string = "date";

  override serialize(value: Date | null): string | null {
    if (value === null) return null;
    return value.toISOString().slice(0, 10);
  }

  override isEqual(a: Date | null, b: Date | null): boolean {
    return sameInstant(a, b);
  }

  protected castValue(raw: unknown): Date | null {
    if (raw instanceof Date) {
      return isValid(raw) ? startOfDay(raw) : null;
    }
    if (typeof raw !== "string" || raw.trim() === "") return null;

    const text = raw.trim();
    const match = ISO_DATE.exec(text);
    if (match) {
      const year = Number(match[1]);
      const month = Number(match[2]) - 1;
      const day = Number(match[3]);
      const date = new Date(Date.UTC(year, month, day));
      // 2024-02-31 would roll over into March
      if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
        return null;
      }
      return date;
    }

    const parsed = new Date(text);
    return isValid(parsed) ? startOfDay(parsed) : null;
  }
}

function startOfDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  );
}

/* ===============================
 * DATETIME
 * =============================== */

export interface DateTimeOptions {
  /** Fractional second digits kept, 0 to 3. */
  precision?: number;
}

export class DateTimeType extends BaseType<Date> {
  readonly name: string = "datetime";
  readonly precision: number;

  constructor(options: DateTimeOptions = {}) {
    super();
    this.precision = Math.min(3, Math.max(0, options.precision ?? 3));
  }

  override serialize(value: Date | null): string | null {
    if (value === null) return null;
    return value.toISOString();
  }

  override isEqual(a: Date | null, b: Date | null): boolean {
    return sameInstant(a, b);
  }

  protected castValue(raw: unknown): Date | null {
    let date: Date;
    if (raw instanceof Date) {
      date = new Date(raw.getTime());
    } else if (typeof raw === "number") {
      date = new Date(raw);
    } else if (typeof raw === "string" && raw.trim() !== "") {
      date = new Date(raw.trim());
    } else {
      return null;
    }

    if (!isValid(date)) return null;

    const step = 10 ** (3 - this.precision);
    return new Date(Math.floor(date.getTime() / step) * step);
  }
}
