// schema/staticSchemaSource.ts

import { NO_DEFAULT } from "../defaults.js";
import { UnknownTableError } from "../errors.js";
import { canonicalType, parseTypeInfo } from "../utils/canonicalType.js";
import type { ColumnInfo, SchemaSource } from "./types.js";

export interface StaticColumn {
  name: string;
  /** SQL spelling, e.g. "INT", "varchar(40)", "TEXT[]". */
  type: string;
  nullable?: boolean;
  /** Storage-form literal. */
  default?: unknown;
  enumValues?: string[];
  precision?: number;
  scale?: number;
}

/** Columns declared in code, for tests and for tables without a live database. */
export class StaticSchemaSource implements SchemaSource {
  private tables = new Map<string, ColumnInfo[]>();

  constructor(tables: Record<string, StaticColumn[]> = {}) {
    for (const [table, columns] of Object.entries(tables)) {
      this.define(table, columns);
    }
  }

  define(table: string, columns: StaticColumn[]) {
    this.tables.set(
      table.toLowerCase(),
      columns.map((c) => {
        const { isArray, base } = parseTypeInfo(c.type);
        const info: ColumnInfo = {
          name: c.name,
          type: c.enumValues ? base : canonicalType(base),
          isArray,
          nullable: c.nullable ?? true,
          default: c.default === undefined ? NO_DEFAULT : c.default,
        };
        if (c.enumValues) info.enumValues = [...c.enumValues];
        if (c.precision !== undefined) info.precision = c.precision;
        if (c.scale !== undefined) info.scale = c.scale;
        return info;
      })
    );
  }

  async columns(table: string): Promise<ColumnInfo[]> {
    const columns = this.tables.get(table.toLowerCase());
    if (!columns) throw new UnknownTableError(table);
    return columns.map((c) => ({ ...c }));
  }
}
