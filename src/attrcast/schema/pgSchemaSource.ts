// schema/pgSchemaSource.ts

import { Pool } from "pg";

import { UnknownTableError } from "../errors.js";
import { getSSLConfig, type SslOption } from "../sslConfig.js";
import { canonicalType, parseTypeInfo } from "../utils/canonicalType.js";
import { parseDefaultSQL } from "./parseDefaultSQL.js";
import type { ColumnInfo, SchemaSource } from "./types.js";

/** Anything with pg's `query(text, values)`: a Pool, a PoolClient, a Client. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

/* ===================================================== */
/* TYPES                                                 */
/* ===================================================== */

type ColumnRow = {
  column_name: string;
  data_type: string;
  udt_name: string;
  is_nullable: string;
  column_default: string | null;
  numeric_precision: number | string | null;
  numeric_scale: number | string | null;
};

type EnumRow = {
  typname: string;
  enumlabel: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isNumberish(value: unknown): value is number | string | null {
  return value === null || typeof value === "number" || typeof value === "string";
}

function isColumnRow(row: unknown): row is ColumnRow {
  return (
    isRecord(row) &&
    typeof row.column_name === "string" &&
    typeof row.data_type === "string" &&
    typeof row.udt_name === "string" &&
    typeof row.is_nullable === "string" &&
    (row.column_default === null || typeof row.column_default === "string") &&
    isNumberish(row.numeric_precision) &&
    isNumberish(row.numeric_scale)
  );
}

function isEnumRow(row: unknown): row is EnumRow {
  return (
    isRecord(row) &&
    typeof row.typname === "string" &&
    typeof row.enumlabel === "string"
  );
}

function toNumber(value: number | string | null): number | undefined {
  if (value === null) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/* ===================================================== */
/* SOURCE                                                */
/* ===================================================== */

export interface PgSchemaSourceOptions {
  /** Database schema to read tables from. */
  schema?: string;
}

/** Reads column metadata from information_schema; never touches rows. */
export class PgSchemaSource implements SchemaSource {
  private readonly schema: string;
  private ownedPool: Pool | null = null;

  constructor(
    private readonly db: Queryable,
    options: PgSchemaSourceOptions = {}
  ) {
    this.schema = options.schema ?? "public";
  }

  /** Open a pool of its own; `close()` ends it. */
  static connect(
    connectionString: string,
    options: PgSchemaSourceOptions & { ssl?: SslOption } = {}
  ): PgSchemaSource {
    const pool = new Pool({
      connectionString,
      ssl: options.ssl ?? getSSLConfig({ dbUrl: connectionString }),
    });
    const source = new PgSchemaSource(
      pool,
      options.schema ? { schema: options.schema } : {}
    );
    source.ownedPool = pool;
    return source;
  }

  async columns(table: string): Promise<ColumnInfo[]> {
    const res = await this.db.query(
      `
      SELECT column_name, data_type, udt_name, is_nullable, column_default,
             numeric_precision, numeric_scale
      FROM information_schema.columns
      WHERE table_schema = $1
        AND LOWER(table_name) = LOWER($2)
      ORDER BY ordinal_position
      `,
      [this.schema, table]
    );

    const rows = res.rows.filter(isColumnRow);
    if (rows.length === 0) throw new UnknownTableError(table, this.schema);

    const udtBases = rows.map((r) => parseTypeInfo(r.udt_name).base);
    const enums = await this.enumLabels(Array.from(new Set(udtBases)));

    return rows.map((r) => {
      const isArray = r.data_type === "ARRAY";
      const base = isArray ? parseTypeInfo(r.udt_name).base : r.udt_name;
      const enumValues = enums.get(base);

      const info: ColumnInfo = {
        name: r.column_name,
        type: enumValues ? base : canonicalType(base),
        isArray,
        nullable: r.is_nullable === "YES",
        default: parseDefaultSQL(r.column_default),
      };
      if (enumValues) info.enumValues = enumValues;

      const precision = toNumber(r.numeric_precision);
      const scale = toNumber(r.numeric_scale);
      if (canonicalType(base) === "NUMERIC") {
        if (precision !== undefined) info.precision = precision;
        if (scale !== undefined) info.scale = scale;
      }
      return info;
    });
  }

  async close() {
    if (!this.ownedPool) return;
    await this.ownedPool.end();
    this.ownedPool = null;
  }

  private async enumLabels(typeNames: string[]): Promise<Map<string, string[]>> {
    const out = new Map<string, string[]>();
    if (typeNames.length === 0) return out;

    const res = await this.db.query(
      `
      SELECT t.typname, e.enumlabel
      FROM pg_type t
      JOIN pg_enum e ON e.enumtypid = t.oid
      WHERE t.typname = ANY($1::text[])
      ORDER BY t.typname, e.enumsortorder
      `,
      [typeNames]
    );

    for (const r of res.rows.filter(isEnumRow)) {
      const labels = out.get(r.typname) ?? [];
      labels.push(r.enumlabel);
      out.set(r.typname, labels);
    }
    return out;
  }
}
