// utils/canonicalType.ts

/**
 * Normalise a SQL type name (as written in a model or reported by
 * information_schema / pg udt_name) to one spelling per family.
 */
export function canonicalType(t: string | null | undefined): string {
  if (!t) return "";

  // "character varying(255)" -> "CHARACTER VARYING"
  const raw = String(t)
    .trim()
    .toUpperCase()
    .replace(/\s*\(.*\)\s*$/, "")
    .replace(/\s+/g, " ");

  const map: Record<string, string> = {
    // INTEGER FAMILY
    INT: "INTEGER",
    INTEGER: "INTEGER",
    INT4: "INTEGER",
    SERIAL: "INTEGER",
    SMALLINT: "SMALLINT",
    INT2: "SMALLINT",
    BIGINT: "BIGINT",
    INT8: "BIGINT",
    BIGSERIAL: "BIGINT",

    // NUMERIC
    NUMERIC: "NUMERIC",
    DECIMAL: "NUMERIC",
    REAL: "REAL",
    FLOAT4: "REAL",
    "DOUBLE PRECISION": "DOUBLE PRECISION",
    FLOAT8: "DOUBLE PRECISION",
    FLOAT: "DOUBLE PRECISION",

    // BOOLEAN
    BOOLEAN: "BOOLEAN",
    BOOL: "BOOLEAN",

    // TEXT
    TEXT: "TEXT",
    VARCHAR: "VARCHAR",
    "CHARACTER VARYING": "VARCHAR",
    CHAR: "CHAR",
    CHARACTER: "CHAR",
    BPCHAR: "CHAR",

    // UUID
    UUID: "UUID",

    // JSON
    JSON: "JSON",
    JSONB: "JSONB",

    // TIME / DATE
    TIME: "TIME",
    "TIME WITHOUT TIME ZONE": "TIME",
    TIMETZ: "TIMETZ",
    "TIME WITH TIME ZONE": "TIMETZ",
    TIMESTAMP: "TIMESTAMP",
    "TIMESTAMP WITHOUT TIME ZONE": "TIMESTAMP",
    TIMESTAMPTZ: "TIMESTAMPTZ",
    "TIMESTAMP WITH TIME ZONE": "TIMESTAMPTZ",
    DATE: "DATE",
  };

  return map[raw] ?? raw;
}

/** "TEXT[]" -> { isArray: true, base: "TEXT" }; also reads udt names like "_int4". */
export function parseTypeInfo(rawType: string): { isArray: boolean; base: string } {
  const t = String(rawType).trim();
  if (t.endsWith("[]")) {
    return { isArray: true, base: t.slice(0, -2).trim() };
  }
  if (t.startsWith("_")) {
    return { isArray: true, base: t.slice(1) };
  }
  return { isArray: false, base: t };
}
