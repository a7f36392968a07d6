// schema/types.ts

/** One storage column as reported by a schema source. */
export interface ColumnInfo {
  name: string;
  /** canonicalType() spelling of the element type, or the enum type name. */
  type: string;
  isArray: boolean;
  nullable: boolean;
  /** Literal in storage form, or NO_DEFAULT when the database generates it. */
  default: unknown;
  enumValues?: string[];
  precision?: number;
  scale?: number;
}

export interface SchemaSource {
  columns(table: string): Promise<ColumnInfo[]>;
}
