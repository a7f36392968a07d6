// model.ts

import { AttributeContainer } from "./container.js";
import { NO_DEFAULT, toDefaultSpec, validateDefault } from "./defaults.js";
import {
  ConfigError,
  InvalidDefaultError,
  InvalidTypeOptionsError,
  SchemaNotLoadedError,
  UnknownTypeError,
} from "./errors.js";
import type { AttributeOptions, ModelConfig } from "./model-types.js";
import { TypeRegistry, type RegisterOptions } from "./registry.js";
import type { ColumnInfo, SchemaSource } from "./schema/types.js";
import type { TypeLookup, TypeOptions } from "./typeLookup.js";
import { ArrayType, EnumType, ValueType, type TypeObject } from "./types/index.js";
import type { Logger } from "./utils/logger.js";

type Declaration =
  | {
      kind: "attribute";
      name: string;
      type: string | TypeObject | undefined;
      options: AttributeOptions;
    }
  | {
      kind: "define";
      name: string;
      typeObject: TypeObject;
      defaultValue: unknown;
      userProvidedDefault: boolean;
      options: RegisterOptions;
    };

export interface ModelDeps {
  source: SchemaSource | undefined;
  types: TypeLookup;
  logger: Logger;
}

function typeOptionsOf(options: AttributeOptions): TypeOptions {
  const { default: _default, userProvidedDefault: _upd, array: _array, ...rest } =
    options;
  return rest;
}

export class Model {
  readonly table: string;
  readonly registry: TypeRegistry;
  readonly virtualOnly: boolean;

  private declarations: Declaration[] = [];
  // null until the schema has been read
  private columns: Map<string, ColumnInfo> | null = null;
  private loaded: boolean;

  constructor(config: ModelConfig, private readonly deps: ModelDeps) {
    this.table = config.table;
    this.virtualOnly = config.virtualOnly ?? false;
    this.registry = new TypeRegistry(config.table);
    // nothing to wait for without a table
    this.loaded = this.virtualOnly;
    if (this.virtualOnly) this.columns = new Map();

    for (const [name, def] of Object.entries(config.attributes ?? {})) {
      const { type, ...options } = def;
      this.attribute(name, type, options);
    }
  }

  /* ================================
   * Declarations
   * ================================ */

  /**
   * Declare an attribute. Applied once the schema is loaded, so a
   * declaration can override a column's type or default; applied at once on
   * a loaded model.
   */
  attribute(name: string, type?: string | TypeObject, options: AttributeOptions = {}) {
    if (type !== undefined) {
      this.checkDefault(name, this.resolveType(type, options), options);
    } else {
      const typeOptions = Object.keys(typeOptionsOf(options));
      if (typeOptions.length) {
        throw new InvalidTypeOptionsError(
          "(inherited)",
          `${this.table}.${name} sets ${typeOptions.join(", ")} without declaring a type`
        );
      }
    }

    const declaration: Declaration = { kind: "attribute", name, type, options };
    // a declaration that fails to apply is not kept for later loads
    if (this.loaded) this.apply(declaration);
    this.declarations.push(declaration);
    return this;
  }

  /** Low-level: registers immediately, before or after the schema loads. */
  defineAttribute(
    name: string,
    typeObject: TypeObject,
    defaultValue: unknown = NO_DEFAULT,
    userProvidedDefault = true,
    options: RegisterOptions = {}
  ) {
    const declaration: Declaration = {
      kind: "define",
      name,
      typeObject,
      defaultValue,
      userProvidedDefault,
      options,
    };
    this.declarations.push(declaration);
    this.apply(declaration);
    return this;
  }

  /* ================================
   * Schema
   * ================================ */

  isLoaded() {
    return this.loaded;
  }

  /** Register columns, then replay declarations in the order they were made. */
  async load() {
    if (this.loaded) return;
    await this.readSchema();
  }

  /** Read the schema again; the current registry stays in place if this fails. */
  async reload() {
    if (this.virtualOnly) return;
    await this.readSchema();
  }

  /* ================================
   * Records
   * ================================ */

  /** New record from application input; every value goes through cast. */
  build(values: Record<string, unknown> = {}): AttributeContainer {
    this.ensureLoaded();
    const record = new AttributeContainer(this.registry);
    for (const [name, value] of Object.entries(values)) record.set(name, value);
    return record;
  }

  /** Record from a stored row; every value goes through deserialize. */
  instantiate(row: Record<string, unknown>): AttributeContainer {
    this.ensureLoaded();
    const record = new AttributeContainer(this.registry);
    for (const [name, value] of Object.entries(row)) {
      if (!this.registry.has(name)) {
        this.deps.logger.warn("Ignored", `${this.table}.${name} (no such attribute)`);
        continue;
      }
      record.loadFromStorage(name, value);
    }
    return record;
  }

  /* ================================
   * Introspection
   * ================================ */

  attributeNames(): string[] {
    return this.registry.names();
  }

  columnNames(): string[] {
    return this.registry.descriptors().filter((d) => !d.virtual).map((d) => d.name);
  }

  virtualNames(): string[] {
    return this.registry.descriptors().filter((d) => d.virtual).map((d) => d.name);
  }

  typeFor(name: string): TypeObject {
    return this.registry.lookup(name).typeObject;
  }

  /* ================================
   * Internals
   * ================================ */

  private async readSchema() {
    const { source, logger } = this.deps;
    if (!source) {
      throw new ConfigError(`no schema source configured for '${this.table}'`);
    }

    const staged = new TypeRegistry(this.table);
    let columns: Map<string, ColumnInfo>;
    try {
      const infos = await source.columns(this.table);
      columns = new Map(infos.map((c) => [c.name, c]));
      for (const column of infos) {
        staged.register(column.name, this.columnType(column), column.default, false);
      }
      for (const declaration of this.declarations) this.apply(declaration, staged, columns);
    } catch (err) {
      logger.error("Failed", `${this.table}: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }

    this.registry.replaceWith(staged);
    this.columns = columns;
    this.loaded = true;

    logger.section("ATTRCAST SCHEMA");
    logger.success(
      "Loaded",
      `${this.table} (${columns.size} columns, ${this.virtualNames().length} virtual)`
    );
  }

  private ensureLoaded() {
    if (!this.loaded) throw new SchemaNotLoadedError(this.table);
  }

  private apply(
    declaration: Declaration,
    registry = this.registry,
    columns = this.columns
  ) {
    if (declaration.kind === "define") {
      const { name, options } = declaration;
      registry.register(
        name,
        declaration.typeObject,
        declaration.defaultValue,
        declaration.userProvidedDefault,
        { virtual: options.virtual ?? (columns !== null && !columns.has(name)) }
      );
      return;
    }

    const { name, type, options } = declaration;
    const column = columns?.get(name);
    const previous = registry.has(name) ? registry.lookup(name) : undefined;

    let typeObject: TypeObject;
    if (type === undefined) {
      typeObject = previous?.typeObject ?? new ValueType();
      if (options.array) typeObject = new ArrayType(typeObject);
    } else {
      typeObject = this.resolveType(type, options);
    }

    const hasOwnDefault = "default" in options;
    const defaultValue = hasOwnDefault ? options.default : column?.default ?? NO_DEFAULT;
    const userProvided = hasOwnDefault ? options.userProvidedDefault ?? true : false;

    // column defaults come from the database and are not re-validated
    if (hasOwnDefault) this.checkDefault(name, typeObject, options);

    if (column && previous && previous.typeObject.name !== typeObject.name) {
      this.deps.logger.processing(
        "Overridden",
        `${this.table}.${name}: ${previous.typeObject.name} -> ${typeObject.name}`
      );
    }

    registry.register(name, typeObject, defaultValue, userProvided, {
      virtual: !column,
    });
  }

  private resolveType(type: string | TypeObject, options: AttributeOptions): TypeObject {
    const base =
      typeof type === "string" ? this.deps.types.lookup(type, typeOptionsOf(options)) : type;
    return options.array ? new ArrayType(base) : base;
  }

  private columnType(column: ColumnInfo): TypeObject {
    let type: TypeObject;
    if (column.enumValues) {
      type = new EnumType(column.enumValues, column.type);
    } else {
      const options: TypeOptions = {};
      if (column.precision !== undefined) options.precision = column.precision;
      if (column.scale !== undefined) options.scale = column.scale;
      try {
        type = this.deps.types.lookup(column.type, options);
      } catch (err) {
        if (!(err instanceof UnknownTypeError)) throw err;
        this.deps.logger.warn(
          "Unknown type",
          `${this.table}.${column.name} (${column.type}) treated as value`
        );
        type = new ValueType();
      }
    }
    return column.isArray ? new ArrayType(type) : type;
  }

  private checkDefault(name: string, type: TypeObject, options: AttributeOptions) {
    if (!("default" in options)) return;
    const errors = validateDefault(
      `${this.table}.${name}`,
      toDefaultSpec(options.default),
      type,
      options.userProvidedDefault ?? true
    );
    if (errors.length) throw new InvalidDefaultError(errors);
  }
}
