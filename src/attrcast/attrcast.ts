// attrcast.ts

import { loadConfig, type AttrcastConfig } from "./config.js";
import { Model } from "./model.js";
import type { ModelConfig } from "./model-types.js";
import { PgSchemaSource } from "./schema/pgSchemaSource.js";
import type { SchemaSource } from "./schema/types.js";
import { defaultTypes, type TypeLookup } from "./typeLookup.js";
import { Logger } from "./utils/logger.js";

export interface AttrcastOptions {
  /** Where column metadata comes from; not needed for virtualOnly models. */
  source?: SchemaSource;
  /** Type names available to declarations; the shared lookup by default. */
  types?: TypeLookup;
  silentLogs?: boolean;
}

export class Attrcast {
  readonly logger: Logger;
  readonly types: TypeLookup;
  private source: SchemaSource | undefined;
  private ownedSource: PgSchemaSource | null = null;
  private models: Model[] = [];

  private constructor(options: AttrcastOptions) {
    this.source = options.source;
    this.types = options.types ?? defaultTypes;
    this.logger = new Logger({ silent: options.silentLogs ?? false });
  }

  static init(options: AttrcastOptions = {}): Attrcast {
    return new Attrcast(options);
  }

  /**
   * Build from environment settings. With a database URL the instance owns
   * a PgSchemaSource and `close()` ends its pool.
   */
  static fromConfig(
    config: AttrcastConfig = loadConfig(),
    options: Omit<AttrcastOptions, "source" | "silentLogs"> = {}
  ): Attrcast {
    const instance = new Attrcast({ ...options, silentLogs: config.silentLogs });
    if (config.databaseUrl) {
      const source = PgSchemaSource.connect(config.databaseUrl, {
        schema: config.schema,
        ssl: config.ssl,
      });
      instance.source = source;
      instance.ownedSource = source;
    }
    return instance;
  }

  model(config: ModelConfig): Model {
    const mdl = new Model(config, {
      source: this.source,
      types: this.types,
      logger: this.logger,
    });
    this.models.push(mdl);
    return mdl;
  }

  allModels(): Model[] {
    return [...this.models];
  }

  /** Load every model's schema, one after another. */
  async load() {
    for (const model of this.models) {
      await model.load();
    }
  }

  async close() {
    if (!this.ownedSource) return;
    await this.ownedSource.close();
    this.ownedSource = null;
  }
}
