// index.ts

export { Attrcast, type AttrcastOptions } from "./attrcast/attrcast.js";
export { Model } from "./attrcast/model.js";
export type {
  AttributeDefinition,
  AttributeOptions,
  ModelConfig,
} from "./attrcast/model-types.js";
export { AttributeContainer, type Changes } from "./attrcast/container.js";
export {
  TypeRegistry,
  type AttributeDescriptor,
  type RegisterOptions,
} from "./attrcast/registry.js";
export {
  NO_DEFAULT,
  resolveDefault,
  toDefaultSpec,
  validateDefault,
  type DefaultProducer,
  type DefaultSpec,
} from "./attrcast/defaults.js";
export {
  TypeLookup,
  defaultTypes,
  hasType,
  lookupType,
  registerType,
  type TypeFactory,
  type TypeOptions,
} from "./attrcast/typeLookup.js";
export * from "./attrcast/types/index.js";
export * from "./attrcast/errors.js";
export { PgSchemaSource, type Queryable } from "./attrcast/schema/pgSchemaSource.js";
export {
  StaticSchemaSource,
  type StaticColumn,
} from "./attrcast/schema/staticSchemaSource.js";
export { parseDefaultSQL } from "./attrcast/schema/parseDefaultSQL.js";
export type { ColumnInfo, SchemaSource } from "./attrcast/schema/types.js";
export { loadConfig, type AttrcastConfig } from "./attrcast/config.js";
export { getSSLConfig, type SslOption, type SslSettings } from "./attrcast/sslConfig.js";
export { canonicalType } from "./attrcast/utils/canonicalType.js";
export { Logger } from "./attrcast/utils/logger.js";
