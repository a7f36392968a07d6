// config.ts

import "dotenv/config";
import { ConfigError } from "./errors.js";
import { getSSLConfig, type SslOption, type SslSettings } from "./sslConfig.js";

export interface AttrcastConfig {
  databaseUrl: string | undefined;
  schema: string;
  silentLogs: boolean;
  nodeEnv: string;
  ssl: SslOption;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;

  const value = raw.trim().toLowerCase();
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new ConfigError(`${key} must be true/false/1/0, got '${raw}'`);
}

/** Read settings from the environment (.env is loaded on import). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AttrcastConfig {
  const databaseUrl = env.ATTRCAST_DATABASE_URL || env.DATABASE_URL || undefined;
  const nodeEnv = env.NODE_ENV || "development";
  const allowSSL = readBoolean(env, "ATTRCAST_ALLOW_SSL");
  const rejectUnauthorized = readBoolean(env, "ATTRCAST_SSL_REJECT_UNAUTHORIZED");

  const ssl: SslSettings = { nodeEnv };
  if (allowSSL !== undefined) ssl.allowSSL = allowSSL;
  if (rejectUnauthorized !== undefined) ssl.rejectUnauthorized = rejectUnauthorized;
  if (databaseUrl !== undefined) ssl.dbUrl = databaseUrl;

  return {
    databaseUrl,
    schema: env.ATTRCAST_SCHEMA || "public",
    silentLogs: readBoolean(env, "ATTRCAST_SILENT_LOGS") ?? false,
    nodeEnv,
    ssl: getSSLConfig(ssl),
  };
}
