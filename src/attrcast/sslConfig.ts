// sslConfig.ts

export type SslOption = false | { rejectUnauthorized: boolean };

export interface SslSettings {
  nodeEnv?: string;
  /** Force SSL on or off, whatever the URL says. */
  allowSSL?: boolean;
  /** Verify the server certificate when SSL is on. */
  rejectUnauthorized?: boolean;
  dbUrl?: string;
}

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "[::1]"]);

function hostOf(dbUrl: string): string | null {
  try {
    return new URL(dbUrl).hostname;
  } catch (err) {
    if (err instanceof TypeError) return null;
    throw err;
  }
}

/**
 * The `ssl` option handed to a pg Pool. An explicit `allowSSL` decides;
 * otherwise `sslmode=require` / `ssl=true` in the URL turns SSL on, local
 * hosts stay plain, and remote hosts get verified SSL in production.
 */
export function getSSLConfig(settings: SslSettings = {}): SslOption {
  const { nodeEnv = "development", allowSSL, rejectUnauthorized, dbUrl = "" } = settings;

  if (allowSSL !== undefined) {
    return allowSSL ? { rejectUnauthorized: rejectUnauthorized ?? false } : false;
  }

  const url = dbUrl.toLowerCase();
  if (url.includes("sslmode=require") || url.includes("ssl=true")) {
    return { rejectUnauthorized: rejectUnauthorized ?? false };
  }

  const host = dbUrl ? hostOf(dbUrl) : null;
  if (host !== null && LOCAL_HOSTS.has(host)) return false;

  if (nodeEnv === "production") {
    return { rejectUnauthorized: rejectUnauthorized ?? true };
  }
  return false;
}
