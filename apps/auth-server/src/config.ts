// apps/auth-server/src/config.ts
import { decodeBase64Key, type EnvLike } from "@schemekit/options-core";

export interface ServerConfig {
  /**
   * Scheme guarding /protected, e.g. "Bearer". Its options are read from
   * `Authentication:Schemes:<scheme>`.
   */
  scheme: string;
  /**
   * Root key for the token protectors (decoded DATA_PROTECTION_KEY).
   */
  protectionKey: Uint8Array;
  /**
   * Isolates protectors of apps that share a key. Defaults to "schemekit".
   */
  applicationName: string;
  /**
   * Culture for the token expiration durations. Host locale when unset.
   */
  culture?: string;
  /**
   * Optional JSON file layered under the environment.
   */
  configFile?: string;
  port: number;
  debugAuth: boolean;
  serviceName: string;
  environment: string;
}

/**
 * Builds a ServerConfig from process.env-style variables.
 * Throws when DATA_PROTECTION_KEY is missing or not base64.
 */
export function configFromEnv(env: EnvLike = process.env): ServerConfig {
  const rawKey = env.DATA_PROTECTION_KEY;
  if (!rawKey) {
    throw new Error("DATA_PROTECTION_KEY is required (base64, at least 16 bytes)");
  }

  let protectionKey: Uint8Array;
  try {
    protectionKey = decodeBase64Key(rawKey);
  } catch (err) {
    throw new Error("DATA_PROTECTION_KEY is not valid base64", { cause: err });
  }

  const port = Number(env.PORT);

  return {
    scheme: env.AUTH_SCHEME || "Bearer",
    protectionKey,
    applicationName: env.APP_NAME || "schemekit",
    culture: env.AUTH_CULTURE || undefined,
    configFile: env.AUTH_CONFIG_FILE || undefined,
    port: Number.isInteger(port) && port > 0 ? port : 8080,
    debugAuth: env.DEBUG_AUTH === "true",
    serviceName: env.SERVICE_NAME || "auth-server",
    environment: env.NODE_ENV || "dev",
  };
}
