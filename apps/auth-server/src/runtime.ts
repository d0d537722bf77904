// apps/auth-server/src/runtime.ts
import { readFileSync } from "fs";
import {
  createAuthenticationConfigurationProvider,
  createConfiguration,
  createConsoleLogger,
  createDefaultSchemeOptions,
  flattenEnv,
  flattenObject,
  noopLogger,
  OptionsRegistry,
  parseConfigurationJson,
  SchemeOptionsConfigurer,
  type BearerSchemeOptions,
  type ConfigurationLayer,
  type ConfigurationSection,
  type EnvLike,
  type OptionsLogger,
} from "@schemekit/options-core";
import { createDataProtectionProvider } from "@schemekit/protection";

import { configFromEnv, type ServerConfig } from "./config";

export interface AuthRuntime {
  config: ServerConfig;
  registry: OptionsRegistry<BearerSchemeOptions>;
  logger: OptionsLogger;
  /** Re-read the configuration file and env, then drop built options. */
  reload(env?: EnvLike): void;
}

function loadConfiguration(config: ServerConfig, env: EnvLike): ConfigurationSection {
  const layers: ConfigurationLayer[] = [];
  if (config.configFile) {
    layers.push(flattenObject(parseConfigurationJson(readFileSync(config.configFile, "utf8"))));
  }
  layers.push(flattenEnv(env));
  return createConfiguration(...layers);
}

/**
 * Wire configuration, protection and the options registry from env.
 */
export function createAuthRuntime(env: EnvLike = process.env): AuthRuntime {
  const config = configFromEnv(env);

  let root = loadConfiguration(config, env);

  const logger = config.debugAuth
    ? createConsoleLogger({ serviceName: config.serviceName, environment: config.environment })
    : noopLogger;

  const configurer = new SchemeOptionsConfigurer({
    configuration: {
      getSchemeConfiguration: (scheme) =>
        createAuthenticationConfigurationProvider(root).getSchemeConfiguration(scheme),
    },
    protection: createDataProtectionProvider({
      masterKey: config.protectionKey,
      applicationName: config.applicationName,
    }),
    culture: config.culture,
    logger,
  });

  const registry = new OptionsRegistry({
    create: createDefaultSchemeOptions,
    configurers: [configurer],
  });

  const reload = (next: EnvLike = env) => {
    root = loadConfiguration(config, next);
    registry.clear();
  };

  return { config, registry, logger, reload };
}
