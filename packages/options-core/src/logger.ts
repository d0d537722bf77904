// packages/options-core/src/logger.ts

/**
 * Logger shape used across the packages: an event name plus metadata.
 */
export type OptionsLogger = (msg: string, meta: Record<string, unknown>) => void;

export const noopLogger: OptionsLogger = () => {};

export interface ConsoleLoggerConfig {
  serviceName?: string;
  environment?: string;
}

/**
 * Sink that writes one JSON line to console per event.
 */
export function createConsoleLogger(
  config: ConsoleLoggerConfig = {},
): OptionsLogger {
  const serviceName = config.serviceName ?? "schemekit";
  const environment = config.environment ?? process.env.NODE_ENV ?? "dev";

  return (msg, meta) => {
    const line = {
      ts: new Date().toISOString(),
      msg,
      serviceName,
      environment,
      ...meta,
    };

    try {
      // eslint-disable-next-line no-console
      console.log("[schemekit]", JSON.stringify(line));
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error("[schemekit:logger_error]", err);
    }
  };
}
