// apps/auth-server/src/app.ts
import express, { type ErrorRequestHandler } from "express";
import { bearerAuth } from "@schemekit/bearer";
import type { BearerSchemeOptions } from "@schemekit/options-core";

import type { AuthRuntime } from "./runtime";

export { createAuthRuntime, type AuthRuntime } from "./runtime";
export { configFromEnv, type ServerConfig } from "./config";

/**
 * RFC 9728-style protected resource metadata for one scheme.
 */
export function buildProtectedResourcePayload(options: BearerSchemeOptions) {
  const tvp = options.tokenValidationParameters;
  const issuers = tvp.validIssuer ? [...tvp.validIssuers, tvp.validIssuer] : tvp.validIssuers;
  const resource = tvp.validAudiences[0] ?? tvp.validAudience;

  return {
    ...(resource ? { resource } : {}),
    authorization_servers: issuers,
    bearer_methods_supported: ["header"],
  };
}

export function buildApp(runtime: AuthRuntime) {
  const { config, registry, logger } = runtime;

  // -----------------------------
  // Boot
  // -----------------------------
  // Avoid logging sensitive values directly
  console.log("[boot] AUTH_SCHEME=%s", config.scheme);
  console.log("[boot] AUTH_CONFIG_FILE_SET=%s", Boolean(config.configFile));
  console.log("[boot] DEBUG_AUTH=%s", config.debugAuth);

  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.get("/", (_req, res) => res.status(200).json({ ok: true }));

  // Public metadata for clients discovering how to get a token
  app.get("/.well-known/oauth-protected-resource", (_req, res) => {
    res.json(buildProtectedResourcePayload(registry.get(config.scheme)));
  });

  // -----------------------------
  // Protected area: bearerAuth → handlers
  // -----------------------------
  app.use("/protected", bearerAuth({ registry, scheme: config.scheme, logger }));

  app.get("/protected/ping", (_req, res) => {
    res.json({
      ok: true,
      sub: res.locals.identity?.sub ?? null,
      scheme: res.locals.identity?.scheme ?? null,
    });
  });

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    logger("request_failed", { error: err instanceof Error ? err.message : String(err) });
    res.status(500).json({ error: "options_unavailable" });
  };
  app.use(onError);

  return app;
}
