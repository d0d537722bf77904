// packages/bearer/src/middleware.ts
import type { Request, RequestHandler } from "express";
import {
  noopLogger,
  type BearerSchemeOptions,
  type OptionsLogger,
  type OptionsRegistry,
} from "@schemekit/options-core";

import { verifyBearerToken, type VerifyFailure } from "./verifier";

export interface BearerAuthConfig {
  registry: OptionsRegistry<BearerSchemeOptions>;
  scheme: string;
  logger?: OptionsLogger;
  now?: () => Date;
}

/**
 * Token from an `Authorization: Bearer` header, or "" when there is none.
 */
export function readBearerToken(req: Request): string {
  const auth = req.header("authorization") || "";
  return auth.startsWith("Bearer ") ? auth.slice(7).trim() : "";
}

/**
 * Follow `forwardAuthenticate`, then `forwardDefault`, one hop.
 */
export function resolveTargetScheme(
  registry: OptionsRegistry<BearerSchemeOptions>,
  scheme: string,
): { scheme: string; options: BearerSchemeOptions } {
  const options = registry.get(scheme);
  const target = options.forwardAuthenticate || options.forwardDefault;
  if (!target || target === scheme) {
    return { scheme, options };
  }
  return { scheme: target, options: registry.get(target) };
}

export function buildChallenge(
  options: BearerSchemeOptions,
  failure?: VerifyFailure,
): string {
  if (!failure) return options.challenge;

  let header = `${options.challenge} error="${failure.error}"`;
  if (options.includeErrorDetails && failure.detail) {
    header += `, error_description="${failure.detail.replace(/"/g, "'")}"`;
  }
  return header;
}

/**
 * Express middleware:
 * - Reads the Bearer token from the Authorization header
 * - Verifies it against the scheme's options from the registry
 * - Stores the identity (and, with saveToken, the raw token) in res.locals
 */
export function bearerAuth(config: BearerAuthConfig): RequestHandler {
  const log = config.logger ?? noopLogger;

  return async (req, res, next) => {
    try {
      const { scheme, options } = resolveTargetScheme(config.registry, config.scheme);
      const token = readBearerToken(req);

      if (!token) {
        res.setHeader("WWW-Authenticate", buildChallenge(options));
        res.status(401).json({ error: "missing_bearer" });
        return;
      }

      const result = await verifyBearerToken(options, token, { scheme, now: config.now });
      if (!result.ok) {
        log("bearer_rejected", { scheme, detail: result.detail });
        res.setHeader("WWW-Authenticate", buildChallenge(options, result));
        res
          .status(401)
          .json(options.includeErrorDetails ? result : { ok: false, error: result.error });
        return;
      }

      res.locals.identity = result.identity;
      if (options.saveToken) {
        res.locals.accessToken = token;
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}
