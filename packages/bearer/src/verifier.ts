// packages/bearer/src/verifier.ts
import { errors, jwtVerify, type JWTPayload, type JWTVerifyOptions } from "jose";
import type { BearerSchemeOptions } from "@schemekit/options-core";

import { mapInboundClaims } from "./claims";

export type TokenShape = "jwt" | "opaque" | "none";

/**
 * Identity produced by a successful verification.
 */
export interface SchemeIdentity {
  /** Raw subject, never renamed by claim mapping. */
  sub: string;
  /** Scheme whose options accepted the token. */
  scheme: string;
  issuer?: string;
  /** Claims, renamed when the scheme maps inbound claims. */
  claims: Record<string, unknown>;
  source: "jwt" | "ticket";
}

export interface VerifySuccess {
  ok: true;
  identity: SchemeIdentity;
}

export interface VerifyFailure {
  ok: false;
  error: "invalid_token";
  detail?: string;
}

export type VerifyResult = VerifySuccess | VerifyFailure;

export interface VerifyBearerOptions {
  scheme: string;
  /** Clock override, mostly for tests. */
  now?: () => Date;
}

const HMAC_ALGORITHMS = ["HS256", "HS384", "HS512"];

/**
 * Three dot-separated segments is a JWS; anything else non-empty is opaque.
 */
export function getTokenShape(token: string): TokenShape {
  if (!token) return "none";
  return token.split(".").length === 3 ? "jwt" : "opaque";
}

function fail(detail?: string): VerifyFailure {
  return { ok: false, error: "invalid_token", detail };
}

function acceptedValues(list: string[], legacy: string | undefined): string[] {
  return legacy ? [...list, legacy] : list;
}

function buildIdentity(
  options: BearerSchemeOptions,
  scheme: string,
  claims: Record<string, unknown>,
  source: SchemeIdentity["source"],
): VerifyResult {
  const sub = typeof claims.sub === "string" ? claims.sub : "";
  if (!sub) {
    return fail('missing "sub" claim in token');
  }

  const issuer = typeof claims.iss === "string" ? claims.iss : undefined;

  return {
    ok: true,
    identity: {
      sub,
      scheme,
      issuer,
      claims: options.mapInboundClaims ? mapInboundClaims(claims) : { ...claims },
      source,
    },
  };
}

async function verifyJwt(
  options: BearerSchemeOptions,
  token: string,
  scheme: string,
  now: Date,
): Promise<VerifyResult> {
  const tvp = options.tokenValidationParameters;
  if (tvp.issuerSigningKeys.length === 0) {
    return fail("no issuer signing keys configured");
  }

  const verifyOptions: JWTVerifyOptions = {
    algorithms: HMAC_ALGORITHMS,
    clockTolerance: "60s",
    currentDate: now,
  };
  if (tvp.validateIssuer) {
    verifyOptions.issuer = acceptedValues(tvp.validIssuers, tvp.validIssuer);
  }
  if (tvp.validateAudience) {
    verifyOptions.audience = acceptedValues(tvp.validAudiences, tvp.validAudience);
  }

  // Keys are not tied to a key id, so each one is tried until a signature matches.
  for (const key of tvp.issuerSigningKeys) {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, key, verifyOptions));
    } catch (e) {
      if (e instanceof errors.JWSSignatureVerificationFailed) continue;
      return fail(e instanceof Error ? e.message : String(e));
    }
    return buildIdentity(options, scheme, payload, "jwt");
  }

  return fail("signature verification failed");
}

async function verifyTicket(
  options: BearerSchemeOptions,
  token: string,
  scheme: string,
  now: Date,
): Promise<VerifyResult> {
  const format = options.bearerTokenProtector;
  if (!format) {
    return fail("opaque tokens are not enabled for this scheme");
  }

  const result = await format.unprotect(token);
  if (!result.ok) {
    return fail(result.detail);
  }

  const { ticket } = result;
  if (ticket.expiresAt && Date.parse(ticket.expiresAt) <= now.getTime()) {
    return fail("ticket expired");
  }

  return buildIdentity(options, scheme, ticket.claims, "ticket");
}

/**
 * Verify a bearer token against a materialized options record.
 * Never throws for bad tokens; failures come back as `{ ok: false }`.
 */
export async function verifyBearerToken(
  options: BearerSchemeOptions,
  token: string,
  opts: VerifyBearerOptions,
): Promise<VerifyResult> {
  const now = opts.now?.() ?? new Date();

  switch (getTokenShape(token)) {
    case "none":
      return fail("missing bearer token");
    case "jwt":
      return verifyJwt(options, token, opts.scheme, now);
    case "opaque":
      return verifyTicket(options, token, opts.scheme, now);
  }
}
