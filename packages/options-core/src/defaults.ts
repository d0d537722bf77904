// packages/options-core/src/defaults.ts

import type { BearerSchemeOptions, TokenValidationParameters } from "./types";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Validation flags follow the (empty) lists; the signing key is always checked.
 */
export function createDefaultTokenValidationParameters(): TokenValidationParameters {
  return {
    validateIssuer: false,
    validIssuers: [],
    validateAudience: false,
    validAudiences: [],
    validateIssuerSigningKey: true,
    issuerSigningKeys: [],
  };
}

/**
 * Fresh options record with framework defaults. Every call returns a new
 * object; configurers mutate it in place.
 */
export function createDefaultSchemeOptions(): BearerSchemeOptions {
  return {
    backchannelTimeoutMs: MINUTE_MS,
    challenge: "Bearer",
    includeErrorDetails: true,
    mapInboundClaims: true,
    refreshIntervalMs: 5 * MINUTE_MS,
    refreshOnIssuerKeyNotFound: true,
    requireHttpsMetadata: true,
    saveToken: true,
    bearerTokenExpirationMs: HOUR_MS,
    refreshTokenExpirationMs: 14 * DAY_MS,
    tokenValidationParameters: createDefaultTokenValidationParameters(),
  };
}
