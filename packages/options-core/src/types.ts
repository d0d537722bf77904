// packages/options-core/src/types.ts

import type { TicketDataFormat } from "./ticket";

/** Durations are carried as milliseconds, like `timeoutMs` elsewhere. */
export type DurationMs = number;

/**
 * Name of an authentication scheme. The empty string is the
 * default/unnamed scheme.
 */
export type SchemeName = string;

export const DEFAULT_SCHEME: SchemeName = "";

/**
 * An opaque protect/unprotect capability bound to a purpose path.
 * Protectors for different purpose paths cannot read each other's output.
 */
export interface DataProtector {
  /** Purpose path this protector was created for. */
  readonly purposes: readonly string[];
  protect(plaintext: Uint8Array): Promise<string>;
  /** Rejects when the payload was not produced for this purpose path. */
  unprotect(protectedData: string): Promise<Uint8Array>;
}

export interface DataProtectionProvider {
  createProtector(...purposes: string[]): DataProtector;
}

/**
 * Parameters a bearer token is validated against.
 */
export interface TokenValidationParameters {
  validateIssuer: boolean;
  /** Configuration order, duplicates kept. */
  validIssuers: string[];
  /** Single legacy issuer; never derived from `validIssuers`. */
  validIssuer?: string;

  validateAudience: boolean;
  validAudiences: string[];
  validAudience?: string;

  validateIssuerSigningKey: boolean;
  /** Raw symmetric key material, at most one per entry of `validIssuers`. */
  issuerSigningKeys: Uint8Array[];
}

/**
 * Options record for one bearer authentication scheme.
 * Created with framework defaults, then mutated in place by configurers.
 */
export interface BearerSchemeOptions {
  authority?: string;
  backchannelTimeoutMs: DurationMs;
  challenge: string;

  /** Scheme-name references for forwarding; unset means "handle locally". */
  forwardAuthenticate?: SchemeName;
  forwardChallenge?: SchemeName;
  forwardDefault?: SchemeName;
  forwardForbid?: SchemeName;
  forwardSignIn?: SchemeName;
  forwardSignOut?: SchemeName;

  includeErrorDetails: boolean;
  mapInboundClaims: boolean;
  metadataAddress?: string;
  refreshIntervalMs: DurationMs;
  refreshOnIssuerKeyNotFound: boolean;
  requireHttpsMetadata: boolean;
  saveToken: boolean;

  bearerTokenExpirationMs: DurationMs;
  refreshTokenExpirationMs: DurationMs;

  tokenValidationParameters: TokenValidationParameters;

  bearerTokenProtector?: TicketDataFormat;
  refreshTokenProtector?: TicketDataFormat;
}

/**
 * Anything that can fill in a named options record.
 */
export interface NamedOptionsConfigurer<T> {
  configure(name: SchemeName | null | undefined, options: T): void;
}
