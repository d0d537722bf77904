// packages/options-core/src/configure.ts

import type { ConfigurationSection } from "./configuration";
import { noopLogger, type OptionsLogger } from "./logger";
import {
  currentCulture,
  parseBoolean,
  parseDuration,
  parseInvariantDuration,
  parseOrDefault,
  parseString,
} from "./parse";
import type { AuthenticationConfigurationProvider } from "./scheme-configuration";
import { readSigningKeyEntries, resolveIssuerSigningKeys } from "./signing-keys";
import { TicketDataFormat } from "./ticket";
import type {
  BearerSchemeOptions,
  DataProtectionProvider,
  DurationMs,
  NamedOptionsConfigurer,
  SchemeName,
} from "./types";

export const PRIMARY_PURPOSE = "JWTBearerToken";
export const BEARER_TOKEN_PURPOSE = "BearerToken";
export const REFRESH_TOKEN_PURPOSE = "RefreshToken";

export interface SchemeOptionsConfigurerDeps {
  configuration: AuthenticationConfigurationProvider;
  protection: DataProtectionProvider;
  /**
   * Culture for the two token expiration fields. Other durations always use
   * the invariant syntax. Defaults to the host locale.
   */
  culture?: string;
  logger?: OptionsLogger;
}

function readList(section: ConfigurationSection, key: string): string[] {
  const values: string[] = [];
  for (const child of section.getSection(key).getChildren()) {
    if (child.value !== undefined) values.push(child.value);
  }
  return values;
}

/**
 * Fills a bearer scheme options record from the scheme's configuration
 * subtree. Holds no mutable state; safe to call for many names at once.
 */
export class SchemeOptionsConfigurer
  implements NamedOptionsConfigurer<BearerSchemeOptions>
{
  private readonly configuration: AuthenticationConfigurationProvider;
  private readonly protection: DataProtectionProvider;
  private readonly culture: string;
  private readonly log: OptionsLogger;

  constructor(deps: SchemeOptionsConfigurerDeps) {
    this.configuration = deps.configuration;
    this.protection = deps.protection;
    this.culture = deps.culture ?? currentCulture();
    this.log = deps.logger ?? noopLogger;
  }

  /**
   * An empty or missing name is the default scheme, which is left untouched.
   * Throws `FieldFormatError` / `KeyDecodeError` on malformed values.
   */
  configure(name: SchemeName | null | undefined, options: BearerSchemeOptions): void {
    if (!name) {
      return;
    }

    options.bearerTokenProtector = new TicketDataFormat(
      this.protection.createProtector(PRIMARY_PURPOSE, name, BEARER_TOKEN_PURPOSE),
    );
    options.refreshTokenProtector = new TicketDataFormat(
      this.protection.createProtector(PRIMARY_PURPOSE, name, REFRESH_TOKEN_PURPOSE),
    );

    const section = this.configuration.getSchemeConfiguration(name);
    if (section.getChildren().length === 0) {
      this.log("scheme_configuration_absent", { scheme: name, path: section.path });
      return;
    }

    const issuer = section.get("ValidIssuer");
    const issuers = readList(section, "ValidIssuers");
    const audience = section.get("ValidAudience");
    const audiences = readList(section, "ValidAudiences");

    const str = (key: string, current: string | undefined) =>
      parseOrDefault<string | undefined>(section.get(key), parseString, current);
    const bool = (key: string, current: boolean) =>
      parseOrDefault(section.get(key), parseBoolean, current);
    const invariantDuration = (key: string, current: DurationMs) =>
      parseOrDefault(section.get(key), parseInvariantDuration, current);
    const cultureDuration = (key: string, current: DurationMs) =>
      parseOrDefault(section.get(key), (v) => parseDuration(v, this.culture), current);

    options.authority = str("Authority", options.authority);
    options.backchannelTimeoutMs = invariantDuration("BackchannelTimeout", options.backchannelTimeoutMs);
    options.challenge = parseOrDefault(section.get("Challenge"), parseString, options.challenge);
    options.forwardAuthenticate = str("ForwardAuthenticate", options.forwardAuthenticate);
    options.forwardChallenge = str("ForwardChallenge", options.forwardChallenge);
    options.forwardDefault = str("ForwardDefault", options.forwardDefault);
    options.forwardForbid = str("ForwardForbid", options.forwardForbid);
    options.forwardSignIn = str("ForwardSignIn", options.forwardSignIn);
    options.forwardSignOut = str("ForwardSignOut", options.forwardSignOut);
    options.includeErrorDetails = bool("IncludeErrorDetails", options.includeErrorDetails);
    options.mapInboundClaims = bool("MapInboundClaims", options.mapInboundClaims);
    options.metadataAddress = str("MetadataAddress", options.metadataAddress);
    options.refreshIntervalMs = invariantDuration("RefreshInterval", options.refreshIntervalMs);
    options.refreshOnIssuerKeyNotFound = bool("RefreshOnIssuerKeyNotFound", options.refreshOnIssuerKeyNotFound);
    options.requireHttpsMetadata = bool("RequireHttpsMetadata", options.requireHttpsMetadata);
    options.saveToken = bool("SaveToken", options.saveToken);
    options.bearerTokenExpirationMs = cultureDuration("BearerTokenExpiration", options.bearerTokenExpirationMs);
    options.refreshTokenExpirationMs = cultureDuration("RefreshTokenExpiration", options.refreshTokenExpirationMs);

    options.tokenValidationParameters = {
      validateIssuer: issuers.length > 0,
      validIssuers: issuers,
      validIssuer: issuer,
      validateAudience: audiences.length > 0,
      validAudiences: audiences,
      validAudience: audience,
      validateIssuerSigningKey: true,
      issuerSigningKeys: resolveIssuerSigningKeys(
        issuers,
        readSigningKeyEntries(section.getSection("SigningKeys")),
        this.log,
      ),
    };
  }
}
