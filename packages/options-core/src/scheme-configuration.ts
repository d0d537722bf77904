// packages/options-core/src/scheme-configuration.ts

import type { ConfigurationSection } from "./configuration";
import type { SchemeName } from "./types";

/**
 * Hands out the configuration subtree for a named scheme.
 */
export interface AuthenticationConfigurationProvider {
  getSchemeConfiguration(scheme: SchemeName): ConfigurationSection;
}

/**
 * Default layout: `<sectionName>:Schemes:<scheme>`.
 */
export function createAuthenticationConfigurationProvider(
  root: ConfigurationSection,
  sectionName = "Authentication",
): AuthenticationConfigurationProvider {
  const schemes = root.getSection(sectionName).getSection("Schemes");
  return {
    getSchemeConfiguration: (scheme) => schemes.getSection(scheme),
  };
}
