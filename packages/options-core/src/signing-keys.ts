// packages/options-core/src/signing-keys.ts

import type { ConfigurationSection } from "./configuration";
import { KeyDecodeError } from "./errors";
import { noopLogger, type OptionsLogger } from "./logger";

/**
 * One configured signing key: which issuer it belongs to and its base64
 * value. Either half may be missing in configuration.
 */
export interface SigningKeyEntry {
  issuer?: string;
  value?: string;
}

const BASE64_PATTERN =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Strict base64 decode. Whitespace is ignored; anything else that is not
 * canonical base64 (bad alphabet, bad padding, bad length) throws.
 */
export function decodeBase64Key(value: string, issuer?: string): Uint8Array {
  const compact = value.replace(/[ \t\r\n]/g, "");
  if (!BASE64_PATTERN.test(compact)) {
    throw new KeyDecodeError(
      issuer
        ? `signing key for issuer "${issuer}" is not valid base64`
        : "signing key is not valid base64",
      issuer,
    );
  }
  if (compact.length === 0) {
    throw new KeyDecodeError(
      issuer ? `signing key for issuer "${issuer}" is empty` : "signing key is empty",
      issuer,
    );
  }
  return new Uint8Array(Buffer.from(compact, "base64"));
}

export function readSigningKeyEntries(
  section: ConfigurationSection,
): SigningKeyEntry[] {
  return section.getChildren().map((child) => ({
    issuer: child.get("Issuer"),
    value: child.get("Value"),
  }));
}

/**
 * Resolve at most one key per issuer, in issuer order.
 *
 * The first candidate naming an issuer wins. An issuer with no candidate,
 * or whose candidate has no value, yields nothing. A value that is present
 * but corrupt throws `KeyDecodeError`.
 */
export function resolveIssuerSigningKeys(
  issuers: readonly string[],
  candidates: readonly SigningKeyEntry[],
  logger: OptionsLogger = noopLogger,
): Uint8Array[] {
  const byIssuer = new Map<string, SigningKeyEntry>();
  for (const candidate of candidates) {
    if (candidate.issuer !== undefined && !byIssuer.has(candidate.issuer)) {
      byIssuer.set(candidate.issuer, candidate);
    }
  }

  const keys: Uint8Array[] = [];
  for (const issuer of issuers) {
    const value = byIssuer.get(issuer)?.value;
    if (value === undefined) {
      logger("issuer_signing_key_unmatched", { issuer });
      continue;
    }
    keys.push(decodeBase64Key(value, issuer));
  }
  return keys;
}
