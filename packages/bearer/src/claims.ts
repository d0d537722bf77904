// packages/bearer/src/claims.ts

/**
 * Short JWT claim names and the long claim types they map to on the way in.
 */
export const INBOUND_CLAIM_TYPES: ReadonlyMap<string, string> = new Map([
  ["sub", "http://schemas.xmlsoap.org/ws/2005/05/identity/claims/nameidentifier"],
  ["email", "http://schemas.xmlsoap.org/ws/2005/05/identity/claims/emailaddress"],
  ["unique_name", "http://schemas.xmlsoap.org/ws/2005/05/identity/claims/name"],
  ["given_name", "http://schemas.xmlsoap.org/ws/2005/05/identity/claims/givenname"],
  ["family_name", "http://schemas.xmlsoap.org/ws/2005/05/identity/claims/surname"],
  ["role", "http://schemas.microsoft.com/ws/2008/06/identity/claims/role"],
]);

export function mapInboundClaims(
  claims: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(claims)) {
    out[INBOUND_CLAIM_TYPES.get(name) ?? name] = value;
  }
  return out;
}
