// packages/options-core/src/ticket.ts

import type { DataProtector } from "./types";

export type TicketClaimValue = string | string[];

/**
 * Ticket-shaped payload carried inside an opaque token.
 */
export interface AuthenticationTicket {
  scheme: string;
  claims: Record<string, TicketClaimValue>;
  items: Record<string, string>;
  /** ISO timestamps. */
  issuedAt?: string;
  expiresAt?: string;
}

export interface UnprotectSuccess {
  ok: true;
  ticket: AuthenticationTicket;
}

export interface UnprotectFailure {
  ok: false;
  error: "invalid_ticket";
  detail?: string;
}

export type UnprotectResult = UnprotectSuccess | UnprotectFailure;

const TICKET_FORMAT_VERSION = 1;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isClaimValue(value: unknown): value is TicketClaimValue {
  if (typeof value === "string") return true;
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function readStringRecord(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== "string") return undefined;
    out[k] = v;
  }
  return out;
}

function readClaims(value: unknown): Record<string, TicketClaimValue> | undefined {
  if (!isRecord(value)) return undefined;
  const out: Record<string, TicketClaimValue> = {};
  for (const [k, v] of Object.entries(value)) {
    if (!isClaimValue(v)) return undefined;
    out[k] = v;
  }
  return out;
}

function readOptionalString(value: unknown): string | undefined | false {
  if (value === undefined) return undefined;
  return typeof value === "string" ? value : false;
}

/**
 * Narrow a parsed JSON document back into a ticket.
 */
function readTicket(doc: unknown): AuthenticationTicket | undefined {
  if (!isRecord(doc) || doc.v !== TICKET_FORMAT_VERSION) return undefined;
  if (typeof doc.scheme !== "string") return undefined;

  const claims = readClaims(doc.claims);
  const items = readStringRecord(doc.items);
  const issuedAt = readOptionalString(doc.issuedAt);
  const expiresAt = readOptionalString(doc.expiresAt);
  if (!claims || !items || issuedAt === false || expiresAt === false) {
    return undefined;
  }

  return { scheme: doc.scheme, claims, items, issuedAt, expiresAt };
}

/**
 * Serializes tickets to versioned JSON and protects them with a purpose-bound
 * protector.
 */
export class TicketDataFormat {
  readonly protector: DataProtector;

  constructor(protector: DataProtector) {
    this.protector = protector;
  }

  get purposes(): readonly string[] {
    return this.protector.purposes;
  }

  async protect(ticket: AuthenticationTicket): Promise<string> {
    const body = JSON.stringify({ v: TICKET_FORMAT_VERSION, ...ticket });
    return this.protector.protect(new TextEncoder().encode(body));
  }

  /**
   * Never throws for bad input; tampered, foreign or malformed payloads
   * come back as `{ ok: false }`.
   */
  async unprotect(protectedData: string): Promise<UnprotectResult> {
    let doc: unknown;
    try {
      const plaintext = await this.protector.unprotect(protectedData);
      doc = JSON.parse(new TextDecoder().decode(plaintext));
    } catch (e) {
      return {
        ok: false,
        error: "invalid_ticket",
        detail: e instanceof Error ? e.message : String(e),
      };
    }

    const ticket = readTicket(doc);
    if (!ticket) {
      return { ok: false, error: "invalid_ticket", detail: "unrecognized ticket shape" };
    }
    return { ok: true, ticket };
  }
}
