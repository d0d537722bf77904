import { describe, it, expect } from "vitest";

import { TicketDataFormat, type AuthenticationTicket } from "../src/index.ts";
import { createFakeProtectionProvider } from "./fakes.ts";

const ticket: AuthenticationTicket = {
  scheme: "Api",
  claims: { sub: "user-1", role: ["reader", "writer"] },
  items: { ".refresh": "true" },
  issuedAt: "2025-01-01T00:00:00.000Z",
  expiresAt: "2025-01-01T01:00:00.000Z",
};

describe("TicketDataFormat", () => {
  it("unprotects what it protected", async () => {
    const format = new TicketDataFormat(
      createFakeProtectionProvider().createProtector("p", "Api", "BearerToken"),
    );

    const text = await format.protect(ticket);

    expect(await format.unprotect(text)).toEqual({ ok: true, ticket });
    expect(format.purposes).toEqual(["p", "Api", "BearerToken"]);
  });

  it("rejects a payload protected for another purpose", async () => {
    const provider = createFakeProtectionProvider();
    const bearer = new TicketDataFormat(provider.createProtector("p", "Api", "BearerToken"));
    const refresh = new TicketDataFormat(provider.createProtector("p", "Api", "RefreshToken"));

    const result = await refresh.unprotect(await bearer.protect(ticket));

    expect(result).toEqual({
      ok: false,
      error: "invalid_ticket",
      detail: "payload was not protected for this purpose",
    });
  });

  it("rejects payloads that are not tickets", async () => {
    const protector = createFakeProtectionProvider().createProtector("p");
    const format = new TicketDataFormat(protector);

    const notJson = await protector.protect(new TextEncoder().encode("not json"));
    const wrongShape = await protector.protect(
      new TextEncoder().encode(JSON.stringify({ v: 1, scheme: "Api", claims: { sub: 1 }, items: {} })),
    );

    expect(await format.unprotect(notJson)).toMatchObject({ ok: false, error: "invalid_ticket" });
    expect(await format.unprotect(wrongShape)).toEqual({
      ok: false,
      error: "invalid_ticket",
      detail: "unrecognized ticket shape",
    });
  });
});
