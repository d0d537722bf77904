import { describe, it, expect, vi } from "vitest";

import {
  createConfiguration,
  decodeBase64Key,
  flattenObject,
  KeyDecodeError,
  readSigningKeyEntries,
  resolveIssuerSigningKeys,
} from "../src/index.ts";
import { base64, bytes, catchError } from "./fakes.ts";

describe("resolveIssuerSigningKeys", () => {
  it("returns one key per matched issuer, in issuer order", () => {
    const keys = resolveIssuerSigningKeys(
      ["b", "a"],
      [
        { issuer: "a", value: base64("key-a") },
        { issuer: "b", value: base64("key-b") },
      ],
    );

    expect(keys).toEqual([bytes("key-b"), bytes("key-a")]);
  });

  it("uses the first candidate for an issuer", () => {
    const keys = resolveIssuerSigningKeys(
      ["a"],
      [
        { issuer: "a", value: base64("first") },
        { issuer: "a", value: base64("second") },
      ],
    );

    expect(keys).toEqual([bytes("first")]);
  });

  it("skips unmatched issuers and reports them", () => {
    const logger = vi.fn();

    const keys = resolveIssuerSigningKeys(
      ["a", "b", "c"],
      [{ issuer: "b", value: base64("key-b") }],
      logger,
    );

    expect(keys).toEqual([bytes("key-b")]);
    expect(logger).toHaveBeenCalledTimes(2);
    expect(logger).toHaveBeenNthCalledWith(1, "issuer_signing_key_unmatched", { issuer: "a" });
    expect(logger).toHaveBeenNthCalledWith(2, "issuer_signing_key_unmatched", { issuer: "c" });
  });

  it("skips an issuer whose first candidate has no value", () => {
    const keys = resolveIssuerSigningKeys(
      ["a"],
      [{ issuer: "a" }, { issuer: "a", value: base64("later") }],
    );

    expect(keys).toEqual([]);
  });

  it("ignores candidates without an issuer", () => {
    expect(resolveIssuerSigningKeys(["a"], [{ value: base64("orphan") }])).toEqual([]);
  });

  it("emits a key for each repetition of an issuer", () => {
    const keys = resolveIssuerSigningKeys(["a", "a"], [{ issuer: "a", value: base64("k") }]);

    expect(keys).toEqual([bytes("k"), bytes("k")]);
  });

  it("throws KeyDecodeError for a present but corrupt value", () => {
    const caught = catchError(() =>
      resolveIssuerSigningKeys(["a"], [{ issuer: "a", value: "not base64!" }]),
    );

    expect(caught).toBeInstanceOf(KeyDecodeError);
    expect(caught).toMatchObject({ code: "INVALID_SIGNING_KEY", issuer: "a" });
  });

  it("does not decode keys of issuers that are not listed", () => {
    expect(
      resolveIssuerSigningKeys(["a"], [{ issuer: "z", value: "not base64!" }]),
    ).toEqual([]);
  });
});

describe("decodeBase64Key", () => {
  it("ignores embedded whitespace", () => {
    expect(decodeBase64Key("c2Vj\ncmV0")).toEqual(bytes("secret"));
  });

  it.each(["abc", "ab=c", "YQ", "****", "YQ==="])("rejects %j", (raw) => {
    expect(() => decodeBase64Key(raw)).toThrow(KeyDecodeError);
  });

  it("rejects an empty key", () => {
    expect(() => decodeBase64Key("  ")).toThrow("signing key is empty");
  });
});

describe("readSigningKeyEntries", () => {
  it("reads Issuer/Value pairs from children", () => {
    const root = createConfiguration(
      flattenObject({
        SigningKeys: [{ Issuer: "a", Value: "djE=" }, { Issuer: "b" }, { Value: "djI=" }],
      }),
    );

    expect(readSigningKeyEntries(root.getSection("SigningKeys"))).toEqual([
      { issuer: "a", value: "djE=" },
      { issuer: "b", value: undefined },
      { issuer: undefined, value: "djI=" },
    ]);
  });
});
