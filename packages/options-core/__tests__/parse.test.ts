import { describe, it, expect, vi } from "vitest";

import {
  FieldFormatError,
  parseBoolean,
  parseDuration,
  parseInvariantDuration,
  parseOrDefault,
} from "../src/index.ts";
import { catchError } from "./fakes.ts";

describe("parseOrDefault", () => {
  it.each([undefined, null, ""])("returns the fallback for %j without parsing", (raw) => {
    const parse = vi.fn((v: string) => v.length);

    expect(parseOrDefault(raw, parse, 42)).toBe(42);
    expect(parse).not.toHaveBeenCalled();
  });

  it("parses a non-empty value", () => {
    expect(parseOrDefault("abc", (v) => v.length, 0)).toBe(3);
  });

  it("lets the parser's error through unchanged", () => {
    const boom = new Error("boom");

    expect(() =>
      parseOrDefault(
        "x",
        () => {
          throw boom;
        },
        0,
      ),
    ).toThrow(boom);
  });
});

describe("parseBoolean", () => {
  it("accepts true/false in any case, ignoring surrounding whitespace", () => {
    expect(parseBoolean("true")).toBe(true);
    expect(parseBoolean("True")).toBe(true);
    expect(parseBoolean(" FALSE ")).toBe(false);
  });

  it("rejects anything else with INVALID_BOOLEAN", () => {
    const caught = catchError(() => parseBoolean("yes"));

    expect(caught).toBeInstanceOf(FieldFormatError);
    expect(caught).toMatchObject({ code: "INVALID_BOOLEAN", raw: "yes" });
  });
});

describe("parseInvariantDuration", () => {
  it("parses hh:mm:ss", () => {
    expect(parseInvariantDuration("00:05:00")).toBe(300_000);
  });

  it("parses hh:mm", () => {
    expect(parseInvariantDuration("1:2")).toBe(3_720_000);
  });

  it("treats a bare integer as days", () => {
    expect(parseInvariantDuration("3")).toBe(259_200_000);
  });

  it("parses days, time and fraction together", () => {
    // 1 day + 2 h + 3 min + 4.5 s
    expect(parseInvariantDuration("1.02:03:04.5")).toBe(93_784_500);
  });

  it("parses negative values", () => {
    expect(parseInvariantDuration("-00:00:01")).toBe(-1000);
  });

  it("parses a negative zero as plain zero", () => {
    expect(parseInvariantDuration("-00:00:00")).toBe(0);
    expect(parseInvariantDuration("-0")).toBe(0);
  });

  it.each(["notaduration", "24:00", "00:60", "00:00:60", "1.5", "00:00:01,5", ""])(
    "rejects %j with INVALID_DURATION",
    (raw) => {
      const caught = catchError(() => parseInvariantDuration(raw));

      expect(caught).toBeInstanceOf(FieldFormatError);
      expect(caught).toMatchObject({ code: "INVALID_DURATION", raw });
    },
  );
});

describe("parseDuration with a culture", () => {
  it("accepts the culture's decimal separator for the fraction", () => {
    expect(parseDuration("00:00:01,5", "fr-FR")).toBe(1500);
  });

  it("still accepts the invariant separator", () => {
    expect(parseDuration("00:00:01.25", "fr-FR")).toBe(1250);
    expect(parseDuration("00:00:01.25", "en-US")).toBe(1250);
  });

  it("does not accept another culture's separator", () => {
    expect(() => parseDuration("00:00:01,5", "en-US")).toThrow(FieldFormatError);
  });
});
