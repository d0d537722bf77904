// packages/options-core/src/parse.ts

import { FieldFormatError } from "./errors";
import type { DurationMs } from "./types";

/** Culture name that selects the fixed, locale-independent duration syntax. */
export const INVARIANT_CULTURE = "invariant";

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;
const MAX_DAYS = 10_675_199;

/**
 * Parse `raw` when it carries a value, otherwise return `fallback`.
 * Parse failures propagate unchanged.
 */
export function parseOrDefault<T>(
  raw: string | null | undefined,
  parse: (value: string) => T,
  fallback: T,
): T {
  if (raw === undefined || raw === null || raw === "") {
    return fallback;
  }
  return parse(raw);
}

export function parseString(value: string): string {
  return value;
}

/**
 * Case-insensitive "true"/"false"; surrounding whitespace is ignored.
 */
export function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  throw new FieldFormatError(
    "INVALID_BOOLEAN",
    value,
    `"${value}" is not a valid boolean`,
  );
}

/**
 * Host locale, used when no culture is configured.
 */
export function currentCulture(): string {
  return Intl.DateTimeFormat().resolvedOptions().locale;
}

function escapeForRegex(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function fractionSeparators(culture: string): string[] {
  if (culture === INVARIANT_CULTURE) return ["."];

  const decimal = new Intl.NumberFormat(culture)
    .formatToParts(1.5)
    .find((part) => part.type === "decimal");

  const separators = ["."];
  if (decimal && decimal.value !== ".") {
    separators.push(decimal.value);
  }
  return separators;
}

function buildDurationPattern(separators: string[]): RegExp {
  const sep = separators.map(escapeForRegex).join("|");
  return new RegExp(
    `^\\s*(-)?(?:(\\d+)|(?:(\\d+)\\.)?(\\d{1,2}):(\\d{1,2})(?::(\\d{1,2})(?:(?:${sep})(\\d{1,7}))?)?)\\s*$`,
  );
}

/**
 * Parse a time-span string into milliseconds.
 *
 * Accepted shapes: `d`, `hh:mm`, `hh:mm:ss`, `d.hh:mm:ss` and any of those
 * with a `.fffffff` fraction after the seconds, optionally negative. For a
 * named culture the culture's decimal separator may also introduce the
 * fraction.
 */
export function parseDuration(
  value: string,
  culture: string = currentCulture(),
): DurationMs {
  const fail = (): never => {
    throw new FieldFormatError(
      "INVALID_DURATION",
      value,
      `"${value}" is not a valid duration`,
    );
  };

  const match = buildDurationPattern(fractionSeparators(culture)).exec(value);
  if (!match) return fail();

  const [, minus, daysOnly, daysPrefix, hh, mm, ss, fraction] = match;

  const days = Number(daysOnly ?? daysPrefix ?? "0");
  const hours = Number(hh ?? "0");
  const minutes = Number(mm ?? "0");
  const seconds = Number(ss ?? "0");

  if (days > MAX_DAYS || hours > 23 || minutes > 59 || seconds > 59) {
    return fail();
  }

  const fractionMs = fraction
    ? (Number(fraction) / 10 ** fraction.length) * MS_PER_SECOND
    : 0;

  const total =
    days * MS_PER_DAY +
    hours * MS_PER_HOUR +
    minutes * MS_PER_MINUTE +
    seconds * MS_PER_SECOND +
    fractionMs;

  return minus && total !== 0 ? -total : total;
}

export function parseInvariantDuration(value: string): DurationMs {
  return parseDuration(value, INVARIANT_CULTURE);
}
