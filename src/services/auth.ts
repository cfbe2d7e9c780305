import { equalsIgnoreAsciiCase } from "../lib/validation.js";
import type { CredentialParser, GuardFailure, GuardOutcome, HeaderSource } from "../types/index.js";

export const HAWK_SCHEME = "Hawk";

function noHeader(status: GuardFailure["status"] = 401): GuardFailure {
  return { ok: false, status, reason: { kind: "no-header" } };
}

/**
 * Picks the single value of a header. Duplicates are a client protocol error
 * (400) rather than plain absence (401), though both report `no-header`.
 */
export function locateHeader(values: readonly string[]): GuardOutcome<string> {
  if (values.length > 1) return noHeader(400);

  const [value] = values;
  return value === undefined ? noHeader() : { ok: true, value };
}

/**
 * Splits `<scheme> <payload>` at the first space. The payload is returned
 * untouched, leading whitespace included.
 */
export function splitScheme(raw: string, scheme: string = HAWK_SCHEME): GuardOutcome<string> {
  const space = raw.indexOf(" ");
  if (space === -1) return noHeader();
  if (!equalsIgnoreAsciiCase(raw.slice(0, space), scheme)) return noHeader();
  return { ok: true, value: raw.slice(space + 1) };
}

export function evaluateHeader<T>(source: HeaderSource, headerName: string, parser: CredentialParser<T>): GuardOutcome<T> {
  const located = locateHeader(source(headerName));
  if (!located.ok) return located;

  const payload = splitScheme(located.value);
  if (!payload.ok) return payload;

  const parsed = parser(payload.value);
  if (!parsed.ok) {
    return { ok: false, status: 401, reason: { kind: "malformed-credential", error: parsed.error } };
  }
  return { ok: true, value: parsed.value };
}

export function fromIncomingHeaders(headersDistinct: NodeJS.Dict<string[]>): HeaderSource {
  return (name) => headersDistinct[name.toLowerCase()] ?? [];
}

/**
 * Fetch `Headers` join repeated values into one, so a source built from them
 * never reports duplicates.
 */
export function fromFetchHeaders(headers: Headers): HeaderSource {
  return (name) => {
    const value = headers.get(name);
    return value === null ? [] : [value];
  };
}
