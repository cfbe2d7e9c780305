import { HawkParseError } from "../lib/errors.js";
import { isValidAttributeValue, isValidBase64, isValidTimestamp } from "../lib/validation.js";
import type { HawkField, HawkHeader, ParseResult } from "../types/index.js";

// Also the order fields are rendered in
const HAWK_FIELDS: readonly HawkField[] = ["id", "ts", "nonce", "hash", "ext", "mac", "app", "dlg"];
const KNOWN_FIELDS: ReadonlySet<string> = new Set<string>(HAWK_FIELDS);
const BASE64_FIELDS: ReadonlySet<HawkField> = new Set<HawkField>(["mac", "hash"]);

function isHawkField(name: string): name is HawkField {
  return KNOWN_FIELDS.has(name);
}

function fail(message: string): ParseResult<HawkHeader> {
  return { ok: false, error: new HawkParseError(message) };
}

/**
 * Parses the attribute list that follows the `Hawk ` scheme token, e.g.
 * `id="dh37fgj492je", ts="1353832234", nonce="j4h3g2", mac="..."`.
 *
 * No attribute is required here: the client and server sides of an exchange
 * carry different subsets.
 */
export function parseHawkHeader(payload: string): ParseResult<HawkHeader> {
  const header: HawkHeader = {};
  const seen = new Set<string>();
  let rest = payload;

  for (;;) {
    rest = rest.trimStart();
    if (!rest) break;

    const eq = rest.indexOf("=");
    if (eq === -1) return fail("Expected '='");

    const name = rest.slice(0, eq).trim();
    rest = rest.slice(eq + 1).trimStart();
    if (!rest.startsWith('"')) return fail("Expected opening quote");

    const close = rest.indexOf('"', 1);
    if (close === -1) return fail("Expected closing quote");
    const value = rest.slice(1, close);
    rest = rest.slice(close + 1);

    if (!isHawkField(name)) return fail(`Invalid Hawk field ${name}`);
    if (seen.has(name)) return fail(`Duplicate Hawk field ${name}`);
    seen.add(name);

    if (!isValidAttributeValue(value)) return fail(`Bad attribute value: ${name}`);

    if (name === "ts") {
      if (!isValidTimestamp(value)) return fail("Invalid timestamp");
      header.ts = Number(value);
    } else if (BASE64_FIELDS.has(name)) {
      if (!isValidBase64(value)) return fail(`Invalid ${name}`);
      header[name] = value;
    } else {
      header[name] = value;
    }

    rest = rest.trimStart();
    if (rest) {
      if (!rest.startsWith(",")) return fail("Expected comma");
      rest = rest.slice(1);
    }
  }

  return { ok: true, value: header };
}

/**
 * Renders a header as `Hawk id="...", ts="...", ...`. Throws the parser's own
 * error for any value `parseHawkHeader` would reject.
 */
export function formatHawkHeader(header: HawkHeader): string {
  const parts: string[] = [];

  for (const field of HAWK_FIELDS) {
    const raw = header[field];
    if (raw === undefined) continue;

    const value = String(raw);
    if (!isValidAttributeValue(value)) {
      throw new HawkParseError(`Bad attribute value: ${field}`);
    }
    if (field === "ts" && !isValidTimestamp(value)) {
      throw new HawkParseError("Invalid timestamp");
    }
    if (BASE64_FIELDS.has(field) && !isValidBase64(value)) {
      throw new HawkParseError(`Invalid ${field}`);
    }
    parts.push(`${field}="${value}"`);
  }

  return parts.length > 0 ? `Hawk ${parts.join(", ")}` : "Hawk ";
}
