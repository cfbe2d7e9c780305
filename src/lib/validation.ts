// Printable ASCII except double quote and backslash
const ATTRIBUTE_VALUE_REGEX = /^[\x20\x21\x23-\x5b\x5d-\x7e]*$/;
const TIMESTAMP_REGEX = /^[0-9]+$/;
const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function isValidAttributeValue(value: string): boolean {
  return ATTRIBUTE_VALUE_REGEX.test(value);
}

export function isValidTimestamp(value: string): boolean {
  return TIMESTAMP_REGEX.test(value) && Number.isSafeInteger(Number(value));
}

export function isValidBase64(value: string): boolean {
  return BASE64_REGEX.test(value);
}

/**
 * ASCII-only case-insensitive comparison. Non-ASCII characters must match
 * exactly.
 */
export function equalsIgnoreAsciiCase(a: string, b: string): boolean {
  if (a.length !== b.length) return false;

  for (let i = 0; i < a.length; i++) {
    if (toAsciiLower(a.charCodeAt(i)) !== toAsciiLower(b.charCodeAt(i))) {
      return false;
    }
  }
  return true;
}

function toAsciiLower(code: number): number {
  return code >= 0x41 && code <= 0x5a ? code + 0x20 : code;
}
