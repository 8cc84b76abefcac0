import { normalizeIpCandidate } from '../utils/ip';

/** Parameters recognized in an RFC 7239 `Forwarded` element. */
export interface ForwardedRecord {
  for?: string;
  by?: string;
  proto?: string;
  host?: string;
}

type ForwardedKey = keyof ForwardedRecord;

const FORWARDED_KEYS: ReadonlySet<string> = new Set<ForwardedKey>(['for', 'by', 'proto', 'host']);
const TOKEN_PATTERN = /^[!#$%&'*+.^_`|~0-9a-z-]+$/i;

/**
 * Parses the first element (the nearest hop) of a `Forwarded` header value.
 *
 * Later elements are ignored, as are parameters other than `for`, `by`, `proto` and `host`.
 * Quoted-string escapes are not interpreted. Returns `null` when the element is malformed
 * (a pair without `=`, an empty key or value, a repeated parameter) or carries none of the
 * recognized parameters.
 */
export function parseForwarded(value: string): ForwardedRecord | null {
  const element = value.split(',')[0] ?? '';
  const record: ForwardedRecord = {};
  let recognized = 0;

  for (const segment of element.split(';')) {
    const pair = segment.trim();
    if (!pair) {
      continue;
    }

    const separator = pair.indexOf('=');
    if (separator <= 0) {
      return null;
    }

    const key = pair.slice(0, separator).trim().toLowerCase();
    const paramValue = unquote(pair.slice(separator + 1).trim());
    if (!TOKEN_PATTERN.test(key) || !paramValue) {
      return null;
    }

    if (!isForwardedKey(key)) {
      continue;
    }
    if (record[key] !== undefined) {
      return null;
    }

    record[key] = paramValue;
    recognized += 1;
  }

  return recognized > 0 ? record : null;
}

/**
 * Extracts an IP from a `for`/`by` node (`192.0.2.60`, `"[2001:db8::17]:4711"`).
 * Obfuscated identifiers and `unknown` yield `undefined`.
 */
export function extractForwardedAddress(node: string | undefined): string | undefined {
  return normalizeIpCandidate(node);
}

function isForwardedKey(key: string): key is ForwardedKey {
  return FORWARDED_KEYS.has(key);
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).trim();
  }
  return value;
}
