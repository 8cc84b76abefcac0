import { isIP } from 'node:net';

/** Address family names accepted by `net.BlockList`. */
export type IpFamily = 'ipv4' | 'ipv6';

const IPV4_MAPPED_PATTERN = /^(?:::|(?:0{1,4}:){5})ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/** Returns `true` when the value is a syntactically valid IPv4 or IPv6 literal. */
export function isIpAddress(value: string): boolean {
  return isIP(value) !== 0;
}

/** Returns the `BlockList` family of a valid IP literal, or `undefined`. */
export function ipFamily(value: string): IpFamily | undefined {
  const family = isIP(value);
  if (family === 4) {
    return 'ipv4';
  }
  if (family === 6) {
    return 'ipv6';
  }
  return undefined;
}

/** Converts `::ffff:a.b.c.d` (and its expanded form) to plain `a.b.c.d`; other values are returned as-is. */
export function toIpv4IfMapped(ip: string): string {
  const match = ip.match(IPV4_MAPPED_PATTERN);
  if (match && isIP(match[1]) === 4) {
    return match[1];
  }
  return ip;
}

/** Drops an IPv6 zone index (`fe80::1%eth0`). */
export function stripZoneId(ip: string): string {
  const index = ip.indexOf('%');
  return index === -1 ? ip : ip.slice(0, index);
}

/**
 * Normalizes an address found in a proxy header: trims, removes surrounding quotes,
 * IPv6 brackets and a port suffix. Returns `undefined` unless the result is a valid IP.
 */
export function normalizeIpCandidate(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }

  let candidate = value.trim();
  if (!candidate) {
    return undefined;
  }

  if (candidate.length >= 2 && candidate.startsWith('"') && candidate.endsWith('"')) {
    candidate = candidate.slice(1, -1).trim();
  }

  if (!candidate || candidate.toLowerCase() === 'unknown' || candidate.startsWith('_')) {
    return undefined;
  }

  if (candidate.startsWith('[')) {
    const bracketEnd = candidate.indexOf(']');
    if (bracketEnd <= 1) {
      return undefined;
    }
    const rest = candidate.slice(bracketEnd + 1);
    if (rest && !/^:\d+$/.test(rest)) {
      return undefined;
    }
    candidate = candidate.slice(1, bracketEnd);
  } else if (candidate.includes(':') && isIP(candidate) !== 6) {
    const maybePort = candidate.match(/^(.+):(\d+)$/);
    if (maybePort && isIP(maybePort[1]) === 4) {
      candidate = maybePort[1];
    }
  }

  if (isIP(candidate) === 0) {
    return undefined;
  }

  return candidate;
}
