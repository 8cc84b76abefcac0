import { BlockList } from 'node:net';
import { TrustedProxyConfigError } from '../module/errors';
import { IpFamily, ipFamily, stripZoneId, toIpv4IfMapped } from '../utils/ip';

/** Outcome of a trust query; `invalid` means the input was not an IP literal. */
export type TrustVerdict = 'trusted' | 'untrusted' | 'invalid';

/**
 * Immutable set of trusted upstream sources.
 *
 * Accepts single addresses (`10.1.2.3`), CIDR blocks (`10.0.0.0/8`, `fd00::/8`) and
 * ranges (`192.0.2.10-192.0.2.20`). An empty set trusts nothing.
 */
export class TrustSet {
  private constructor(
    private readonly blockList: BlockList,
    /** Normalized source entries, de-duplicated. */
    readonly sources: readonly string[],
  ) {}

  /** Builds a set from source entries; throws `TrustedProxyConfigError` on the first unparseable entry. */
  static build(sources: readonly string[]): TrustSet {
    const blockList = new BlockList();
    const normalized = new Set<string>();

    for (const source of sources) {
      normalized.add(addSource(blockList, source));
    }

    return new TrustSet(blockList, Object.freeze(Array.from(normalized)));
  }

  get size(): number {
    return this.sources.length;
  }

  check(address: string): TrustVerdict {
    const candidate = toIpv4IfMapped(stripZoneId(address.trim()));
    const family = ipFamily(candidate);
    if (!family) {
      return 'invalid';
    }

    if (this.sources.length === 0) {
      return 'untrusted';
    }

    return this.blockList.check(candidate, family) ? 'trusted' : 'untrusted';
  }

  /** Membership test; invalid input counts as not trusted. */
  contains(address: string): boolean {
    return this.check(address) === 'trusted';
  }
}

function addSource(blockList: BlockList, raw: string): string {
  if (typeof raw !== 'string' || !raw.trim()) {
    throw new TrustedProxyConfigError(`trustedSources contains an empty entry`);
  }

  const entry = raw.trim();
  if (entry.includes('/')) {
    return addSubnet(blockList, entry);
  }
  if (entry.includes('-')) {
    return addRange(blockList, entry);
  }

  const address = parseAddress(entry);
  if (!address) {
    throw new TrustedProxyConfigError(`trustedSources entry "${entry}" is not a valid IP address, CIDR or range`);
  }
  blockList.addAddress(address.ip, address.family);
  return address.ip;
}

function addSubnet(blockList: BlockList, entry: string): string {
  const slash = entry.lastIndexOf('/');
  const base = parseAddress(entry.slice(0, slash).trim(), false);
  const prefixPart = entry.slice(slash + 1).trim();
  if (!base || !/^\d{1,3}$/.test(prefixPart)) {
    throw new TrustedProxyConfigError(`trustedSources entry "${entry}" is not a valid CIDR block`);
  }

  let ip = base.ip;
  let family = base.family;
  let prefix = Number(prefixPart);
  if (prefix > (family === 'ipv6' ? 128 : 32)) {
    throw new TrustedProxyConfigError(`trustedSources entry "${entry}" has an out-of-range prefix length`);
  }

  // ::ffff:0:0/96 and narrower blocks describe IPv4 space
  const mapped = toIpv4IfMapped(ip);
  if (family === 'ipv6' && mapped !== ip && prefix >= 96) {
    ip = mapped;
    family = 'ipv4';
    prefix -= 96;
  }

  blockList.addSubnet(ip, prefix, family);
  return `${ip}/${prefix}`;
}

function addRange(blockList: BlockList, entry: string): string {
  const parts = entry.split('-');
  const start = parts.length === 2 ? parseAddress(parts[0].trim()) : undefined;
  const end = parts.length === 2 ? parseAddress(parts[1].trim()) : undefined;
  if (!start || !end || start.family !== end.family) {
    throw new TrustedProxyConfigError(`trustedSources entry "${entry}" is not a valid address range`);
  }

  try {
    blockList.addRange(start.ip, end.ip, start.family);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TrustedProxyConfigError(`trustedSources entry "${entry}" is not a valid address range: ${reason}`);
  }
  return `${start.ip}-${end.ip}`;
}

function parseAddress(value: string, foldMapped = true): { ip: string; family: IpFamily } | undefined {
  const ip = foldMapped ? toIpv4IfMapped(value) : value;
  const family = ipFamily(ip);
  return family ? { ip, family } : undefined;
}
