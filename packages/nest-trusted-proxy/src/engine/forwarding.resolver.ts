import { firstHeaderMatch, firstPresentHeader, getHeader, HeaderMap } from '../http/headers';
import { TrustedProxyResolvedOptions } from '../module/options';
import { normalizeIpCandidate } from '../utils/ip';
import { extractForwardedAddress, ForwardedRecord, parseForwarded } from './forwarded.parser';
import { TrustSet, TrustVerdict } from './trust.set';

/** Options consulted by a single resolution pass. */
export type ForwardingConfig = Pick<
  TrustedProxyResolvedOptions,
  'ipHeaders' | 'schemeHeaders' | 'httpsValues' | 'parseRfc7239' | 'hideHeaders'
>;

/** The peer was not trusted (or not an IP); the request is left untouched. */
export interface PassthroughOutcome {
  kind: 'passthrough';
  verdict: Exclude<TrustVerdict, 'trusted'>;
}

/** The peer was trusted; only the assigned fields are set. */
export interface RewrittenOutcome {
  kind: 'rewritten';
  remoteAddress?: string;
  remoteProxyAddress?: string;
  scheme?: string;
  host?: string;
  /** Vendor header that supplied `remoteAddress`, if any. */
  matchedIpHeader?: string;
  /** First present vendor address header whose value was not an IP; it ends the scan. */
  ignoredIpHeader?: string;
  /** Vendor header that set `scheme` to `https`, if any. */
  matchedSchemeHeader?: string;
  /** Parsed `Forwarded` element; `null` when present but unparseable, absent when not consulted. */
  forwarded?: ForwardedRecord | null;
  /** Lower-cased header names the caller must remove; empty unless `hideHeaders` is on. */
  hideHeaders: string[];
}

export type ResolutionOutcome = PassthroughOutcome | RewrittenOutcome;

const FORWARDED_HEADER = 'forwarded';
const X_FORWARDED_FOR = 'x-forwarded-for';

/**
 * Decides how a request's client address, proxy address, scheme and host change.
 *
 * Order: trust gate, vendor address headers, vendor scheme headers, `Forwarded`
 * override, header suppression. Never throws on header content.
 */
export function resolveForwarding(
  headers: HeaderMap | undefined,
  peerAddress: string,
  config: ForwardingConfig,
  trust: TrustSet,
): ResolutionOutcome {
  const verdict = trust.check(peerAddress);
  if (verdict !== 'trusted') {
    return { kind: 'passthrough', verdict };
  }

  const outcome: RewrittenOutcome = { kind: 'rewritten', hideHeaders: [] };

  const ipHeader = firstPresentHeader(headers, config.ipHeaders);
  if (ipHeader) {
    const address = extractClientAddress(ipHeader.value, ipHeader.name);
    if (address) {
      outcome.remoteAddress = address;
      outcome.remoteProxyAddress = peerAddress;
      outcome.matchedIpHeader = ipHeader.name;
    } else {
      outcome.ignoredIpHeader = ipHeader.name;
    }
  }

  const schemeMatch = firstHeaderMatch(headers, config.schemeHeaders, (value) =>
    config.httpsValues.includes(value.trim().toLowerCase()) ? 'https' : undefined,
  );
  if (schemeMatch) {
    outcome.scheme = schemeMatch.value;
    outcome.matchedSchemeHeader = schemeMatch.name;
  }

  if (config.parseRfc7239) {
    const raw = getHeader(headers, FORWARDED_HEADER);
    if (raw && raw.trim()) {
      const forwarded = parseForwarded(raw);
      outcome.forwarded = forwarded;
      if (forwarded) {
        applyForwarded(outcome, forwarded, peerAddress);
      }
    }
  }

  if (config.hideHeaders) {
    const names = new Set<string>();
    for (const name of [...config.ipHeaders, ...config.schemeHeaders, FORWARDED_HEADER]) {
      names.add(name.toLowerCase());
    }
    outcome.hideHeaders = Array.from(names);
  }

  return outcome;
}

function extractClientAddress(value: string, name: string): string | undefined {
  if (name.toLowerCase() === X_FORWARDED_FOR) {
    const [first] = value.split(/\s*,\s*/);
    return normalizeIpCandidate(first);
  }
  return normalizeIpCandidate(value);
}

function applyForwarded(outcome: RewrittenOutcome, forwarded: ForwardedRecord, peerAddress: string): void {
  const forAddress = extractForwardedAddress(forwarded.for);
  const byAddress = extractForwardedAddress(forwarded.by);

  if (forAddress) {
    outcome.remoteAddress = forAddress;
  }

  if (byAddress) {
    outcome.remoteProxyAddress = byAddress;
  } else if (forAddress && outcome.remoteProxyAddress === undefined) {
    outcome.remoteProxyAddress = peerAddress;
  }

  if (forwarded.proto) {
    outcome.scheme = forwarded.proto;
  }
  if (forwarded.host) {
    outcome.host = forwarded.host;
  }
}
