import { resolveForwarding, ResolutionOutcome, RewrittenOutcome } from '../engine/forwarding.resolver';
import { TrustSet, TrustVerdict } from '../engine/trust.set';
import {
  applyResolution,
  createRequestAddressState,
  extractPeerAddress,
  getRequestAddressState,
  RequestAddressState,
  setRequestAddressState,
} from '../http/context';
import { removeHeaders, RequestLike } from '../http/headers';
import { TrustedProxyLogger } from '../utils/logger';
import { LoggerPort } from '../utils/logger.interface';
import { resolveTrustedProxyOptions, TrustedProxyModuleOptions, TrustedProxyResolvedOptions } from './options';

/** Holds the resolved options and trusted source set, and rewrites requests against them. */
export class TrustedProxyRuntime {
  private readonly logger: LoggerPort;
  private readonly options: TrustedProxyResolvedOptions;
  private readonly trustSet: TrustSet;

  /** Resolves options and builds the trusted source set; throws `TrustedProxyConfigError` on bad input. */
  constructor(input: TrustedProxyModuleOptions = {}) {
    this.options = resolveTrustedProxyOptions(input);
    this.logger = this.options.logger ?? new TrustedProxyLogger();
    this.trustSet = TrustSet.build(this.options.trustedSources);
    if (this.trustSet.size === 0) {
      this.logger.warn('trustedSources is empty; forwarded headers will never be honored');
    }
  }

  getOptions(): TrustedProxyResolvedOptions {
    return this.options;
  }

  getTrustSet(): TrustSet {
    return this.trustSet;
  }

  /**
   * Resolves the request once and stores the result on it. Later calls return the stored state.
   * Rewritten fields are also exposed as `req.ip`, `req.protocol`, `req.secure` and `req.hostname`.
   */
  resolve(req: RequestLike): RequestAddressState {
    const existing = getRequestAddressState(req);
    if (existing) {
      return existing;
    }

    const peerAddress = extractPeerAddress(req) ?? '';
    const outcome = resolveForwarding(req.headers, peerAddress, this.options, this.trustSet);
    const state = applyResolution(createRequestAddressState(req, peerAddress), outcome);
    this.logOutcome(peerAddress, outcome);

    if (outcome.kind === 'rewritten') {
      applyToRequest(req, outcome);
      if (outcome.hideHeaders.length > 0) {
        const removed = removeHeaders(req, outcome.hideHeaders);
        this.debug('Removed forwarding headers from request', { headers: removed });
      }
    }

    setRequestAddressState(req, state);
    return state;
  }

  /**
   * Returns whether `address` (or, by default, the request's transport peer) is a trusted source.
   * `undefined` means the address is missing or not a valid IP.
   */
  isTrustedSource(req: RequestLike, address?: string): boolean | undefined {
    const candidate = address ?? getRequestAddressState(req)?.peerAddress ?? extractPeerAddress(req);
    if (!candidate) {
      return undefined;
    }

    const verdict = this.checkAddress(candidate);
    if (verdict === 'invalid') {
      return undefined;
    }
    return verdict === 'trusted';
  }

  checkAddress(address: string): TrustVerdict {
    const verdict = this.trustSet.check(address);
    this.debug('Checked address against trusted sources', { address, verdict });
    return verdict;
  }

  private logOutcome(peerAddress: string, outcome: ResolutionOutcome): void {
    if (!this.options.logging) {
      return;
    }

    if (outcome.kind === 'passthrough') {
      const message =
        outcome.verdict === 'invalid'
          ? 'Peer address is not a valid IP; request left unchanged'
          : 'Peer not found in trusted sources; request left unchanged';
      this.debug(message, { peerAddress });
      return;
    }

    if (outcome.matchedIpHeader) {
      this.debug(`Matched on IP header "${outcome.matchedIpHeader}"`, {
        peerAddress,
        remoteAddress: outcome.remoteAddress,
      });
    }
    if (outcome.ignoredIpHeader) {
      this.debug(`Ignoring invalid address in IP header "${outcome.ignoredIpHeader}"`, { peerAddress });
    }
    if (outcome.matchedSchemeHeader) {
      this.debug(`Matched on HTTPS header "${outcome.matchedSchemeHeader}"`, { peerAddress });
    }
    if (outcome.forwarded === null) {
      this.debug('Ignoring unparseable Forwarded header', { peerAddress });
    } else if (outcome.forwarded) {
      this.debug('Applied Forwarded header', { peerAddress, forwarded: { ...outcome.forwarded } });
    }
  }

  private debug(message: string, meta?: Record<string, unknown>): void {
    if (this.options.logging) {
      this.logger.debug(message, meta);
    }
  }
}

function applyToRequest(req: RequestLike, outcome: RewrittenOutcome): void {
  if (outcome.remoteAddress !== undefined) {
    defineOwn(req, 'ip', outcome.remoteAddress);
  }
  if (outcome.scheme !== undefined) {
    defineOwn(req, 'protocol', outcome.scheme);
    defineOwn(req, 'secure', outcome.scheme.toLowerCase() === 'https');
  }
  if (outcome.host !== undefined) {
    defineOwn(req, 'hostname', stripPort(outcome.host));
  }
}

// Express and Fastify expose these as prototype getters; an own property shadows them.
function defineOwn(target: object, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, configurable: true, enumerable: true, writable: true });
}

function stripPort(host: string): string {
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end === -1 ? host : host.slice(0, end + 1);
  }
  const colon = host.indexOf(':');
  return colon === -1 ? host : host.slice(0, colon);
}
