import { ResolutionOutcome } from '../engine/forwarding.resolver';
import { TrustVerdict } from '../engine/trust.set';
import { getHeader, RequestLike } from './headers';

/** Per-request address view after resolution. */
export interface RequestAddressState {
  /** Transport-level peer the request arrived from. */
  peerAddress: string;
  /** Trust verdict for `peerAddress`. */
  verdict: TrustVerdict;
  /** Client address as understood after resolution. */
  remoteAddress: string;
  /** Proxy address recorded when the client address was overridden. */
  remoteProxyAddress?: string;
  /** `http`, `https`, or the token supplied by `Forwarded: proto=`. */
  scheme: string;
  host?: string;
}

const states = new WeakMap<object, RequestAddressState>();

export function setRequestAddressState(req: object, state: RequestAddressState): void {
  states.set(req, state);
}

export function getRequestAddressState(req: object): RequestAddressState | undefined {
  return states.get(req);
}

/** Transport peer address from the socket, ignoring any framework-level `req.ip`. */
export function extractPeerAddress(req: RequestLike): string | undefined {
  const candidates = [req.socket?.remoteAddress, req.connection?.remoteAddress];
  for (const candidate of candidates) {
    if (candidate && candidate.trim()) {
      return candidate.trim();
    }
  }
  return undefined;
}

/** Builds the pre-resolution state from the transport connection and `Host` header. */
export function createRequestAddressState(req: RequestLike, peerAddress: string): RequestAddressState {
  const encrypted = req.socket?.encrypted === true || req.connection?.encrypted === true;
  return {
    peerAddress,
    verdict: 'invalid',
    remoteAddress: peerAddress,
    scheme: encrypted ? 'https' : 'http',
    host: getHeader(req.headers, 'host'),
  };
}

/** Returns a new state with the outcome's assigned fields applied; unassigned fields are kept. */
export function applyResolution(state: RequestAddressState, outcome: ResolutionOutcome): RequestAddressState {
  if (outcome.kind === 'passthrough') {
    return { ...state, verdict: outcome.verdict };
  }

  return {
    ...state,
    verdict: 'trusted',
    remoteAddress: outcome.remoteAddress ?? state.remoteAddress,
    remoteProxyAddress: outcome.remoteProxyAddress ?? state.remoteProxyAddress,
    scheme: outcome.scheme ?? state.scheme,
    host: outcome.host ?? state.host,
  };
}
