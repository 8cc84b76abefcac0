import 'reflect-metadata';

export { TrustSet, TrustVerdict } from './engine/trust.set';
export { ForwardedRecord, extractForwardedAddress, parseForwarded } from './engine/forwarded.parser';
export {
  ForwardingConfig,
  PassthroughOutcome,
  ResolutionOutcome,
  RewrittenOutcome,
  resolveForwarding,
} from './engine/forwarding.resolver';
export {
  RequestAddressState,
  applyResolution,
  createRequestAddressState,
  extractPeerAddress,
  getRequestAddressState,
} from './http/context';
export {
  HeaderMap,
  HeaderMatch,
  HeaderValue,
  RequestLike,
  firstHeaderMatch,
  firstPresentHeader,
  getHeader,
  removeHeaders,
} from './http/headers';
export { TrustedSourceGuard } from './http/proxy.guard';
export { createTrustedProxyMiddleware } from './http/proxy.middleware';
export { RequestAddress, TRUSTED_SOURCE_ONLY_KEY, TrustedSourceOnly } from './module/decorators';
export { TrustedProxyConfigError } from './module/errors';
export {
  DEFAULT_HTTPS_VALUES,
  DEFAULT_IP_HEADERS,
  DEFAULT_SCHEME_HEADERS,
  DEFAULT_TRUSTED_SOURCES,
  TRUSTED_PROXY_PRESETS,
  TrustedProxyModuleOptions,
  TrustedProxyPreset,
  TrustedProxyResolvedOptions,
  resolveTrustedProxyOptions,
} from './module/options';
export { TrustedProxyModule } from './module/proxy.module';
export { TRUSTED_PROXY_OPTIONS } from './module/proxy.tokens';
export { TrustedProxyRuntime } from './module/runtime';
export { getTrustedProxyRuntime } from './module/runtime.registry';
export { TrustedProxyLogger } from './utils/logger';
export { LoggerPort } from './utils/logger.interface';
