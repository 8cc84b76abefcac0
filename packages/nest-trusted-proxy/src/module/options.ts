import { LoggerPort } from '../utils/logger.interface';
import { TrustedProxyConfigError } from './errors';

/** Header presets for common CDN and cloud load balancers. */
export type TrustedProxyPreset = 'cloudflare' | 'akamai' | 'aws';

/** Top-level module configuration. Every multi-valued option is an array. */
export interface TrustedProxyModuleOptions {
  /** Resolve every request through the middleware. Defaults to `true`. */
  enabled?: boolean;
  /** Headers carrying the client address, first match wins. `[]` disables address rewriting. */
  ipHeaders?: string[];
  /** Headers carrying the client scheme, first match wins. `[]` disables scheme rewriting. */
  schemeHeaders?: string[];
  /** Case-insensitive values of a scheme header that mean `https`. */
  httpsValues?: string[];
  /** Let a `Forwarded` header override vendor headers. Defaults to `true`. */
  parseRfc7239?: boolean;
  /** Alias of `parseRfc7239`. */
  parseForwarded?: boolean;
  /**
   * Addresses, CIDR blocks and ranges of trusted upstream proxies.
   * An empty list trusts nothing.
   */
  trustedSources?: string[];
  /** Remove the configured headers and `Forwarded` once a trusted peer is resolved. */
  hideHeaders?: boolean;
  /** Provider header defaults; explicit `ipHeaders`/`schemeHeaders` win. */
  preset?: TrustedProxyPreset;
  /** Emit debug logs for every resolution step. Defaults to `false`. */
  logging?: boolean;
  logger?: LoggerPort;
}

/** Normalized, frozen options used by the runtime and resolver. */
export interface TrustedProxyResolvedOptions {
  readonly enabled: boolean;
  readonly ipHeaders: readonly string[];
  readonly schemeHeaders: readonly string[];
  readonly httpsValues: readonly string[];
  readonly parseRfc7239: boolean;
  readonly trustedSources: readonly string[];
  readonly hideHeaders: boolean;
  readonly preset?: TrustedProxyPreset;
  readonly logging: boolean;
  readonly logger?: LoggerPort;
}

/** Default client address headers. */
export const DEFAULT_IP_HEADERS: readonly string[] = ['x-real-ip', 'x-forwarded-for'];
/** Default client scheme headers. */
export const DEFAULT_SCHEME_HEADERS: readonly string[] = ['x-ssl', 'x-forwarded-proto'];
/** Default values treated as `https` in scheme headers. */
export const DEFAULT_HTTPS_VALUES: readonly string[] = ['1', 'true', 'https', 'on', 'enable', 'enabled'];
/** Default trusted sources: loopback and the 10/8 private block. */
export const DEFAULT_TRUSTED_SOURCES: readonly string[] = ['127.0.0.0/8', '10.0.0.0/8'];

/** Header defaults per provider. Trusted ranges change too often to ship here. */
export const TRUSTED_PROXY_PRESETS: Readonly<
  Record<TrustedProxyPreset, { ipHeaders: readonly string[]; schemeHeaders: readonly string[] }>
> = {
  cloudflare: { ipHeaders: ['cf-connecting-ip', 'x-forwarded-for'], schemeHeaders: ['x-forwarded-proto'] },
  akamai: { ipHeaders: ['true-client-ip', 'x-forwarded-for'], schemeHeaders: ['x-forwarded-proto'] },
  aws: { ipHeaders: ['x-forwarded-for'], schemeHeaders: ['x-forwarded-proto'] },
};

const HEADER_NAME_PATTERN = /^[!#$%&'*+.^_`|~0-9a-z-]+$/;

/** Validates and normalizes user config into runtime-ready options. */
export function resolveTrustedProxyOptions(input: TrustedProxyModuleOptions = {}): TrustedProxyResolvedOptions {
  const preset = resolvePreset(input.preset);
  const presetHeaders = preset ? TRUSTED_PROXY_PRESETS[preset] : undefined;

  const ipHeaders =
    normalizeHeaderList(input.ipHeaders, 'ipHeaders') ?? presetHeaders?.ipHeaders ?? DEFAULT_IP_HEADERS;
  const schemeHeaders =
    normalizeHeaderList(input.schemeHeaders, 'schemeHeaders') ??
    presetHeaders?.schemeHeaders ??
    DEFAULT_SCHEME_HEADERS;
  const httpsValues =
    normalizeStringList(input.httpsValues, 'httpsValues')?.map((value) => value.toLowerCase()) ??
    DEFAULT_HTTPS_VALUES;
  const trustedSources = normalizeStringList(input.trustedSources, 'trustedSources') ?? DEFAULT_TRUSTED_SOURCES;

  const parseForwarded = resolveBoolean(input.parseForwarded, 'parseForwarded', true);
  const logger = input.logger;
  if (logger !== undefined && !isLoggerPort(logger)) {
    throw new TrustedProxyConfigError('logger must implement debug, info, warn and error');
  }

  return Object.freeze({
    enabled: resolveBoolean(input.enabled, 'enabled', true),
    ipHeaders: Object.freeze(Array.from(new Set(ipHeaders))),
    schemeHeaders: Object.freeze(Array.from(new Set(schemeHeaders))),
    httpsValues: Object.freeze(Array.from(new Set(httpsValues))),
    parseRfc7239: resolveBoolean(input.parseRfc7239, 'parseRfc7239', parseForwarded),
    trustedSources: Object.freeze([...trustedSources]),
    hideHeaders: resolveBoolean(input.hideHeaders, 'hideHeaders', false),
    preset,
    logging: resolveBoolean(input.logging, 'logging', false),
    logger,
  });
}

function resolvePreset(value: unknown): TrustedProxyPreset | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === 'cloudflare' || value === 'akamai' || value === 'aws') {
    return value;
  }
  throw new TrustedProxyConfigError(`preset must be one of ${Object.keys(TRUSTED_PROXY_PRESETS).join(', ')}`);
}

function resolveBoolean(value: unknown, option: string, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new TrustedProxyConfigError(`${option} must be a boolean`);
  }
  return value;
}

function normalizeStringList(value: unknown, option: string): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new TrustedProxyConfigError(`${option} must be an array of strings`);
  }

  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new TrustedProxyConfigError(`${option} must be an array of strings`);
    }
    const trimmed = item.trim();
    if (trimmed) {
      out.push(trimmed);
    }
  }
  return out;
}

function normalizeHeaderList(value: unknown, option: string): string[] | undefined {
  const headers = normalizeStringList(value, option);
  if (!headers) {
    return undefined;
  }

  return headers.map((header) => {
    const normalized = header.toLowerCase();
    if (!HEADER_NAME_PATTERN.test(normalized)) {
      throw new TrustedProxyConfigError(`${option} entry "${header}" is not a valid header name`);
    }
    return normalized;
  });
}

function isLoggerPort(value: unknown): value is LoggerPort {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (['debug', 'info', 'warn', 'error'] as const).every(
    (method) => typeof Reflect.get(value, method) === 'function',
  );
}
