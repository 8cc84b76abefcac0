/** Injection token for the raw `TrustedProxyModuleOptions` passed to `forRoot`. */
export const TRUSTED_PROXY_OPTIONS = Symbol.for('nest-trusted-proxy:options');
