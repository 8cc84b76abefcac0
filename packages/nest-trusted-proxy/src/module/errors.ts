/** Raised while resolving module options or building the trusted source set. */
export class TrustedProxyConfigError extends Error {
  constructor(message: string) {
    super(`[nest-trusted-proxy] ${message}`);
    this.name = 'TrustedProxyConfigError';
  }
}
