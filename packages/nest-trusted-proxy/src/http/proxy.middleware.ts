import { TrustedProxyRuntime } from '../module/runtime';
import { getTrustedProxyRuntime } from '../module/runtime.registry';
import { RequestLike } from './headers';

/**
 * Creates HTTP middleware that rewrites the client address, scheme and host of requests
 * arriving from trusted proxies. Does nothing when no runtime is available or `enabled` is off.
 */
export function createTrustedProxyMiddleware(runtime?: TrustedProxyRuntime) {
  return (req: RequestLike, _res: unknown, next: (err?: unknown) => void): void => {
    const active = runtime ?? getTrustedProxyRuntime();
    if (!active || !active.getOptions().enabled) {
      next();
      return;
    }

    try {
      active.resolve(req);
    } catch (error) {
      next(error);
      return;
    }
    next();
  };
}
