import { createParamDecorator, ExecutionContext, SetMetadata } from '@nestjs/common';
import { getRequestAddressState, RequestAddressState } from '../http/context';
import { RequestLike } from '../http/headers';
import { getTrustedProxyRuntime } from './runtime.registry';

/** Metadata key used by `@TrustedSourceOnly()`. */
export const TRUSTED_SOURCE_ONLY_KEY = 'trusted-proxy:trusted-source-only';

/** Restricts a route/controller to requests arriving from a trusted source (enforced by `TrustedSourceGuard`). */
export function TrustedSourceOnly(): MethodDecorator & ClassDecorator {
  return SetMetadata(TRUSTED_SOURCE_ONLY_KEY, true);
}

/** Reads (or resolves on demand) the request's address state. */
export function requestAddressFactory(_data: unknown, context: ExecutionContext): RequestAddressState | undefined {
  const req = context.switchToHttp().getRequest<RequestLike>();
  const runtime = getTrustedProxyRuntime();
  if (runtime) {
    return runtime.resolve(req);
  }
  return getRequestAddressState(req);
}

/** Injects the `RequestAddressState` of the current request into a handler parameter. */
export const RequestAddress = createParamDecorator(requestAddressFactory);
