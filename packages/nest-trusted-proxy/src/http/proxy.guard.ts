import { CanActivate, ExecutionContext, ForbiddenException, Injectable, Optional } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { TRUSTED_SOURCE_ONLY_KEY } from '../module/decorators';
import { TrustedProxyRuntime } from '../module/runtime';
import { getTrustedProxyRuntime } from '../module/runtime.registry';
import { RequestLike } from './headers';

@Injectable()
/** Rejects requests to `@TrustedSourceOnly()` routes unless the transport peer is a trusted source. */
export class TrustedSourceGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    @Optional() private readonly runtime?: TrustedProxyRuntime,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    if (context.getType() !== 'http') {
      return true;
    }

    const required =
      this.reflector.getAllAndOverride<boolean | undefined>(TRUSTED_SOURCE_ONLY_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? false;
    if (!required) {
      return true;
    }

    const runtime = this.runtime ?? getTrustedProxyRuntime();
    if (!runtime) {
      throw new ForbiddenException('Trusted source required');
    }

    const req = context.switchToHttp().getRequest<RequestLike>();
    if (runtime.isTrustedSource(req) !== true) {
      throw new ForbiddenException('Trusted source required');
    }
    return true;
  }
}
