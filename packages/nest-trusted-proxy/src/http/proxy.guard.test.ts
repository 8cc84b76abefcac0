import { ForbiddenException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { TrustedSourceOnly } from '../module/decorators';
import { TrustedProxyRuntime } from '../module/runtime';
import { clearTrustedProxyRuntime, setTrustedProxyRuntime } from '../module/runtime.registry';
import { getRequestAddressState } from './context';
import { RequestLike } from './headers';
import { TrustedSourceGuard } from './proxy.guard';

@TrustedSourceOnly()
class InternalController {
  sync(): string {
    return 'ok';
  }
}

class PublicController {
  list(): string {
    return 'ok';
  }

  @TrustedSourceOnly()
  purge(): string {
    return 'ok';
  }
}

const logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };

function httpContext(
  req: RequestLike,
  controller: typeof InternalController | typeof PublicController,
  handler: (...args: never[]) => unknown,
): ExecutionContextHost {
  return new ExecutionContextHost([req, {}, jest.fn()], controller, handler);
}

function peer(address: string): RequestLike {
  return { headers: { 'x-forwarded-for': '203.0.113.5' }, socket: { remoteAddress: address } };
}

describe('TrustedSourceGuard', () => {
  const runtime = new TrustedProxyRuntime({ logger });
  const guard = new TrustedSourceGuard(new Reflector(), runtime);

  afterEach(() => {
    clearTrustedProxyRuntime();
  });

  it('lets trusted peers through marked controllers', () => {
    expect(guard.canActivate(httpContext(peer('10.0.0.5'), InternalController, InternalController.prototype.sync))).toBe(
      true,
    );
  });

  it('rejects untrusted peers on marked controllers', () => {
    expect(() =>
      guard.canActivate(httpContext(peer('8.8.8.8'), InternalController, InternalController.prototype.sync)),
    ).toThrow(ForbiddenException);
  });

  it('honors handler-level metadata', () => {
    expect(guard.canActivate(httpContext(peer('8.8.8.8'), PublicController, PublicController.prototype.list))).toBe(true);
    expect(() =>
      guard.canActivate(httpContext(peer('8.8.8.8'), PublicController, PublicController.prototype.purge)),
    ).toThrow(ForbiddenException);
  });

  it('judges the transport peer, not a forwarded client address', () => {
    const req: RequestLike = { headers: { 'x-forwarded-for': '10.0.0.9' }, socket: { remoteAddress: '8.8.8.8' } };

    expect(() => guard.canActivate(httpContext(req, InternalController, InternalController.prototype.sync))).toThrow(
      ForbiddenException,
    );
  });

  it('leaves the request untouched when automatic resolution is off', () => {
    const passiveRuntime = new TrustedProxyRuntime({ logger, enabled: false, hideHeaders: true });
    const passive = new TrustedSourceGuard(new Reflector(), passiveRuntime);
    const req = peer('10.0.0.5');

    expect(passive.canActivate(httpContext(req, InternalController, InternalController.prototype.sync))).toBe(true);
    expect(req.headers).toEqual({ 'x-forwarded-for': '203.0.113.5' });
    expect(getRequestAddressState(req)).toBeUndefined();
    expect('ip' in req).toBe(false);
  });

  it('uses the registered runtime when none is injected', () => {
    setTrustedProxyRuntime(runtime);
    const registryGuard = new TrustedSourceGuard(new Reflector());

    expect(
      registryGuard.canActivate(httpContext(peer('10.0.0.5'), InternalController, InternalController.prototype.sync)),
    ).toBe(true);
  });

  it('fails closed on marked routes without a runtime', () => {
    const orphan = new TrustedSourceGuard(new Reflector());

    expect(() =>
      orphan.canActivate(httpContext(peer('10.0.0.5'), InternalController, InternalController.prototype.sync)),
    ).toThrow(ForbiddenException);
  });

  it('ignores non-HTTP contexts', () => {
    const ctx = httpContext(peer('8.8.8.8'), InternalController, InternalController.prototype.sync);
    ctx.setType('rpc');

    expect(guard.canActivate(ctx)).toBe(true);
  });
});
