import { RequestLike } from '../http/headers';
import { LoggerPort } from '../utils/logger.interface';
import { TrustedProxyConfigError } from './errors';
import { TrustedProxyModuleOptions } from './options';
import { TrustedProxyRuntime } from './runtime';

type TestRequest = RequestLike & { ip?: string; protocol?: string; secure?: boolean; hostname?: string };

function silentLogger(): jest.Mocked<LoggerPort> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function runtime(options: TrustedProxyModuleOptions = {}): TrustedProxyRuntime {
  return new TrustedProxyRuntime({ logger: silentLogger(), ...options });
}

function request(peer: string | undefined, headers: Record<string, string> = {}): TestRequest {
  const rawHeaders = Object.entries(headers).flat();
  return { headers: { ...headers }, rawHeaders, socket: { remoteAddress: peer } };
}

describe('TrustedProxyRuntime', () => {
  describe('resolve', () => {
    it('leaves requests from untrusted peers unchanged', () => {
      const req = request('8.8.8.8', { 'x-forwarded-for': '1.2.3.4' });

      const state = runtime({ hideHeaders: true }).resolve(req);

      expect(state).toEqual({ peerAddress: '8.8.8.8', verdict: 'untrusted', remoteAddress: '8.8.8.8', scheme: 'http' });
      expect(req.ip).toBeUndefined();
      expect(req.headers).toEqual({ 'x-forwarded-for': '1.2.3.4' });
    });

    it('rewrites the client address from a trusted proxy', () => {
      const req = request('127.0.0.1', { 'x-forwarded-for': '203.0.113.5, 10.0.0.2', host: 'example.com' });

      const state = runtime().resolve(req);

      expect(state).toEqual({
        peerAddress: '127.0.0.1',
        verdict: 'trusted',
        remoteAddress: '203.0.113.5',
        remoteProxyAddress: '127.0.0.1',
        scheme: 'http',
        host: 'example.com',
      });
      expect(req.ip).toBe('203.0.113.5');
      expect(req.protocol).toBeUndefined();
    });

    it('exposes scheme and host overrides on the request', () => {
      const req = request('10.0.0.5', { forwarded: 'for=203.0.113.7;proto=https;host="app.example.com:8443"' });

      const state = runtime().resolve(req);

      expect(state.scheme).toBe('https');
      expect(state.host).toBe('app.example.com:8443');
      expect(req.protocol).toBe('https');
      expect(req.secure).toBe(true);
      expect(req.hostname).toBe('app.example.com');
    });

    it('marks the request secure for an upper-case Forwarded proto', () => {
      const req = request('10.0.0.5', { forwarded: 'proto=HTTPS' });

      const state = runtime().resolve(req);

      expect(state.scheme).toBe('HTTPS');
      expect(req.protocol).toBe('HTTPS');
      expect(req.secure).toBe(true);
    });

    it('does not fall back to later IP headers when the first one is invalid', () => {
      const logger = silentLogger();
      const req = request('10.0.0.5', { 'x-real-ip': 'unknown', 'x-forwarded-for': '198.51.100.7' });

      const state = new TrustedProxyRuntime({ logger, logging: true }).resolve(req);

      expect(state.remoteAddress).toBe('10.0.0.5');
      expect(req.ip).toBeUndefined();
      expect(logger.debug).toHaveBeenCalledWith('Ignoring invalid address in IP header "x-real-ip"', {
        peerAddress: '10.0.0.5',
      });
    });

    it('hides forwarding headers when configured', () => {
      const req = request('127.0.0.1', {
        'x-forwarded-for': '203.0.113.5',
        'x-forwarded-proto': 'https',
        forwarded: 'for=203.0.113.7',
        'user-agent': 'test-agent',
      });

      runtime({ hideHeaders: true }).resolve(req);

      expect(req.headers).toEqual({ 'user-agent': 'test-agent' });
      expect(req.rawHeaders).toEqual(['user-agent', 'test-agent']);
    });

    it('keeps forwarding headers by default', () => {
      const headers = { 'x-forwarded-for': '203.0.113.5', 'x-forwarded-proto': 'https', forwarded: 'for=203.0.113.7' };
      const req = request('127.0.0.1', headers);

      runtime().resolve(req);

      expect(req.headers).toEqual(headers);
    });

    it('resolves each request once', () => {
      const req = request('127.0.0.1', { 'x-real-ip': '203.0.113.5' });
      const instance = runtime();

      const first = instance.resolve(req);
      if (req.headers) {
        req.headers['x-real-ip'] = '198.51.100.1';
      }

      expect(instance.resolve(req)).toBe(first);
      expect(req.ip).toBe('203.0.113.5');
    });

    it('treats requests without a transport address as invalid peers', () => {
      const req = request(undefined, { 'x-real-ip': '203.0.113.5' });

      const state = runtime().resolve(req);

      expect(state.verdict).toBe('invalid');
      expect(state.remoteAddress).toBe('');
      expect(req.ip).toBeUndefined();
    });

    it('logs resolution steps when logging is on', () => {
      const logger = silentLogger();
      const req = request('127.0.0.1', { 'x-forwarded-for': '203.0.113.5', forwarded: 'for=;;;' });

      new TrustedProxyRuntime({ logger, logging: true }).resolve(req);

      expect(logger.debug).toHaveBeenCalledWith('Matched on IP header "x-forwarded-for"', {
        peerAddress: '127.0.0.1',
        remoteAddress: '203.0.113.5',
      });
      expect(logger.debug).toHaveBeenCalledWith('Ignoring unparseable Forwarded header', { peerAddress: '127.0.0.1' });
    });

    it('stays quiet when logging is off', () => {
      const logger = silentLogger();

      new TrustedProxyRuntime({ logger }).resolve(request('8.8.8.8'));

      expect(logger.debug).not.toHaveBeenCalled();
    });
  });

  describe('isTrustedSource', () => {
    it('checks the transport peer by default', () => {
      const instance = runtime();

      expect(instance.isTrustedSource(request('127.0.0.1'))).toBe(true);
      expect(instance.isTrustedSource(request('8.8.8.8'))).toBe(false);
    });

    it('checks the peer rather than the rewritten client address', () => {
      const instance = runtime();
      const req = request('10.0.0.5', { 'x-forwarded-for': '203.0.113.5' });
      instance.resolve(req);

      expect(instance.isTrustedSource(req)).toBe(true);
    });

    it('checks an explicit address', () => {
      const instance = runtime();

      expect(instance.isTrustedSource(request('127.0.0.1'), '1.1.1.1')).toBe(false);
      expect(instance.isTrustedSource(request('8.8.8.8'), '10.1.1.1')).toBe(true);
    });

    it('returns undefined for invalid or missing addresses', () => {
      const instance = runtime();

      expect(instance.isTrustedSource(request('127.0.0.1'), 'bogus')).toBeUndefined();
      expect(instance.isTrustedSource(request(undefined))).toBeUndefined();
    });
  });

  describe('construction', () => {
    it('fails fast on malformed trusted sources', () => {
      expect(() => runtime({ trustedSources: ['10.0.0.0/8', 'bogus'] })).toThrow(TrustedProxyConfigError);
    });

    it('warns when nothing is trusted', () => {
      const logger = silentLogger();

      const instance = new TrustedProxyRuntime({ logger, trustedSources: [] });

      expect(logger.warn).toHaveBeenCalledWith('trustedSources is empty; forwarded headers will never be honored');
      expect(instance.checkAddress('127.0.0.1')).toBe('untrusted');
    });
  });
});
