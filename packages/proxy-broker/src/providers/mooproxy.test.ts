import { describe, it, expect } from 'vitest';
import type { ProviderConfig } from '../config/types.js';
import { ConfigurationError, ProviderGenerationError } from '../errors.js';
import { extractRegion, extractSessionId, MooProxyProvider } from './mooproxy.js';

function mooConfig(options: Record<string, string>): ProviderConfig {
  return {
    name: 'moo',
    type: 'mooproxy',
    pricePerGb: 3,
    concurrencyLimit: null,
    options,
  };
}

const DYNAMIC_OPTIONS = {
  host: 'gw.mooproxy.example',
  port: '55688',
  username: 'specu1',
  password: 'test-secret',
};

describe('MooProxyProvider in static mode', () => {
  const entries = [
    'us.mooproxy.net:55688:specu1:secret_country-US_session-ABC',
    'gb.mooproxy.net:55689:specu1:secret_country-GB_session-XYZ',
  ].join(',');

  it('cycles through pre-generated sessions', () => {
    const provider = new MooProxyProvider(mooConfig({ entries }));

    const first = provider.acquire();
    const second = provider.acquire();

    expect(provider.modeKind).toBe('static');
    expect(first).toEqual({
      scheme: 'http',
      host: 'us.mooproxy.net',
      port: 55688,
      username: 'specu1',
      password: 'secret_country-US_session-ABC',
      provider: 'moo',
      session: 'ABC',
      proxyType: 'residential',
      ipVersion: 'ipv4',
      rotationType: 'sticky',
      region: 'US',
      metadata: { kind: 'mooproxy', mode: 'static' },
    });
    expect(second.session).toBe('XYZ');
    expect(second.region).toBe('GB');
    expect(provider.acquire()).toBe(first);
  });

  it('applies the scheme option to every entry', () => {
    const provider = new MooProxyProvider(mooConfig({ entries, scheme: 'socks5' }));

    expect(provider.acquire().scheme).toBe('socks5');
    expect(provider.acquire().scheme).toBe('socks5');
  });

  it('rejects malformed entries', () => {
    expect(() => new MooProxyProvider(mooConfig({ entries: 'host:8000:only' }))).toThrowError(
      ProviderGenerationError,
    );
    expect(() => new MooProxyProvider(mooConfig({ entries: 'h:xx:u:p' }))).toThrowError(
      'Provider "moo" could not produce an endpoint: session entry has an invalid port (got "h:xx:u:p")',
    );
  });
});

describe('MooProxyProvider in dynamic mode', () => {
  it('builds a fresh session per acquire', () => {
    const provider = new MooProxyProvider(mooConfig(DYNAMIC_OPTIONS));

    const first = provider.acquire({ purpose: 'detail' });
    const second = provider.acquire();

    expect(provider.modeKind).toBe('dynamic');
    expect(first.host).toBe('gw.mooproxy.example');
    expect(first.port).toBe(55688);
    expect(first.username).toBe('specu1');
    expect(first.password).toBe(`test-secret_country-US_session-${first.session}`);
    expect(first.region).toBe('US');
    expect(first.rotationType).toBe('sticky');
    expect(first.metadata).toEqual({ kind: 'mooproxy', mode: 'dynamic', purpose: 'detail' });
    expect(second.session).not.toBe(first.session);
  });

  it('embeds the requested region', () => {
    const endpoint = new MooProxyProvider(
      mooConfig({ ...DYNAMIC_OPTIONS, country: 'FR' }),
    ).acquire({ region: 'DE' });

    expect(endpoint.region).toBe('DE');
    expect(endpoint.password).toBe(`test-secret_country-DE_session-${endpoint.session}`);
  });

  it('refuses a region that would corrupt the password', () => {
    const provider = new MooProxyProvider(mooConfig(DYNAMIC_OPTIONS));

    expect(() => provider.acquire({ region: 'U_S' })).toThrowError(
      'Provider "moo" could not produce an endpoint: region "U_S" cannot be embedded in a session password',
    );
  });

  it('requires base credentials and a valid country', () => {
    const { host: _host, ...withoutHost } = DYNAMIC_OPTIONS;

    expect(() => new MooProxyProvider(mooConfig(withoutHost))).toThrowError(
      'Provider "moo" (mooproxy) requires option "host"',
    );
    expect(
      () => new MooProxyProvider(mooConfig({ ...DYNAMIC_OPTIONS, country: 'U S' })),
    ).toThrowError(ConfigurationError);
  });
});

describe('password helpers', () => {
  it('extract the session and region', () => {
    expect(extractSessionId('XJr_country-US_session-ABC')).toBe('ABC');
    expect(extractRegion('XJr_country-US_session-ABC')).toBe('US');
    expect(extractSessionId('plain')).toBeUndefined();
    expect(extractRegion('plain')).toBeUndefined();
  });
});
