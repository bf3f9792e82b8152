import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { loadProviderConfigs, resolveProviderConfigs } from './loader.js';

describe('resolveProviderConfigs', () => {
  it('resolves env: references and stringifies option values', () => {
    const [config] = resolveProviderConfigs(
      [
        {
          name: 'bd',
          type: 'brightdata',
          price_per_gb: 12,
          concurrency_limit: 100,
          options: {
            username: 'env:BD_USER',
            password: 'env:BD_PASS',
            port: 22225,
          },
        },
      ],
      { BD_USER: 'test-user', BD_PASS: 'test-secret' },
    );

    expect(config).toEqual({
      name: 'bd',
      type: 'brightdata',
      pricePerGb: 12,
      concurrencyLimit: 100,
      options: { username: 'test-user', password: 'test-secret', port: '22225' },
    });
  });

  it('fails with the variable name when a reference is unset', () => {
    const input = [
      {
        name: 'bd',
        type: 'brightdata',
        options: { username: 'test-user', password: 'env:MISSING_VAR' },
      },
    ];

    expect(() => resolveProviderConfigs(input, {})).toThrowError(ConfigurationError);

    try {
      resolveProviderConfigs(input, {});
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.variable).toBe('MISSING_VAR');
        expect(error.message).toContain('MISSING_VAR');
      }
    }
  });

  it('treats an empty variable as unset', () => {
    expect(() =>
      resolveProviderConfigs(
        [{ name: 'bd', type: 'brightdata', options: { password: 'env:EMPTY' } }],
        { EMPTY: '' },
      ),
    ).toThrowError(/EMPTY/);
  });

  it('reads the environment once and does not track later changes', () => {
    const env: Record<string, string | undefined> = { PROXY_PASS: 'test-secret' };
    const [config] = resolveProviderConfigs(
      [{ name: 'moo', type: 'mooproxy', options: { password: 'env:PROXY_PASS' } }],
      env,
    );

    env.PROXY_PASS = 'changed';

    expect(config?.options.password).toBe('test-secret');
  });

  it('maps a zero or absent concurrency limit to unlimited', () => {
    const configs = resolveProviderConfigs(
      [
        { name: 'a', type: 'static_list', concurrency_limit: 0, options: { entries: 'a:1' } },
        { name: 'b', type: 'static_list', options: { entries: 'b:2' } },
        { name: 'c', type: 'static_list', concurrency_limit: 3, options: { entries: 'c:3' } },
      ],
      {},
    );

    expect(configs.map((config) => config.concurrencyLimit)).toEqual([null, null, 3]);
    expect(configs.map((config) => config.pricePerGb)).toEqual([null, null, null]);
  });

  it('accepts the { providers: [...] } wrapper', () => {
    const configs = resolveProviderConfigs(
      { providers: [{ name: 'a', type: 'static_list', price_per_gb: 0.5 }] },
      {},
    );

    expect(configs).toHaveLength(1);
    expect(configs[0]?.pricePerGb).toBe(0.5);
    expect(configs[0]?.options).toEqual({});
  });

  it('returns frozen configs', () => {
    const [config] = resolveProviderConfigs(
      [{ name: 'a', type: 'static_list', options: { entries: 'a:1' } }],
      {},
    );

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config?.options)).toBe(true);
  });

  it('rejects duplicate provider names', () => {
    expect(() =>
      resolveProviderConfigs(
        [
          { name: 'a', type: 'static_list' },
          { name: 'a', type: 'mooproxy' },
        ],
        {},
      ),
    ).toThrowError('Duplicate proxy provider name: a');
  });

  it('rejects negative prices', () => {
    expect(() =>
      resolveProviderConfigs([{ name: 'a', type: 'static_list', price_per_gb: -1 }], {}),
    ).toThrowError(
      'Invalid proxy configuration at providers.0.price_per_gb: price_per_gb must be >= 0',
    );
  });

  it('rejects unknown provider types and empty references', () => {
    expect(() =>
      resolveProviderConfigs([{ name: 'a', type: 'socks-farm' }], {}),
    ).toThrowError(ConfigurationError);

    expect(() =>
      resolveProviderConfigs(
        [{ name: 'a', type: 'mooproxy', options: { password: 'env:' } }],
        {},
      ),
    ).toThrowError('Provider "a" option "password" has an empty env: reference');
  });
});

describe('loadProviderConfigs', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'proxy-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads and resolves a JSON file', () => {
    const path = join(dir, 'proxies.json');
    writeFileSync(
      path,
      JSON.stringify([
        {
          name: 'moo',
          type: 'mooproxy',
          price_per_gb: 3,
          options: { host: 'gw.example.net', port: 8000, password: 'env:MOO_PASS' },
        },
      ]),
    );

    const [config] = loadProviderConfigs(path, { MOO_PASS: 'test-secret' });

    expect(config?.options).toEqual({
      host: 'gw.example.net',
      port: '8000',
      password: 'test-secret',
    });
  });

  it('loads the bundled example config', () => {
    const path = fileURLToPath(new URL('../../examples/proxies.example.json', import.meta.url));

    const configs = loadProviderConfigs(path, {
      MOOPROXY_USERNAME: 'test-user',
      MOOPROXY_PASSWORD: 'test-secret',
      BRIGHTDATA_USERNAME: 'test-user',
      BRIGHTDATA_PASSWORD: 'test-secret',
    });

    expect(configs.map((config) => [config.name, config.concurrencyLimit])).toEqual([
      ['office-dc', null],
      ['moo-us', 20],
      ['brightdata-resi', 100],
    ]);
    expect(configs[1]?.options.password).toBe('test-secret');
  });

  it('wraps read and parse failures in ConfigurationError', () => {
    const missing = join(dir, 'missing.json');
    expect(() => loadProviderConfigs(missing, {})).toThrowError(
      `Cannot read proxy config file: ${missing}`,
    );

    const broken = join(dir, 'broken.json');
    writeFileSync(broken, '{ not json');
    expect(() => loadProviderConfigs(broken, {})).toThrowError(
      `Proxy config file is not valid JSON: ${broken}`,
    );
  });
});
