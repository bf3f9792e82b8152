import { createLogger } from '@workspace/logger';
import { ConfigurationError, ProviderGenerationError } from '../errors.js';
import type { ProviderConfig } from '../config/types.js';
import { createEndpoint } from '../endpoint/endpoint.js';
import { parsePort, splitEntries } from '../endpoint/proxy-string.js';
import type {
  AcquireRequest,
  Endpoint,
  IpVersion,
  ProxyScheme,
  ProxyType,
} from '../endpoint/types.js';
import {
  readIpVersion,
  readOption,
  readPort,
  readProxyType,
  readScheme,
  requireOption,
} from './options.js';
import { SessionIdGenerator } from './session-id.js';
import type { ProxyProvider } from './types.js';

const log = createLogger('mooproxy');

const COUNTRY_TAG = '_country-';
const SESSION_TAG = '_session-';
const REGION_PATTERN = /^[A-Za-z0-9-]+$/;

type StaticMode = {
  kind: 'static';
  pool: readonly Endpoint[];
};

type DynamicMode = {
  kind: 'dynamic';
  scheme: ProxyScheme;
  host: string;
  port: number;
  username: string;
  password: string;
  country: string;
};

type MooProxyMode = StaticMode | DynamicMode;

/**
 * Sticky-session vendor whose session and country ride in the password:
 * `<password>_country-<XX>_session-<id>`.
 *
 * With an `entries` option the provider cycles through pre-generated
 * `host:port:user:pass_country-XX_session-ID` strings; otherwise it builds a
 * new session from base credentials on every call.
 */
export class MooProxyProvider implements ProxyProvider {
  readonly name: string;
  readonly type = 'mooproxy' as const;
  private readonly proxyType: ProxyType;
  private readonly ipVersion: IpVersion;
  private readonly mode: MooProxyMode;
  private readonly sessions: SessionIdGenerator;
  private counter: number;

  constructor(config: ProviderConfig) {
    this.name = config.name;
    this.proxyType = readProxyType(config, 'residential');
    this.ipVersion = readIpVersion(config);
    this.sessions = new SessionIdGenerator();
    this.counter = 0;

    const scheme = readScheme(config, 'http');
    const entries = readOption(config, 'entries');
    this.mode = entries
      ? { kind: 'static', pool: this.parseEntries(entries, scheme) }
      : this.readDynamicMode(config, scheme);

    log.info('MooProxy provider initialized', {
      provider: this.name,
      mode: this.mode.kind,
      entries: this.mode.kind === 'static' ? this.mode.pool.length : undefined,
      proxyType: this.proxyType,
    });
  }

  get modeKind(): MooProxyMode['kind'] {
    return this.mode.kind;
  }

  acquire(request?: AcquireRequest): Endpoint {
    return this.mode.kind === 'static'
      ? this.nextStatic(this.mode)
      : this.createDynamic(this.mode, request);
  }

  private nextStatic(mode: StaticMode): Endpoint {
    const endpoint = mode.pool[this.counter % mode.pool.length];
    if (!endpoint) {
      throw new ProviderGenerationError(this.name, 'session pool is empty');
    }
    this.counter += 1;

    log.debug('MooProxy static session acquired', {
      provider: this.name,
      session: endpoint.session,
      region: endpoint.region,
    });

    return endpoint;
  }

  private createDynamic(mode: DynamicMode, request?: AcquireRequest): Endpoint {
    const region = request?.region ?? mode.country;
    if (!REGION_PATTERN.test(region)) {
      throw new ProviderGenerationError(
        this.name,
        `region "${region}" cannot be embedded in a session password`,
      );
    }

    const session = this.sessions.next();
    const endpoint = createEndpoint({
      scheme: mode.scheme,
      host: mode.host,
      port: mode.port,
      username: mode.username,
      password: `${mode.password}${COUNTRY_TAG}${region}${SESSION_TAG}${session}`,
      provider: this.name,
      session,
      proxyType: this.proxyType,
      ipVersion: this.ipVersion,
      rotationType: 'sticky',
      region,
      metadata: {
        kind: 'mooproxy',
        mode: 'dynamic',
        purpose: request?.purpose ?? 'general',
      },
    });

    log.debug('MooProxy dynamic session created', {
      provider: this.name,
      session,
      region,
    });

    return endpoint;
  }

  private readDynamicMode(config: ProviderConfig, scheme: ProxyScheme): DynamicMode {
    const country = readOption(config, 'country') ?? 'US';
    if (!REGION_PATTERN.test(country)) {
      throw new ConfigurationError(
        `Provider "${config.name}" option "country" is not a valid region code: ${country}`,
      );
    }

    return {
      kind: 'dynamic',
      scheme,
      host: requireOption(config, 'host'),
      port: readPort(config),
      username: requireOption(config, 'username'),
      password: requireOption(config, 'password'),
      country,
    };
  }

  private parseEntries(raw: string, scheme: ProxyScheme): readonly Endpoint[] {
    const entries = splitEntries(raw);
    if (entries.length === 0) {
      throw new ConfigurationError(
        `Provider "${this.name}" has an empty entries list`,
      );
    }

    return Object.freeze(entries.map((entry) => this.parseEntry(entry, scheme)));
  }

  private parseEntry(entry: string, scheme: ProxyScheme): Endpoint {
    const parts = entry.split(':');
    const [host, rawPort, username] = parts;
    const password = parts.slice(3).join(':');
    const port = parsePort(rawPort);

    if (parts.length < 4 || !host || !username || !password) {
      throw new ProviderGenerationError(
        this.name,
        `session entry must look like host:port:user:pass (got "${entry}")`,
      );
    }

    if (port === undefined) {
      throw new ProviderGenerationError(
        this.name,
        `session entry has an invalid port (got "${entry}")`,
      );
    }

    const session = extractSessionId(password);
    const region = extractRegion(password);

    return createEndpoint({
      scheme,
      host,
      port,
      username,
      password,
      provider: this.name,
      session,
      proxyType: this.proxyType,
      ipVersion: this.ipVersion,
      rotationType: 'sticky',
      region,
      metadata: { kind: 'mooproxy', mode: 'static' },
    });
  }
}

/** `XJr_country-US_session-ABC` -> `ABC` */
export function extractSessionId(password: string): string | undefined {
  const index = password.lastIndexOf(SESSION_TAG);
  if (index < 0) {
    return undefined;
  }

  const session = password.slice(index + SESSION_TAG.length);
  return session || undefined;
}

/** `XJr_country-US_session-ABC` -> `US` */
export function extractRegion(password: string): string | undefined {
  const index = password.indexOf(COUNTRY_TAG);
  if (index < 0) {
    return undefined;
  }

  const [region] = password.slice(index + COUNTRY_TAG.length).split('_');
  return region || undefined;
}
