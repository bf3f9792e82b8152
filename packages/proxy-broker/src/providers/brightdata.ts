import { createLogger } from '@workspace/logger';
import type { ProviderConfig } from '../config/types.js';
import { createEndpoint } from '../endpoint/endpoint.js';
import type {
  AcquireRequest,
  Endpoint,
  IpVersion,
  ProxyType,
} from '../endpoint/types.js';
import {
  readIpVersion,
  readOption,
  readPort,
  readProxyType,
  requireOption,
} from './options.js';
import { SessionIdGenerator } from './session-id.js';
import type { ProxyProvider } from './types.js';

const log = createLogger('brightdata');

const DEFAULT_HOST = 'zproxy.lum-superproxy.io';
const DEFAULT_PORT = 22225;

/**
 * Session-per-acquire residential gateway. Host and port stay fixed; each
 * call embeds a fresh session token (and the target region) in the username:
 *
 * `<username>-session-<id>[-country-<region>][-city-<city>]`
 *
 * Keeping one egress IP across requests is up to the caller, who reuses the
 * returned endpoint.
 */
export class BrightDataProvider implements ProxyProvider {
  readonly name: string;
  readonly type = 'brightdata' as const;
  private readonly host: string;
  private readonly port: number;
  private readonly username: string;
  private readonly password: string;
  private readonly country: string | undefined;
  private readonly city: string | undefined;
  private readonly proxyType: ProxyType;
  private readonly ipVersion: IpVersion;
  private readonly sessions: SessionIdGenerator;

  constructor(config: ProviderConfig) {
    this.name = config.name;
    this.host = readOption(config, 'host') ?? DEFAULT_HOST;
    this.port = readPort(config, DEFAULT_PORT);
    this.username = requireOption(config, 'username');
    this.password = requireOption(config, 'password');
    this.country = readOption(config, 'country');
    this.city = readOption(config, 'city');
    this.proxyType = readProxyType(config, 'residential');
    this.ipVersion = readIpVersion(config);
    this.sessions = new SessionIdGenerator();

    log.info('BrightData provider initialized', {
      provider: this.name,
      host: `${this.host}:${this.port}`,
      proxyType: this.proxyType,
      country: this.country ?? 'any',
    });
  }

  acquire(request?: AcquireRequest): Endpoint {
    const session = this.sessions.next();
    const region = request?.region ?? this.country;

    const parts = [this.username, `session-${session}`];
    if (region) {
      parts.push(`country-${region}`);
    }
    if (this.city) {
      parts.push(`city-${this.city}`);
    }

    const endpoint = createEndpoint({
      scheme: 'http',
      host: this.host,
      port: this.port,
      username: parts.join('-'),
      password: this.password,
      provider: this.name,
      session,
      proxyType: this.proxyType,
      ipVersion: this.ipVersion,
      rotationType: 'rotating',
      region,
      metadata: {
        kind: 'metered',
        purpose: request?.purpose ?? 'general',
      },
    });

    log.debug('BrightData session created', {
      provider: this.name,
      session,
      region: region ?? 'any',
    });

    return endpoint;
  }
}
