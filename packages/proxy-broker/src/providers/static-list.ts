import { createLogger } from '@workspace/logger';
import { ConfigurationError, ProviderGenerationError } from '../errors.js';
import type { ProviderConfig } from '../config/types.js';
import { createEndpoint, describeEndpoint } from '../endpoint/endpoint.js';
import { parseProxyString, splitEntries } from '../endpoint/proxy-string.js';
import type { AcquireRequest, Endpoint } from '../endpoint/types.js';
import {
  readIpVersion,
  readOption,
  readProxyType,
  readRotationType,
  readScheme,
} from './options.js';
import type { ProxyProvider } from './types.js';

const log = createLogger('static-list');

/**
 * Round-robin over a fixed pool parsed from the `entries` option. The pool is
 * validated up front, so `acquire` can only fail if the pool is empty, which
 * the constructor already rules out.
 */
export class StaticListProvider implements ProxyProvider {
  readonly name: string;
  readonly type = 'static_list' as const;
  private readonly pool: readonly Endpoint[];
  private counter: number;

  constructor(config: ProviderConfig) {
    this.name = config.name;
    this.counter = 0;

    const entries = splitEntries(readOption(config, 'entries') ?? '');
    if (entries.length === 0) {
      throw new ConfigurationError(
        `Static list provider "${config.name}" requires at least one entry`,
      );
    }

    const scheme = readScheme(config, 'http');
    const proxyType = readProxyType(config, 'datacenter');
    const ipVersion = readIpVersion(config);
    const rotationType = readRotationType(config, 'sticky');

    this.pool = Object.freeze(
      entries.map((entry) => {
        const parsed = parseProxyString(entry);
        if (!parsed) {
          throw new ConfigurationError(
            `Static list provider "${config.name}" has an invalid entry: ${entry}`,
          );
        }

        return createEndpoint({
          ...parsed,
          scheme: parsed.scheme ?? scheme,
          provider: config.name,
          proxyType,
          ipVersion,
          rotationType,
          metadata: { kind: 'static' },
        });
      }),
    );

    log.info('Static list provider initialized', {
      provider: this.name,
      entries: this.pool.length,
      proxyType,
      ipVersion,
    });
  }

  acquire(request?: AcquireRequest): Endpoint {
    const endpoint = this.pool[this.counter % this.pool.length];
    if (!endpoint) {
      throw new ProviderGenerationError(this.name, 'static pool is empty');
    }
    this.counter += 1;

    log.debug('Static endpoint acquired', {
      provider: this.name,
      endpoint: describeEndpoint(endpoint),
      purpose: request?.purpose ?? 'general',
    });

    return endpoint;
  }

  /** Number of successful acquisitions so far; the next index is `position % size`. */
  get position(): number {
    return this.counter;
  }

  get size(): number {
    return this.pool.length;
  }
}
