import { createLogger } from '@workspace/logger';
import {
  ConcurrencyLimitError,
  ConfigurationError,
  NoProviderAvailableError,
  UnknownProviderError,
} from '../errors.js';
import type { ProviderConfig } from '../config/types.js';
import { describeEndpoint, endpointKey } from '../endpoint/endpoint.js';
import type { Endpoint } from '../endpoint/types.js';
import { ProxyMeter } from '../meter/proxy-meter.js';
import type { RequestUsage } from '../meter/types.js';
import { createProvider } from '../providers/factory.js';
import type { ProxyProvider } from '../providers/types.js';
import type {
  ManagerAcquireRequest,
  ManagerStats,
  ProviderSlot,
  ProxyManagerOptions,
} from './types.js';

const log = createLogger('proxy-manager');

const DEFAULT_OPTIONS: ProxyManagerOptions = {
  enableMetering: true,
};

/**
 * Hands out endpoints under per-provider admission control.
 *
 * Acquire and release are synchronous: the capacity check, the slot
 * reservation and the provider's own rotation step all complete before any
 * other caller on the event loop can observe the provider, so each provider's
 * counters need no further locking and providers never contend with each
 * other. Neither call waits for capacity; retry policy belongs to the caller.
 */
export class ProxyManager {
  private readonly slots: Map<string, ProviderSlot>;
  private readonly usageMeter: ProxyMeter | undefined;

  constructor(
    configs: readonly ProviderConfig[],
    options?: Partial<ProxyManagerOptions>,
  ) {
    const resolved = { ...DEFAULT_OPTIONS, ...options };
    const factory = resolved.providerFactory ?? createProvider;

    this.slots = new Map();
    this.usageMeter = resolved.enableMetering
      ? (resolved.meter ?? new ProxyMeter())
      : undefined;

    configs.forEach((config, order) => {
      if (this.slots.has(config.name)) {
        throw new ConfigurationError(
          `Duplicate proxy provider name: ${config.name}`,
        );
      }

      this.slots.set(config.name, {
        config,
        provider: factory(config),
        order,
        active: 0,
        leases: new Map(),
      });

      if (this.usageMeter && config.pricePerGb !== null) {
        this.usageMeter.registerProviderPrice(config.name, config.pricePerGb);
      }
    });

    log.info('Proxy manager ready', {
      providers: [...this.slots.keys()],
      metering: this.usageMeter !== undefined,
    });
  }

  acquire(request: ManagerAcquireRequest = {}): Endpoint {
    if (request.name !== undefined) {
      const slot = this.requireSlot(request.name);
      const limit = slot.config.concurrencyLimit;

      if (limit !== null && slot.active >= limit) {
        log.warn('Provider at concurrency limit', {
          provider: slot.config.name,
          active: slot.active,
          limit,
        });
        throw new ConcurrencyLimitError(slot.config.name, limit);
      }

      return this.acquireFrom(slot, request);
    }

    const candidates = this.candidatesByPrice();
    for (const slot of candidates) {
      if (this.hasCapacity(slot)) {
        return this.acquireFrom(slot, request);
      }

      log.debug('Skipping provider without spare capacity', {
        provider: slot.config.name,
        active: slot.active,
        limit: slot.config.concurrencyLimit,
      });
    }

    throw new NoProviderAvailableError(
      candidates.map((slot) => slot.config.name),
    );
  }

  /**
   * Returns the slot held by `endpoint`. Releasing an endpoint with no
   * outstanding lease (a second release, or one this manager never issued)
   * is logged and otherwise ignored.
   */
  release(endpoint: Endpoint, reason?: string): void {
    const slot = this.slots.get(endpoint.provider);
    if (!slot) {
      log.warn('Release for endpoint of unknown provider', {
        provider: endpoint.provider,
        endpoint: describeEndpoint(endpoint),
        reason,
      });
      return;
    }

    const key = endpointKey(endpoint);
    const leases = slot.leases.get(key) ?? 0;
    if (leases === 0) {
      log.warn('Release without an outstanding lease', { key, reason });
      return;
    }

    if (leases === 1) {
      slot.leases.delete(key);
    } else {
      slot.leases.set(key, leases - 1);
    }
    slot.active = Math.max(0, slot.active - 1);

    this.usageMeter?.recordRelease(endpoint, reason);

    log.debug('Proxy slot released', {
      provider: slot.config.name,
      active: slot.active,
      reason: reason ?? 'normal',
    });
  }

  recordRequest(endpoint: Endpoint, usage?: RequestUsage): void {
    this.usageMeter?.recordRequest(endpoint, usage);
  }

  getStats(): ManagerStats {
    const stats: ManagerStats = { providers: {} };

    for (const [name, slot] of this.slots) {
      stats.providers[name] = {
        type: slot.config.type,
        activeCount: slot.active,
        limit: slot.config.concurrencyLimit,
        pricePerGb: slot.config.pricePerGb,
      };
    }

    if (this.usageMeter) {
      stats.usageSummary = this.usageMeter.getSummary();
    }

    return stats;
  }

  activeCount(name: string): number {
    return this.requireSlot(name).active;
  }

  getProvider(name: string): ProxyProvider {
    return this.requireSlot(name).provider;
  }

  providerNames(): string[] {
    return [...this.slots.keys()];
  }

  get meter(): ProxyMeter | undefined {
    return this.usageMeter;
  }

  private acquireFrom(slot: ProviderSlot, request: ManagerAcquireRequest): Endpoint {
    slot.active += 1;

    let endpoint: Endpoint;
    try {
      endpoint = slot.provider.acquire({
        region: request.region,
        purpose: request.purpose,
      });
    } catch (error) {
      slot.active -= 1;
      log.error('Provider failed to produce an endpoint', error);
      throw error;
    }

    const key = endpointKey(endpoint);
    slot.leases.set(key, (slot.leases.get(key) ?? 0) + 1);
    this.usageMeter?.recordAcquire(endpoint, request.purpose);

    log.debug('Proxy slot acquired', {
      provider: slot.config.name,
      endpoint: describeEndpoint(endpoint),
      active: slot.active,
      limit: slot.config.concurrencyLimit,
      purpose: request.purpose ?? 'general',
    });

    return endpoint;
  }

  private requireSlot(name: string): ProviderSlot {
    const slot = this.slots.get(name);
    if (!slot) {
      throw new UnknownProviderError(name);
    }
    return slot;
  }

  private hasCapacity(slot: ProviderSlot): boolean {
    const limit = slot.config.concurrencyLimit;
    return limit === null || slot.active < limit;
  }

  // Cheapest first; unpriced providers last; declaration order breaks ties.
  private candidatesByPrice(): ProviderSlot[] {
    return [...this.slots.values()].sort((left, right) => {
      const leftPrice = left.config.pricePerGb ?? Number.POSITIVE_INFINITY;
      const rightPrice = right.config.pricePerGb ?? Number.POSITIVE_INFINITY;
      if (leftPrice !== rightPrice) {
        return leftPrice < rightPrice ? -1 : 1;
      }
      return left.order - right.order;
    });
  }
}
