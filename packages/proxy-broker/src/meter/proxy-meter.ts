import { createLogger } from '@workspace/logger';
import { endpointKey } from '../endpoint/endpoint.js';
import type { Endpoint } from '../endpoint/types.js';
import type {
  EndpointMetrics,
  ProviderUsage,
  RequestUsage,
  UsageSummary,
} from './types.js';

const log = createLogger('proxy-meter');

const BYTES_PER_GB = 1024 ** 3;

/**
 * Usage ledger keyed by endpoint identity. Entries are created on first
 * sight and kept for the life of the meter so totals can be aggregated after
 * endpoints are released. Callers only ever see copies.
 */
export class ProxyMeter {
  private readonly entries: Map<string, EndpointMetrics>;
  private readonly prices: Map<string, number>;
  // Acquire times of open leases per key, oldest first.
  private readonly leaseStarts: Map<string, number[]>;

  constructor() {
    this.entries = new Map();
    this.prices = new Map();
    this.leaseStarts = new Map();
  }

  registerProviderPrice(provider: string, pricePerGb: number): void {
    if (!Number.isFinite(pricePerGb) || pricePerGb < 0) {
      throw new RangeError(
        `Price per GB for "${provider}" must be a finite number >= 0`,
      );
    }

    this.prices.set(provider, pricePerGb);
    log.debug('Provider price registered', { provider, pricePerGb });
  }

  recordAcquire(endpoint: Endpoint, purpose?: string): void {
    const now = Date.now();
    const entry = this.ensureEntry(endpoint, now);

    entry.acquireCount += 1;
    entry.activeLeases += 1;
    entry.active = true;
    entry.lastAcquiredAt = now;
    entry.lastSeen = now;
    const starts = this.leaseStarts.get(entry.key) ?? [];
    starts.push(now);
    this.leaseStarts.set(entry.key, starts);
    if (purpose) {
      entry.purpose = purpose;
    }
  }

  recordRequest(endpoint: Endpoint, usage: RequestUsage = {}): void {
    const bytesSent = usage.bytesSent ?? 0;
    const bytesReceived = usage.bytesReceived ?? 0;
    assertByteCount('bytesSent', bytesSent);
    assertByteCount('bytesReceived', bytesReceived);

    const now = Date.now();
    const entry = this.ensureEntry(endpoint, now);

    entry.requestsCount += 1;
    entry.bytesSent += bytesSent;
    entry.bytesReceived += bytesReceived;
    entry.lastSeen = now;

    if (usage.success ?? true) {
      entry.successCount += 1;
    } else {
      entry.failureCount += 1;
      log.warn('Proxy request failed', {
        key: entry.key,
        failures: entry.failureCount,
        requests: entry.requestsCount,
      });
    }

    // Billed at the price in force when the request is recorded.
    const pricePerGb = this.prices.get(entry.provider) ?? 0;
    entry.costEstimate += ((bytesSent + bytesReceived) / BYTES_PER_GB) * pricePerGb;
  }

  recordRelease(endpoint: Endpoint, reason?: string): void {
    const key = endpointKey(endpoint);
    const entry = this.entries.get(key);

    if (!entry) {
      log.warn('Release recorded for unknown endpoint', { key, reason });
      return;
    }

    const now = Date.now();
    entry.activeLeases = Math.max(0, entry.activeLeases - 1);
    entry.active = entry.activeLeases > 0;
    entry.lastReleaseReason = reason ?? 'normal';
    const acquiredAt = this.leaseStarts.get(key)?.shift() ?? entry.lastAcquiredAt;
    entry.lastHeldMs = now - acquiredAt;
    entry.lastSeen = now;

    log.info('Proxy released', {
      key,
      reason: entry.lastReleaseReason,
      heldMs: entry.lastHeldMs,
      requests: entry.requestsCount,
      failures: entry.failureCount,
    });
  }

  getMetrics(provider?: string): Map<string, EndpointMetrics> {
    const result = new Map<string, EndpointMetrics>();

    for (const [key, entry] of this.entries) {
      if (provider === undefined || entry.provider === provider) {
        result.set(key, { ...entry });
      }
    }

    return result;
  }

  getSummary(): UsageSummary {
    const byProvider: Record<string, ProviderUsage> = {};
    let totalRequests = 0;
    let totalSuccesses = 0;
    let totalBytes = 0;
    let totalErrors = 0;
    let totalCostEstimate = 0;

    for (const entry of this.entries.values()) {
      const bytes = entry.bytesSent + entry.bytesReceived;
      totalRequests += entry.requestsCount;
      totalSuccesses += entry.successCount;
      totalBytes += bytes;
      totalErrors += entry.failureCount;
      totalCostEstimate += entry.costEstimate;

      const usage = byProvider[entry.provider] ?? {
        endpoints: 0,
        requests: 0,
        bytes: 0,
        gb: 0,
        errors: 0,
        cost: 0,
      };
      usage.endpoints += 1;
      usage.requests += entry.requestsCount;
      usage.bytes += bytes;
      usage.gb = usage.bytes / BYTES_PER_GB;
      usage.errors += entry.failureCount;
      usage.cost += entry.costEstimate;
      byProvider[entry.provider] = usage;
    }

    return {
      totalEndpoints: this.entries.size,
      totalRequests,
      totalBytes,
      totalGb: totalBytes / BYTES_PER_GB,
      totalErrors,
      overallSuccessRate:
        totalRequests > 0 ? (totalSuccesses / totalRequests) * 100 : 0,
      totalCostEstimate,
      byProvider,
    };
  }

  reset(): void {
    const count = this.entries.size;
    this.entries.clear();
    this.leaseStarts.clear();
    log.warn('Proxy meter reset', { clearedEntries: count });
  }

  private ensureEntry(endpoint: Endpoint, now: number): EndpointMetrics {
    const key = endpointKey(endpoint);
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    const entry: EndpointMetrics = {
      key,
      provider: endpoint.provider,
      host: endpoint.host,
      port: endpoint.port,
      session: endpoint.session,
      region: endpoint.region,
      proxyType: endpoint.proxyType,
      requestsCount: 0,
      successCount: 0,
      failureCount: 0,
      bytesSent: 0,
      bytesReceived: 0,
      costEstimate: 0,
      purpose: 'general',
      firstSeen: now,
      lastSeen: now,
      active: false,
      activeLeases: 0,
      acquireCount: 0,
      lastAcquiredAt: now,
    };
    this.entries.set(key, entry);

    log.debug('Tracking new proxy endpoint', {
      key,
      proxyType: endpoint.proxyType,
      region: endpoint.region,
    });

    return entry;
  }
}

function assertByteCount(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${field} must be a non-negative integer (got ${value})`);
  }
}
