import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createEndpoint } from '../endpoint/endpoint.js';
import type { Endpoint } from '../endpoint/types.js';
import { ProxyMeter } from './proxy-meter.js';

const GB = 1024 ** 3;

function endpointFor(provider: string, host: string, session?: string): Endpoint {
  return createEndpoint({
    host,
    port: 8000,
    provider,
    session,
    proxyType: 'residential',
    ipVersion: 'ipv4',
    rotationType: 'sticky',
    region: 'US',
  });
}

describe('ProxyMeter', () => {
  let meter: ProxyMeter;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(1_000));
    meter = new ProxyMeter();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('opens an entry on acquire', () => {
    const endpoint = endpointFor('moo', 'a.example', 's1');
    meter.recordAcquire(endpoint, 'listing');

    const entry = meter.getMetrics().get('moo:a.example:8000:s1');

    expect(entry).toMatchObject({
      provider: 'moo',
      host: 'a.example',
      session: 's1',
      region: 'US',
      purpose: 'listing',
      active: true,
      activeLeases: 1,
      acquireCount: 1,
      firstSeen: 1_000,
      lastAcquiredAt: 1_000,
      requestsCount: 0,
      costEstimate: 0,
    });
  });

  it('accumulates traffic and recomputes cost from the registered price', () => {
    meter.registerProviderPrice('moo', 4);
    const endpoint = endpointFor('moo', 'a.example');

    meter.recordRequest(endpoint, { bytesSent: GB / 2, bytesReceived: GB / 2 });
    expect(meter.getMetrics().get('moo:a.example:8000:')?.costEstimate).toBe(4);

    meter.recordRequest(endpoint, { bytesSent: GB / 4, success: false });
    const entry = meter.getMetrics().get('moo:a.example:8000:');

    expect(entry?.costEstimate).toBe(5);
    expect(entry?.requestsCount).toBe(2);
    expect(entry?.successCount).toBe(1);
    expect(entry?.failureCount).toBe(1);
    expect(entry?.bytesSent).toBe(GB / 2 + GB / 4);
  });

  it('keeps traffic billed at the price in force when it was recorded', () => {
    meter.registerProviderPrice('moo', 10);
    const endpoint = endpointFor('moo', 'a.example');
    const costOf = () => meter.getMetrics().get('moo:a.example:8000:')?.costEstimate;

    meter.recordRequest(endpoint, { bytesReceived: GB });
    meter.registerProviderPrice('moo', 1);
    meter.recordRequest(endpoint);

    expect(costOf()).toBe(10);

    meter.recordRequest(endpoint, { bytesSent: GB });
    expect(costOf()).toBe(11);
  });

  it('prices unregistered providers at zero', () => {
    const endpoint = endpointFor('free', 'a.example');
    meter.recordRequest(endpoint, { bytesReceived: GB });

    expect(meter.getSummary().totalCostEstimate).toBe(0);
    expect(meter.getSummary().totalGb).toBe(1);
  });

  it('never lowers an endpoint cost', () => {
    meter.registerProviderPrice('moo', 3);
    const endpoint = endpointFor('moo', 'a.example');
    const costs: number[] = [];

    for (const bytes of [100, 0, 2_048, 0, 1]) {
      meter.recordRequest(endpoint, { bytesReceived: bytes });
      costs.push(meter.getMetrics().get('moo:a.example:8000:')?.costEstimate ?? -1);
    }

    for (let index = 1; index < costs.length; index += 1) {
      expect(costs[index]).toBeGreaterThanOrEqual(costs[index - 1] ?? 0);
    }
  });

  it('sums per-endpoint costs into the summary', () => {
    meter.registerProviderPrice('cheap', 2);
    meter.registerProviderPrice('dear', 10);

    meter.recordRequest(endpointFor('cheap', 'a.example'), { bytesReceived: GB });
    meter.recordRequest(endpointFor('dear', 'b.example'), { bytesSent: GB / 4 });
    meter.recordRequest(endpointFor('dear', 'c.example'), { bytesSent: GB / 4 });

    const summary = meter.getSummary();
    const perEndpoint = [...meter.getMetrics().values()].reduce(
      (total, entry) => total + entry.costEstimate,
      0,
    );

    expect(summary.totalCostEstimate).toBeCloseTo(perEndpoint, 10);
    expect(summary.totalCostEstimate).toBeCloseTo(7, 10);
    expect(summary.totalEndpoints).toBe(3);
    expect(summary.totalGb).toBe(1.5);
    expect(summary.byProvider).toEqual({
      cheap: { endpoints: 1, requests: 1, bytes: GB, gb: 1, errors: 0, cost: 2 },
      dear: { endpoints: 2, requests: 2, bytes: GB / 2, gb: 0.5, errors: 0, cost: 5 },
    });
  });

  it('reports the success rate as a percentage', () => {
    const endpoint = endpointFor('moo', 'a.example');
    meter.recordRequest(endpoint);
    meter.recordRequest(endpoint);
    meter.recordRequest(endpoint, { success: false });

    const summary = meter.getSummary();

    expect(summary.totalRequests).toBe(3);
    expect(summary.totalErrors).toBe(1);
    expect(summary.overallSuccessRate).toBeCloseTo(66.667, 2);
  });

  it('returns zeros for an empty ledger', () => {
    expect(meter.getSummary()).toEqual({
      totalEndpoints: 0,
      totalRequests: 0,
      totalBytes: 0,
      totalGb: 0,
      totalErrors: 0,
      overallSuccessRate: 0,
      totalCostEstimate: 0,
      byProvider: {},
    });
  });

  it('closes the lease on release and keeps the entry', () => {
    const endpoint = endpointFor('moo', 'a.example');
    meter.recordAcquire(endpoint);

    vi.setSystemTime(new Date(4_000));
    meter.recordRelease(endpoint, 'blocked');

    const entry = meter.getMetrics().get('moo:a.example:8000:');

    expect(entry?.active).toBe(false);
    expect(entry?.activeLeases).toBe(0);
    expect(entry?.lastReleaseReason).toBe('blocked');
    expect(entry?.lastHeldMs).toBe(3_000);
    expect(entry?.lastSeen).toBe(4_000);
  });

  it('stays active while another lease on the same endpoint is open', () => {
    const endpoint = endpointFor('moo', 'a.example');
    meter.recordAcquire(endpoint);
    meter.recordAcquire(endpoint);
    meter.recordRelease(endpoint);

    const entry = meter.getMetrics().get('moo:a.example:8000:');

    expect(entry?.active).toBe(true);
    expect(entry?.lastReleaseReason).toBe('normal');
  });

  it('measures each overlapping lease from its own acquire', () => {
    const endpoint = endpointFor('static', 'a.example');
    const heldMs = () => meter.getMetrics().get('static:a.example:8000:')?.lastHeldMs;

    meter.recordAcquire(endpoint);
    vi.setSystemTime(new Date(3_000));
    meter.recordAcquire(endpoint);

    vi.setSystemTime(new Date(4_000));
    meter.recordRelease(endpoint);
    expect(heldMs()).toBe(3_000);

    vi.setSystemTime(new Date(5_000));
    meter.recordRelease(endpoint);
    expect(heldMs()).toBe(2_000);
  });

  it('ignores releases for endpoints it has never seen', () => {
    meter.recordRelease(endpointFor('moo', 'ghost.example'));
    expect(meter.getMetrics().size).toBe(0);
  });

  it('filters metrics by provider and hands out copies', () => {
    meter.recordRequest(endpointFor('moo', 'a.example'));
    meter.recordRequest(endpointFor('bd', 'b.example'));

    const mooOnly = meter.getMetrics('moo');
    expect([...mooOnly.keys()]).toEqual(['moo:a.example:8000:']);

    const copy = mooOnly.get('moo:a.example:8000:');
    if (copy) {
      copy.requestsCount = 99;
    }
    expect(meter.getMetrics().get('moo:a.example:8000:')?.requestsCount).toBe(1);
  });

  it('rejects invalid byte counts and prices', () => {
    const endpoint = endpointFor('moo', 'a.example');

    expect(() => meter.recordRequest(endpoint, { bytesSent: -1 })).toThrowError(RangeError);
    expect(() => meter.recordRequest(endpoint, { bytesReceived: 1.5 })).toThrowError(
      RangeError,
    );
    expect(() => meter.registerProviderPrice('moo', -0.5)).toThrowError(RangeError);
    expect(meter.getMetrics().size).toBe(0);
  });

  it('clears everything on reset', () => {
    meter.recordRequest(endpointFor('moo', 'a.example'));
    meter.reset();

    expect(meter.getMetrics().size).toBe(0);
    expect(meter.getSummary().totalRequests).toBe(0);
  });
});
