import type { ProxyType } from '../endpoint/types.js';

type EndpointMetrics = {
  key: string;
  provider: string;
  host: string;
  port: number;
  session?: string;
  region?: string;
  proxyType: ProxyType;
  requestsCount: number;
  successCount: number;
  failureCount: number;
  bytesSent: number;
  bytesReceived: number;
  /** Derived from this endpoint's own provider price; never decreases. */
  costEstimate: number;
  purpose: string;
  firstSeen: number;
  lastSeen: number;
  active: boolean;
  activeLeases: number;
  acquireCount: number;
  lastAcquiredAt: number;
  lastReleaseReason?: string;
  /** Held duration of the lease closed by the latest release (leases close oldest first). */
  lastHeldMs?: number;
};

type RequestUsage = {
  bytesSent?: number;
  bytesReceived?: number;
  success?: boolean;
};

type ProviderUsage = {
  endpoints: number;
  requests: number;
  bytes: number;
  gb: number;
  errors: number;
  cost: number;
};

type UsageSummary = {
  totalEndpoints: number;
  totalRequests: number;
  totalBytes: number;
  totalGb: number;
  totalErrors: number;
  /** Percentage 0-100; 0 when nothing was recorded. */
  overallSuccessRate: number;
  totalCostEstimate: number;
  byProvider: Record<string, ProviderUsage>;
};

export type { EndpointMetrics, RequestUsage, ProviderUsage, UsageSummary };
