import type { ProviderConfig, ProviderType } from '../config/types.js';
import type { AcquireRequest } from '../endpoint/types.js';
import type { ProxyMeter } from '../meter/proxy-meter.js';
import type { UsageSummary } from '../meter/types.js';
import type { ProviderFactory } from '../providers/factory.js';
import type { ProxyProvider } from '../providers/types.js';

type ManagerAcquireRequest = AcquireRequest & {
  /** Use exactly this provider; without it the cheapest provider with room is chosen. */
  name?: string;
};

type ProxyManagerOptions = {
  enableMetering: boolean;
  meter?: ProxyMeter;
  providerFactory?: ProviderFactory;
};

type ProviderSlot = {
  readonly config: ProviderConfig;
  readonly provider: ProxyProvider;
  readonly order: number;
  active: number;
  readonly leases: Map<string, number>;
};

type ProviderStats = {
  type: ProviderType;
  activeCount: number;
  limit: number | null;
  pricePerGb: number | null;
};

type ManagerStats = {
  providers: Record<string, ProviderStats>;
  usageSummary?: UsageSummary;
};

export type {
  ManagerAcquireRequest,
  ProxyManagerOptions,
  ProviderSlot,
  ProviderStats,
  ManagerStats,
};
