import type { ProviderConfig, ProviderType } from '../config/types.js';
import { BrightDataProvider } from './brightdata.js';
import { MooProxyProvider } from './mooproxy.js';
import { StaticListProvider } from './static-list.js';
import type { ProxyProvider } from './types.js';

type ProviderFactory = (config: ProviderConfig) => ProxyProvider;

const PROVIDER_FACTORIES: Record<ProviderType, ProviderFactory> = {
  static_list: (config) => new StaticListProvider(config),
  brightdata: (config) => new BrightDataProvider(config),
  mooproxy: (config) => new MooProxyProvider(config),
};

export function createProvider(config: ProviderConfig): ProxyProvider {
  return PROVIDER_FACTORIES[config.type](config);
}

export type { ProviderFactory };
