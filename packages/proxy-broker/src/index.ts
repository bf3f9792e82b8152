export {
  createEndpoint,
  endpointKey,
  describeEndpoint,
  asHttpProxySpec,
  asBrowserProxySpec,
} from './endpoint/endpoint.js';
export {
  parseProxyString,
  splitEntries,
  type ParsedProxyString,
} from './endpoint/proxy-string.js';
export {
  PROXY_TYPES,
  IP_VERSIONS,
  ROTATION_TYPES,
  PROXY_SCHEMES,
  type ProxyType,
  type IpVersion,
  type RotationType,
  type ProxyScheme,
  type Endpoint,
  type EndpointFields,
  type HttpProxySpec,
  type BrowserProxySpec,
  type AcquireRequest,
} from './endpoint/types.js';
export {
  loadProviderConfigs,
  resolveProviderConfigs,
} from './config/loader.js';
export {
  PROVIDER_TYPES,
  type ProviderConfig,
  type ProviderType,
  type Environment,
} from './config/types.js';
export {
  ProxyBrokerError,
  ConfigurationError,
  ConcurrencyLimitError,
  NoProviderAvailableError,
  ProviderGenerationError,
  UnknownProviderError,
  type ProxyBrokerErrorCode,
} from './errors.js';
export type { ProxyProvider } from './providers/types.js';
export { createProvider, type ProviderFactory } from './providers/factory.js';
export { StaticListProvider } from './providers/static-list.js';
export { BrightDataProvider } from './providers/brightdata.js';
export { MooProxyProvider } from './providers/mooproxy.js';
export { ProxyMeter } from './meter/proxy-meter.js';
export type {
  EndpointMetrics,
  RequestUsage,
  ProviderUsage,
  UsageSummary,
} from './meter/types.js';
export { ProxyManager } from './manager/proxy-manager.js';
export type {
  ManagerAcquireRequest,
  ManagerStats,
  ProviderStats,
  ProxyManagerOptions,
} from './manager/types.js';
export { ProxyTester, summarizeTestResults } from './tester/proxy-tester.js';
export { classifyProbeError, extractEgressIp } from './tester/classify.js';
export type {
  TestErrorClass,
  TestResult,
  ProbeOptions,
  BatchOptions,
  ProbeClient,
  TestSummary,
} from './tester/types.js';
export { detectProxy, type ProxyDetection } from './detect/proxy-detector.js';
