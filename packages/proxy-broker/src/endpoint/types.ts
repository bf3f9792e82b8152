const PROXY_TYPES = ['residential', 'datacenter', 'isp', 'mobile'] as const;
const IP_VERSIONS = ['ipv4', 'ipv6'] as const;
const ROTATION_TYPES = ['rotating', 'sticky'] as const;
const PROXY_SCHEMES = ['http', 'https', 'socks4', 'socks5'] as const;

type ProxyType = (typeof PROXY_TYPES)[number];
type IpVersion = (typeof IP_VERSIONS)[number];
type RotationType = (typeof ROTATION_TYPES)[number];
type ProxyScheme = (typeof PROXY_SCHEMES)[number];

type Endpoint = {
  readonly scheme: ProxyScheme;
  readonly host: string;
  readonly port: number;
  readonly username?: string;
  readonly password?: string;
  readonly provider: string;
  readonly session?: string;
  readonly proxyType: ProxyType;
  readonly ipVersion: IpVersion;
  readonly rotationType: RotationType;
  readonly region?: string;
  readonly metadata: Readonly<Record<string, string>>;
};

type EndpointFields = {
  scheme?: ProxyScheme;
  host: string;
  port: number;
  username?: string;
  password?: string;
  provider: string;
  session?: string;
  proxyType: ProxyType;
  ipVersion: IpVersion;
  rotationType: RotationType;
  region?: string;
  metadata?: Record<string, string>;
};

/** `{ http, https }` map understood by generic HTTP client libraries. */
type HttpProxySpec = {
  http: string;
  https: string;
};

/** Proxy option shape taken by headless-browser drivers. */
type BrowserProxySpec = {
  server: string;
  username?: string;
  password?: string;
};

type AcquireRequest = {
  region?: string;
  purpose?: string;
};

export type {
  ProxyType,
  IpVersion,
  RotationType,
  ProxyScheme,
  Endpoint,
  EndpointFields,
  HttpProxySpec,
  BrowserProxySpec,
  AcquireRequest,
};
export { PROXY_TYPES, IP_VERSIONS, ROTATION_TYPES, PROXY_SCHEMES };
