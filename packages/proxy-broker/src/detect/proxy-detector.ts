import { parseProxyString, type ParsedProxyString } from '../endpoint/proxy-string.js';
import type {
  IpVersion,
  ProxyScheme,
  ProxyType,
  RotationType,
} from '../endpoint/types.js';

type ProxyDetection = ParsedProxyString & {
  scheme: ProxyScheme;
  provider?: string;
  proxyType: ProxyType;
  ipVersion: IpVersion;
  rotationType: RotationType;
  session?: string;
  region?: string;
};

const PROVIDER_PATTERNS: ReadonlyArray<[provider: string, patterns: RegExp[]]> = [
  ['mooproxy', [/mooproxy\.net/i, /_session-[A-Za-z0-9]+/]],
  ['brightdata', [/lum-superproxy\.io/i, /zproxy\.lum/i, /brd\.superproxy\.io/i]],
  ['smartproxy', [/smartproxy\.com/i, /gate\.smartproxy/i]],
  ['oxylabs', [/oxylabs\.io/i, /pr\.oxylabs/i]],
  ['iproyal', [/iproyal\.com/i]],
];

const TYPE_HINTS: ReadonlyArray<[ProxyType, string[]]> = [
  ['residential', ['residential', 'resi', 'home', 'dsl', 'cable']],
  ['isp', ['isp', 'static-residential']],
  ['mobile', ['mobile', '4g', '5g', 'cellular']],
];

export function detectProvider(
  host: string,
  username?: string,
  password?: string,
): string | undefined {
  const haystack = `${host} ${username ?? ''} ${password ?? ''}`;
  const match = PROVIDER_PATTERNS.find(([, patterns]) =>
    patterns.some((pattern) => pattern.test(haystack)),
  );
  return match?.[0];
}

export function detectProxyType(host: string, password?: string): ProxyType {
  const haystack = `${host} ${password ?? ''}`.toLowerCase();
  const match = TYPE_HINTS.find(([, hints]) =>
    hints.some((hint) => haystack.includes(hint)),
  );
  return match?.[0] ?? 'datacenter';
}

export function detectIpVersion(host: string): IpVersion {
  const lower = host.toLowerCase();
  return host.includes(':') || lower.includes('ipv6') || /(^|[.-])v6([.-]|$)/.test(lower)
    ? 'ipv6'
    : 'ipv4';
}

export function extractSessionId(
  username?: string,
  password?: string,
): string | undefined {
  return (
    password?.match(/_session-([A-Za-z0-9-]+)/)?.[1] ??
    username?.match(/-session-([A-Za-z0-9]+)/)?.[1]
  );
}

export function extractRegion(
  username?: string,
  password?: string,
): string | undefined {
  const region =
    password?.match(/_country-([A-Za-z]{2})(?![A-Za-z])/)?.[1] ??
    username?.match(/-country-([A-Za-z]{2})(?![A-Za-z])/)?.[1];
  return region?.toUpperCase();
}

/**
 * Session-tagged credentials pin the egress IP; a gateway without a session
 * tag rotates per request. Plain `host:port` entries are treated as sticky.
 */
export function detectRotationType(
  session: string | undefined,
  provider: string | undefined,
): RotationType {
  if (session) {
    return 'sticky';
  }

  return provider === 'brightdata' || provider === 'smartproxy' || provider === 'oxylabs'
    ? 'rotating'
    : 'sticky';
}

export function detectProxy(line: string): ProxyDetection | undefined {
  const parsed = parseProxyString(line);
  if (!parsed) {
    return undefined;
  }

  const { host, username, password } = parsed;
  const provider = detectProvider(host, username, password);
  const session = extractSessionId(username, password);
  const region = extractRegion(username, password);

  return {
    ...parsed,
    scheme: parsed.scheme ?? 'http',
    proxyType: detectProxyType(host, password),
    ipVersion: detectIpVersion(host),
    rotationType: detectRotationType(session, provider),
    ...(provider !== undefined && { provider }),
    ...(session !== undefined && { session }),
    ...(region !== undefined && { region }),
  };
}

export type { ProxyDetection };
