import type {
  BrowserProxySpec,
  Endpoint,
  EndpointFields,
  HttpProxySpec,
} from './types.js';

export function createEndpoint(fields: EndpointFields): Endpoint {
  const endpoint: Endpoint = {
    scheme: fields.scheme ?? 'http',
    host: fields.host,
    port: fields.port,
    provider: fields.provider,
    proxyType: fields.proxyType,
    ipVersion: fields.ipVersion,
    rotationType: fields.rotationType,
    metadata: Object.freeze({ ...fields.metadata }),
    ...(fields.username !== undefined && { username: fields.username }),
    ...(fields.password !== undefined && { password: fields.password }),
    ...(fields.session !== undefined && { session: fields.session }),
    ...(fields.region !== undefined && { region: fields.region }),
  };

  return Object.freeze(endpoint);
}

/**
 * Identity used for admission accounting and metering. Two endpoints with the
 * same key are the same lease target, even if they are distinct objects.
 */
export function endpointKey(endpoint: Endpoint): string {
  return `${endpoint.provider}:${endpoint.host}:${endpoint.port}:${endpoint.session ?? ''}`;
}

export function describeEndpoint(endpoint: Endpoint): string {
  return `${endpoint.scheme}://${formatHost(endpoint.host)}:${endpoint.port}`;
}

export function asHttpProxySpec(endpoint: Endpoint): HttpProxySpec {
  const url = `${endpoint.scheme}://${formatUserInfo(endpoint)}${formatHost(endpoint.host)}:${endpoint.port}`;
  return { http: url, https: url };
}

export function asBrowserProxySpec(endpoint: Endpoint): BrowserProxySpec {
  const spec: BrowserProxySpec = { server: describeEndpoint(endpoint) };

  if (endpoint.username) {
    spec.username = endpoint.username;
  }

  if (endpoint.password) {
    spec.password = endpoint.password;
  }

  return spec;
}

function formatUserInfo(endpoint: Endpoint): string {
  if (!endpoint.username) {
    return '';
  }

  const user = encodeURIComponent(endpoint.username);
  return endpoint.password
    ? `${user}:${encodeURIComponent(endpoint.password)}@`
    : `${user}@`;
}

function formatHost(host: string): string {
  return host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
}
