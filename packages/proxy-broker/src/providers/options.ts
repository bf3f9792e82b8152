import { ConfigurationError } from '../errors.js';
import type { ProviderConfig } from '../config/types.js';
import { isProxyScheme, parsePort } from '../endpoint/proxy-string.js';
import {
  IP_VERSIONS,
  PROXY_TYPES,
  ROTATION_TYPES,
  type IpVersion,
  type ProxyScheme,
  type ProxyType,
  type RotationType,
} from '../endpoint/types.js';

function readOption(config: ProviderConfig, key: string): string | undefined {
  const value = config.options[key]?.trim();
  return value ? value : undefined;
}

function requireOption(config: ProviderConfig, key: string): string {
  const value = readOption(config, key);
  if (value === undefined) {
    throw new ConfigurationError(
      `Provider "${config.name}" (${config.type}) requires option "${key}"`,
    );
  }
  return value;
}

function readEnumOption<T extends string>(
  config: ProviderConfig,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = readOption(config, key)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }

  const match = allowed.find((value) => value === raw);
  if (match === undefined) {
    throw new ConfigurationError(
      `Provider "${config.name}" option "${key}" must be one of ${allowed.join(', ')} (got "${raw}")`,
    );
  }
  return match;
}

function readProxyType(config: ProviderConfig, fallback: ProxyType): ProxyType {
  return readEnumOption(config, 'proxy_type', PROXY_TYPES, fallback);
}

function readIpVersion(config: ProviderConfig): IpVersion {
  return readEnumOption(config, 'ip_version', IP_VERSIONS, 'ipv4');
}

function readRotationType(
  config: ProviderConfig,
  fallback: RotationType,
): RotationType {
  return readEnumOption(config, 'rotation_type', ROTATION_TYPES, fallback);
}

function readScheme(config: ProviderConfig, fallback: ProxyScheme): ProxyScheme {
  const raw = readOption(config, 'scheme')?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }

  if (!isProxyScheme(raw)) {
    throw new ConfigurationError(
      `Provider "${config.name}" option "scheme" is not a supported proxy scheme: ${raw}`,
    );
  }
  return raw;
}

function readPort(config: ProviderConfig, fallback?: number): number {
  const raw = readOption(config, 'port');
  if (raw === undefined && fallback !== undefined) {
    return fallback;
  }

  const port = parsePort(raw);
  if (port === undefined) {
    throw new ConfigurationError(
      `Provider "${config.name}" option "port" must be an integer between 1 and 65535 (got "${raw ?? ''}")`,
    );
  }
  return port;
}

export {
  readOption,
  requireOption,
  readProxyType,
  readIpVersion,
  readRotationType,
  readScheme,
  readPort,
};
