type ProxyBrokerErrorCode =
  | 'configuration'
  | 'concurrency-limit'
  | 'no-provider-available'
  | 'provider-generation'
  | 'unknown-provider';

abstract class ProxyBrokerError extends Error {
  abstract readonly code: ProxyBrokerErrorCode;
}

/**
 * Raised while loading provider descriptors or building providers from them:
 * malformed entries, unresolved `env:` references, empty static pools.
 */
class ConfigurationError extends ProxyBrokerError {
  readonly code = 'configuration' as const;
  readonly variable: string | undefined;

  constructor(message: string, options?: { variable?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ConfigurationError';
    this.variable = options?.variable;
  }
}

class ConcurrencyLimitError extends ProxyBrokerError {
  readonly code = 'concurrency-limit' as const;
  readonly provider: string;
  readonly limit: number;

  constructor(provider: string, limit: number) {
    super(`Provider "${provider}" is at its concurrency limit (${limit})`);
    this.name = 'ConcurrencyLimitError';
    this.provider = provider;
    this.limit = limit;
  }
}

class NoProviderAvailableError extends ProxyBrokerError {
  readonly code = 'no-provider-available' as const;
  readonly candidates: readonly string[];

  constructor(candidates: readonly string[]) {
    super(
      candidates.length === 0
        ? 'No proxy providers are configured'
        : `No proxy provider has spare capacity (tried: ${candidates.join(', ')})`,
    );
    this.name = 'NoProviderAvailableError';
    this.candidates = candidates;
  }
}

class ProviderGenerationError extends ProxyBrokerError {
  readonly code = 'provider-generation' as const;
  readonly provider: string;

  constructor(provider: string, message: string) {
    super(`Provider "${provider}" could not produce an endpoint: ${message}`);
    this.name = 'ProviderGenerationError';
    this.provider = provider;
  }
}

class UnknownProviderError extends ProxyBrokerError {
  readonly code = 'unknown-provider' as const;
  readonly provider: string;

  constructor(provider: string) {
    super(`Proxy provider not found: ${provider}`);
    this.name = 'UnknownProviderError';
    this.provider = provider;
  }
}

export {
  ProxyBrokerError,
  ConfigurationError,
  ConcurrencyLimitError,
  NoProviderAvailableError,
  ProviderGenerationError,
  UnknownProviderError,
};
export type { ProxyBrokerErrorCode };
