import { readFileSync } from 'node:fs';
import { createLogger } from '@workspace/logger';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import {
  PROVIDER_TYPES,
  type Environment,
  type ProviderConfig,
} from './types.js';

const log = createLogger('proxy-config');

const SECRET_PREFIX = 'env:';

const optionValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const providerDescriptorSchema = z.object({
  name: z.string().trim().min(1, 'Provider name must not be empty'),
  type: z.enum(PROVIDER_TYPES),
  price_per_gb: z
    .number()
    .min(0, 'price_per_gb must be >= 0')
    .nullable()
    .optional(),
  concurrency_limit: z
    .number()
    .int('concurrency_limit must be an integer')
    .min(0, 'concurrency_limit must be >= 0 (0 means unlimited)')
    .nullable()
    .optional(),
  options: z.record(z.string(), optionValueSchema).optional(),
});

// Both a bare array and `{ "providers": [...] }` are accepted.
const configFileSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { providers: value } : value),
  z.object({
    providers: z.array(providerDescriptorSchema),
  }),
);

type ProviderDescriptor = z.infer<typeof providerDescriptorSchema>;

/**
 * Validates raw provider descriptors and resolves every `env:VAR` option
 * against `env` exactly once. The returned configs are frozen and never
 * consult the environment again.
 */
export function resolveProviderConfigs(
  input: unknown,
  env: Environment = process.env,
): readonly ProviderConfig[] {
  const parsed = configFileSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') || '(root)';
    throw new ConfigurationError(
      `Invalid proxy configuration at ${path}: ${issue?.message ?? 'unknown error'}`,
    );
  }

  const seen = new Set<string>();
  const configs: ProviderConfig[] = [];

  for (const descriptor of parsed.data.providers) {
    if (seen.has(descriptor.name)) {
      throw new ConfigurationError(
        `Duplicate proxy provider name: ${descriptor.name}`,
      );
    }
    seen.add(descriptor.name);
    configs.push(toProviderConfig(descriptor, env));
  }

  log.info('Proxy provider configs resolved', {
    providers: configs.map((config) => config.name),
  });

  return Object.freeze(configs);
}

export function loadProviderConfigs(
  path: string,
  env: Environment = process.env,
): readonly ProviderConfig[] {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read proxy config file: ${path}`, {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Proxy config file is not valid JSON: ${path}`, {
      cause: error,
    });
  }

  return resolveProviderConfigs(data, env);
}

function toProviderConfig(
  descriptor: ProviderDescriptor,
  env: Environment,
): ProviderConfig {
  const options: Record<string, string> = {};

  for (const [key, value] of Object.entries(descriptor.options ?? {})) {
    options[key] = resolveSecret(descriptor.name, key, value, env);
  }

  const limit = descriptor.concurrency_limit;

  return Object.freeze({
    name: descriptor.name,
    type: descriptor.type,
    pricePerGb: descriptor.price_per_gb ?? null,
    concurrencyLimit: limit === undefined || limit === null || limit === 0 ? null : limit,
    options: Object.freeze(options),
  });
}

function resolveSecret(
  provider: string,
  key: string,
  value: string,
  env: Environment,
): string {
  if (!value.startsWith(SECRET_PREFIX)) {
    return value;
  }

  const variable = value.slice(SECRET_PREFIX.length).trim();
  if (!variable) {
    throw new ConfigurationError(
      `Provider "${provider}" option "${key}" has an empty env: reference`,
    );
  }

  const resolved = env[variable];
  if (resolved === undefined || resolved === '') {
    throw new ConfigurationError(
      `Provider "${provider}" option "${key}" references environment variable ${variable}, which is not set`,
      { variable },
    );
  }

  log.debug('Resolved option from environment', { provider, key, variable });
  return resolved;
}
