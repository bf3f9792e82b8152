const PROVIDER_TYPES = ['static_list', 'brightdata', 'mooproxy'] as const;

type ProviderType = (typeof PROVIDER_TYPES)[number];

/**
 * A provider descriptor after validation and secret resolution. Frozen once
 * built; `options` no longer contains any `env:` references.
 */
type ProviderConfig = {
  readonly name: string;
  readonly type: ProviderType;
  /** `null` when the provider is not priced; it then sorts last and costs nothing. */
  readonly pricePerGb: number | null;
  /** `null` means unlimited. */
  readonly concurrencyLimit: number | null;
  readonly options: Readonly<Record<string, string>>;
};

type Environment = Readonly<Record<string, string | undefined>>;

export type { ProviderType, ProviderConfig, Environment };
export { PROVIDER_TYPES };
