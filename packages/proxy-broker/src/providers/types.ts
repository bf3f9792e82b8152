import type { ProviderType } from '../config/types.js';
import type { AcquireRequest, Endpoint } from '../endpoint/types.js';

/**
 * A source of endpoints. Implementations keep their rotation or session state
 * private; `acquire` is synchronous and never waits.
 */
interface ProxyProvider {
  readonly name: string;
  readonly type: ProviderType;
  acquire(request?: AcquireRequest): Endpoint;
}

export type { ProxyProvider };
