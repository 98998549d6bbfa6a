import type { ProviderClient, ProviderClientFactory, SessionKey } from '../types/index.js';

export interface SessionCache {
  getClient(key: SessionKey): Promise<ProviderClient>;
  size(): number;
}

const cacheKey = ({ region, profile }: SessionKey): string =>
  `${profile ?? 'default'}:${region ?? 'default'}`;

/**
 * Per-run cache of provider clients keyed by profile and region. The pending
 * promise is stored before the first await, so concurrent first requests for
 * a key share one client creation. A failed creation is forgotten.
 */
export const createSessionCache = ({
  createClient,
}: {
  createClient: ProviderClientFactory;
}): SessionCache => {
  const clients = new Map<string, Promise<ProviderClient>>();

  return {
    getClient: (key) => {
      const id = cacheKey(key);
      const cached = clients.get(id);
      if (cached) return cached;

      const pending = createClient(key).catch((error: unknown) => {
        clients.delete(id);
        throw error;
      });
      clients.set(id, pending);
      return pending;
    },
    size: () => clients.size,
  };
};
