import { LRUCache } from "lru-cache";

export type TTLCacheOptions = {
  ttlMs: number;
  maxEntries: number;
};

/** String-keyed LRU whose entries expire `ttlMs` after their last read or write. */
export function createTTLCache<V extends NonNullable<unknown>>(
  options: TTLCacheOptions,
): LRUCache<string, V> {
  return new LRUCache<string, V>({
    max: Math.max(1, Math.floor(options.maxEntries)),
    ttl: Math.max(1, Math.floor(options.ttlMs)),
    updateAgeOnGet: true,
    updateAgeOnHas: true,
  });
}
