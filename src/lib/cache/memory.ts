type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export type MemoryCache = {
  get: <T>(key: string) => T | null;
  set: <T>(key: string, value: T, ttlMs: number) => void;
  remember: <T>(key: string, ttlMs: number, loader: () => Promise<T>) => Promise<T>;
  clear: () => void;
  size: () => number;
};

export const createMemoryCache = (clock: () => number = Date.now): MemoryCache => {
  const store = new Map<string, CacheEntry<unknown>>();

  const get = <T>(key: string): T | null => {
    const entry = store.get(key) as CacheEntry<T> | undefined;
    if (!entry) return null;
    if (entry.expiresAt <= clock()) {
      store.delete(key);
      return null;
    }
    return entry.value;
  };

  const set = <T>(key: string, value: T, ttlMs: number) => {
    if (ttlMs <= 0) return;
    store.set(key, { value, expiresAt: clock() + ttlMs });
  };

  // Rejected loads are not stored, so a failed lookup is retried on the next call.
  const remember = async <T>(key: string, ttlMs: number, loader: () => Promise<T>) => {
    const cached = get<T>(key);
    if (cached !== null) return cached;
    const value = await loader();
    set(key, value, ttlMs);
    return value;
  };

  return {
    get,
    set,
    remember,
    clear: () => store.clear(),
    size: () => store.size
  };
};

// NOTE: Per-process cache. Multi-node deployments should put a shared store in front of the provider.
export const sharedCache = createMemoryCache();
