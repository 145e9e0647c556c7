export interface ResultCacheOptions<T> {
	ttlMs: number;
	loader: (key: string) => Promise<T>;
	now?: () => number;
}

interface CachedEntry<T> {
	value: T;
	fetchedAt: number;
}

export interface ResultCache<T> {
	get: (key: string) => Promise<T>;
	/** Drops every cached and in-flight entry; the next `get` reloads. */
	clear: () => void;
	has: (key: string) => boolean;
}

/**
 * Per-key TTL cache. Concurrent `get` calls for one key share a single load;
 * failed loads are not cached.
 */
export const createResultCache = <T>(
	opts: ResultCacheOptions<T>
): ResultCache<T> => {
	if (!Number.isFinite(opts.ttlMs) || opts.ttlMs <= 0) {
		throw new Error(`Cache TTL must be positive, got ${opts.ttlMs}`);
	}
	const now = opts.now ?? Date.now;
	const cache = new Map<string, CachedEntry<T>>();
	const pending = new Map<string, Promise<T>>();
	let generation = 0;

	const isFresh = (key: string): boolean => {
		const entry = cache.get(key);
		return entry !== undefined && now() - entry.fetchedAt < opts.ttlMs;
	};

	const load = (key: string): Promise<T> => {
		const startedIn = generation;
		const promise = opts
			.loader(key)
			.then((value) => {
				if (startedIn === generation) {
					cache.set(key, { value, fetchedAt: now() });
				}
				return value;
			})
			.finally(() => {
				if (pending.get(key) === promise) {
					pending.delete(key);
				}
			});
		pending.set(key, promise);
		return promise;
	};

	return {
		get: async (key: string) => {
			const entry = cache.get(key);
			if (entry && isFresh(key)) {
				return entry.value;
			}
			return pending.get(key) ?? load(key);
		},
		clear: () => {
			generation += 1;
			cache.clear();
			pending.clear();
		},
		has: (key: string) => isFresh(key),
	};
};
