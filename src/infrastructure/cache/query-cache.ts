import type { ILogger } from '../logging/logger';

export interface QueryCacheStats {
	hits: number;
	misses: number;
	size: number;
	maxSize: number;
	evictions: number;
}

/**
 * Memo table for store lookups. A computed value (including `undefined`, the
 * "not found" outcome) is stored once and replayed; a computation that throws
 * stores nothing. When full, the oldest entry is evicted.
 */
export class QueryCache<V> {
	private readonly entries = new Map<string, { readonly value: V }>();
	private hits = 0;
	private misses = 0;
	private evictions = 0;

	constructor(
		private readonly maxSize: number,
		private readonly logger?: ILogger,
	) {}

	memoize(key: string, compute: () => V): V {
		const cached = this.entries.get(key);
		if (cached) {
			this.hits++;
			return cached.value;
		}

		this.misses++;
		const value = compute();
		this.set(key, value);
		return value;
	}

	has(key: string): boolean {
		return this.entries.has(key);
	}

	clear(): void {
		this.entries.clear();
	}

	getStats(): QueryCacheStats {
		return {
			hits: this.hits,
			misses: this.misses,
			size: this.entries.size,
			maxSize: this.maxSize,
			evictions: this.evictions,
		};
	}

	private set(key: string, value: V): void {
		if (this.maxSize <= 0) {
			return;
		}

		if (this.entries.size >= this.maxSize) {
			// Map iteration order is insertion order
			const oldestKey = this.entries.keys().next().value;
			if (oldestKey !== undefined) {
				this.entries.delete(oldestKey);
				this.evictions++;
				this.logger?.debug('Evicted query cache entry', { key: oldestKey });
			}
		}

		this.entries.set(key, { value });
	}
}
