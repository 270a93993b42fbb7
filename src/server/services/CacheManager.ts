import { gradingConfig } from '@/config/grading';

interface CacheEntry<T> {
	value: T;
	timestamp: number;
}

interface CacheOptions {
	ttlSeconds?: number;
	maxSize?: number;
	now?: () => number;
}

export class CacheManager<T> {
	private cache: Map<string, CacheEntry<T>>;
	private readonly TTL: number;
	private readonly maxSize: number;
	private readonly now: () => number;

	constructor(options: CacheOptions = {}) {
		this.cache = new Map();
		this.TTL = (options.ttlSeconds ?? gradingConfig.caching.ttl) * 1000; // Convert to milliseconds
		this.maxSize = options.maxSize ?? gradingConfig.caching.maxSize;
		this.now = options.now ?? Date.now;
	}

	set(key: string, value: T): void {
		if (!this.cache.has(key) && this.cache.size >= this.maxSize) {
			this.evictOldest();
		}

		this.cache.set(key, {
			value,
			timestamp: this.now()
		});
	}

	get(key: string): T | null {
		const entry = this.cache.get(key);
		if (!entry) return null;

		if (this.now() - entry.timestamp > this.TTL) {
			this.cache.delete(key);
			return null;
		}

		return entry.value;
	}

	invalidate(key: string): void {
		this.cache.delete(key);
	}

	getSize(): number {
		return this.cache.size;
	}

	private evictOldest(): void {
		let oldestKey: string | null = null;
		let oldestTimestamp = Number.POSITIVE_INFINITY;
		for (const [key, entry] of this.cache) {
			if (entry.timestamp < oldestTimestamp) {
				oldestKey = key;
				oldestTimestamp = entry.timestamp;
			}
		}
		if (oldestKey !== null) this.cache.delete(oldestKey);
	}
}
