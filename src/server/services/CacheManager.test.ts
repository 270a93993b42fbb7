import { describe, expect, it } from 'vitest';
import { CacheManager } from './CacheManager';

describe('CacheManager', () => {
	it('expires entries after the TTL', () => {
		let now = 0;
		const cache = new CacheManager<boolean>({ ttlSeconds: 60, now: () => now });
		cache.set('flag', true);

		now = 60_000;
		expect(cache.get('flag')).toBe(true);

		now = 60_001;
		expect(cache.get('flag')).toBeNull();
		expect(cache.getSize()).toBe(0);
	});

	it('evicts the oldest entry when full', () => {
		let now = 0;
		const cache = new CacheManager<number>({ maxSize: 2, now: () => now++ });
		cache.set('a', 1);
		cache.set('b', 2);
		cache.set('c', 3);

		expect(cache.get('a')).toBeNull();
		expect(cache.get('b')).toBe(2);
		expect(cache.get('c')).toBe(3);
	});

	it('overwrites an existing key without evicting', () => {
		const cache = new CacheManager<number>({ maxSize: 1 });
		cache.set('a', 1);
		cache.set('a', 2);
		expect(cache.get('a')).toBe(2);
	});

	it('forgets invalidated keys', () => {
		const cache = new CacheManager<string>();
		cache.set('a', 'x');
		cache.invalidate('a');
		expect(cache.get('a')).toBeNull();
	});
});
