import memjs from "memjs";
import { Temporal } from "temporal-polyfill";

import type { Config } from "../config.js";

export type ResponseCache = {
	get(key: string): Promise<Uint8Array | null>;
	set(key: string, value: Uint8Array, ttlSeconds: number): Promise<void>;
	close(): void;
};

export function createMemcachedCache(endpoint: string): ResponseCache {
	const client = memjs.Client.create(endpoint, { retries: 1, timeout: 0.5 });
	return {
		async get(key) {
			const { value } = await client.get(key);
			return value ?? null;
		},
		async set(key, value, ttlSeconds) {
			await client.set(key, Buffer.from(value), { expires: ttlSeconds });
		},
		close: () => client.close(),
	};
}

// Entries are only checked for expiry when they are read.
export function createMemoryCache(now: () => Temporal.Instant = () => Temporal.Now.instant()): ResponseCache {
	const entries = new Map<string, { value: Uint8Array; expiresAt: number }>();
	return {
		async get(key) {
			const entry = entries.get(key);
			if (typeof entry === "undefined") return null;
			if (now().epochMilliseconds >= entry.expiresAt) {
				entries.delete(key);
				return null;
			}
			return entry.value;
		},
		async set(key, value, ttlSeconds) {
			entries.set(key, { value, expiresAt: now().epochMilliseconds + ttlSeconds * 1000 });
		},
		close: () => entries.clear(),
	};
}

// Caching without a memcached endpoint keeps responses in this process.
export function createConfiguredCache({ app, caching }: Config): ResponseCache | undefined {
	if (!app.caching_enabled) return undefined;
	if (caching.caching_server_endpoint === "") return createMemoryCache();
	return createMemcachedCache(caching.caching_server_endpoint);
}
