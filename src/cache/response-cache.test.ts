import { Temporal } from "temporal-polyfill";
import { describe, expect, it } from "vitest";

import { DEFAULT_CONFIG } from "../config.js";

import { createConfiguredCache, createMemoryCache } from "./response-cache.js";

describe("createMemoryCache", () => {
	it("returns null for an unknown key", async () => {
		const cache = createMemoryCache();
		expect(await cache.get("missing")).toBeNull();
	});

	it("expires entries once their TTL has elapsed", async () => {
		let now = Temporal.Instant.fromEpochMilliseconds(1_000);
		const cache = createMemoryCache(() => now);
		const payload = Uint8Array.from([1, 2, 3]);

		await cache.set("/feed-protobuf", payload, 30);
		now = now.add({ seconds: 29 });
		expect(await cache.get("/feed-protobuf")).toBe(payload);

		now = now.add({ seconds: 1 });
		expect(await cache.get("/feed-protobuf")).toBeNull();
	});

	it("forgets everything when closed", async () => {
		const cache = createMemoryCache();
		await cache.set("key", Uint8Array.from([7]), 60);
		cache.close();
		expect(await cache.get("key")).toBeNull();
	});
});

describe("createConfiguredCache", () => {
	it("returns no cache when caching is disabled", () => {
		expect(createConfiguredCache(DEFAULT_CONFIG)).toBeUndefined();
	});

	it("keeps responses in memory when no memcached endpoint is configured", async () => {
		const cache = createConfiguredCache({ ...DEFAULT_CONFIG, app: { ...DEFAULT_CONFIG.app, caching_enabled: true } });
		const payload = Uint8Array.from([4, 2]);

		await cache?.set("/feed-json", payload, 60);
		expect(await cache?.get("/feed-json")).toBe(payload);
	});
});
