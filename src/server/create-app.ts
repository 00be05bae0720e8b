import { Hono } from "hono";
import { cors } from "hono/cors";

import type { ResponseCache } from "../cache/response-cache.js";
import { type Config, type FeedKind, routeOf, ttlOf } from "../config.js";
import { assembleFeed } from "../gtfs-rt/assemble-feed.js";
import type { RowSource } from "../types/rows.js";
import { type FeedFormat, encodeFeed } from "../utils/gtfsrt-coding.js";

import { handleRequest, parseFormat } from "./handle-request.js";

export type AppDependencies = {
	config: Config;
	rowSource: RowSource;
	cache?: ResponseCache;
};

const FEED_KINDS: FeedKind[] = ["serviceAlerts", "tripUpdates", "vehiclePositions"];

export function createApp({ config, rowSource, cache }: AppDependencies) {
	const hono = new Hono();

	if (config.app.cors_enabled) {
		hono.use(
			"*",
			cors({
				origin: "*",
				allowMethods: ["GET"],
				allowHeaders: ["*"],
				credentials: true,
			}),
		);
	}

	const readCache = async (key: string) => {
		if (typeof cache === "undefined") return null;
		try {
			return await cache.get(key);
		} catch (cause) {
			console.error(new Error(`Failed to read '${key}' from the response cache.`, { cause }));
			return null;
		}
	};

	const writeCache = async (key: string, payload: Uint8Array, ttl: number) => {
		if (typeof cache === "undefined") return;
		try {
			await cache.set(key, payload, ttl);
		} catch (cause) {
			console.error(new Error(`Failed to write '${key}' to the response cache.`, { cause }));
		}
	};

	const producePayload = async (kind: FeedKind, format: FeedFormat) => {
		const feed = await assembleFeed(kind, rowSource, { alertLanguage: config.app.alert_language });
		return encodeFeed(feed, format);
	};

	for (const kind of FEED_KINDS) {
		const route = routeOf(config, kind);
		hono.get(route, async (c) => {
			const format = parseFormat(c.req.query("f"));
			const key = `${route}-${format}`;

			const cached = await readCache(key);
			if (cached !== null) return handleRequest(c, format, cached);

			const payload = await producePayload(kind, format);
			await writeCache(key, payload, ttlOf(config, kind));
			return handleRequest(c, format, payload);
		});
	}

	hono.onError((error, c) => {
		console.error(new Error(`Failed to serve '${c.req.path}'.`, { cause: error }));
		return c.text("Internal Server Error", 500);
	});

	return hono;
}
