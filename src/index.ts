import { serve } from "@hono/node-server";

import { createConfiguredCache } from "./cache/response-cache.js";
import { loadConfig } from "./config.js";
import { createRealtimeSource, openLake } from "./lake/realtime-source.js";
import { type ChangeListener, createChangeListener } from "./providers/change-listener.js";
import { createApp } from "./server/create-app.js";

const DATABASE_PATH = process.env.DATABASE_PATH ?? "gtfs-lake.db";
const CONFIG_PATH = process.env.CONFIG_PATH;
const PORT = +(process.env.PORT ?? 8080);

console.log("==> GTFS-RT Producer - Transit data lake <==");

// I - Configuration and data access

console.log("|> Loading configuration.");
const config = await loadConfig(CONFIG_PATH);

console.log(`|> Opening lake database '${DATABASE_PATH}'.`);
const db = openLake(DATABASE_PATH);
const rowSource = createRealtimeSource(db);

const cache = createConfiguredCache(config);
if (typeof cache !== "undefined") {
	const endpoint = config.caching.caching_server_endpoint;
	console.log(`|> Caching responses in ${endpoint === "" ? "memory" : `'${endpoint}'`}.`);
}

// II - Change notifications

let changeListener: ChangeListener | undefined;
if (config.notifications.enabled) {
	console.log("|> Connecting to the change notification hub.");
	changeListener = createChangeListener({
		hubEndpoint: config.notifications.hub_endpoint,
		channel: config.notifications.channel,
	});
	changeListener.start();
}

// III - Provide data via an API

console.log(`|> Publishing data on port ${PORT}.`);
const server = serve({ fetch: createApp({ config, rowSource, cache }).fetch, port: PORT });

const shutdown = async () => {
	console.log("|> Shutting down.");
	await changeListener?.stop();
	server.close();
	cache?.close();
	db.close();
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.once(signal, () => {
		shutdown().catch((error) => {
			console.error("Failed to shut down cleanly.", error);
			process.exitCode = 1;
		});
	});
}
