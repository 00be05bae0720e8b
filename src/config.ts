import { readFile } from "node:fs/promises";
import { parse } from "yaml";

export type FeedKind = "serviceAlerts" | "tripUpdates" | "vehiclePositions";

export type Config = {
	app: {
		caching_enabled: boolean;
		cors_enabled: boolean;
		alert_language: string;
		routing: {
			service_alerts_endpoint: string;
			trip_updates_endpoint: string;
			vehicle_positions_endpoint: string;
		};
	};
	caching: {
		caching_server_endpoint: string;
		caching_service_alerts_ttl_seconds: number;
		caching_trip_updates_ttl_seconds: number;
		caching_vehicle_positions_ttl_seconds: number;
	};
	notifications: {
		enabled: boolean;
		hub_endpoint: string;
		channel: string;
	};
};

export const DEFAULT_CONFIG: Config = {
	app: {
		caching_enabled: false,
		cors_enabled: false,
		alert_language: "de-DE",
		routing: {
			service_alerts_endpoint: "/gtfs/realtime/service-alerts.pbf",
			trip_updates_endpoint: "/gtfs/realtime/trip-updates.pbf",
			vehicle_positions_endpoint: "/gtfs/realtime/vehicle-positions.pbf",
		},
	},
	caching: {
		caching_server_endpoint: "",
		caching_service_alerts_ttl_seconds: 60,
		caching_trip_updates_ttl_seconds: 30,
		caching_vehicle_positions_ttl_seconds: 15,
	},
	notifications: {
		enabled: false,
		hub_endpoint: "",
		channel: "realtime",
	},
};

export class ConfigError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "ConfigError";
	}
}

export function routeOf(config: Config, kind: FeedKind) {
	switch (kind) {
		case "serviceAlerts":
			return config.app.routing.service_alerts_endpoint;
		case "tripUpdates":
			return config.app.routing.trip_updates_endpoint;
		case "vehiclePositions":
			return config.app.routing.vehicle_positions_endpoint;
	}
}

export function ttlOf(config: Config, kind: FeedKind) {
	switch (kind) {
		case "serviceAlerts":
			return config.caching.caching_service_alerts_ttl_seconds;
		case "tripUpdates":
			return config.caching.caching_trip_updates_ttl_seconds;
		case "vehiclePositions":
			return config.caching.caching_vehicle_positions_ttl_seconds;
	}
}

//- Loading

export async function loadConfig(path?: string): Promise<Config> {
	if (typeof path === "undefined") return DEFAULT_CONFIG;

	let contents: string;
	try {
		contents = await readFile(path, "utf-8");
	} catch (cause) {
		if (isMissingFile(cause)) {
			console.warn(`|> Configuration file '${path}' not found, using defaults.`);
			return DEFAULT_CONFIG;
		}
		throw new ConfigError(`Unable to read configuration file '${path}'.`, { cause });
	}

	return parseConfig(contents);
}

export function parseConfig(contents: string): Config {
	let document: unknown;
	try {
		document = parse(contents);
	} catch (cause) {
		throw new ConfigError("Configuration is not valid YAML.", { cause });
	}

	if (document === null || typeof document === "undefined") return DEFAULT_CONFIG;
	const root = section(document, "configuration");
	const app = section(root.app, "app");
	const routing = section(app.routing, "app.routing");
	const caching = section(root.caching, "caching");
	const notifications = section(root.notifications, "notifications");
	const defaults = DEFAULT_CONFIG;

	return {
		app: {
			caching_enabled: read(app, "app", "caching_enabled", isBoolean, defaults.app.caching_enabled),
			cors_enabled: read(app, "app", "cors_enabled", isBoolean, defaults.app.cors_enabled),
			alert_language: read(app, "app", "alert_language", isString, defaults.app.alert_language),
			routing: {
				service_alerts_endpoint: read(
					routing,
					"app.routing",
					"service_alerts_endpoint",
					isRoute,
					defaults.app.routing.service_alerts_endpoint,
				),
				trip_updates_endpoint: read(
					routing,
					"app.routing",
					"trip_updates_endpoint",
					isRoute,
					defaults.app.routing.trip_updates_endpoint,
				),
				vehicle_positions_endpoint: read(
					routing,
					"app.routing",
					"vehicle_positions_endpoint",
					isRoute,
					defaults.app.routing.vehicle_positions_endpoint,
				),
			},
		},
		caching: {
			caching_server_endpoint: read(
				caching,
				"caching",
				"caching_server_endpoint",
				isString,
				defaults.caching.caching_server_endpoint,
			),
			caching_service_alerts_ttl_seconds: read(
				caching,
				"caching",
				"caching_service_alerts_ttl_seconds",
				isTtl,
				defaults.caching.caching_service_alerts_ttl_seconds,
			),
			caching_trip_updates_ttl_seconds: read(
				caching,
				"caching",
				"caching_trip_updates_ttl_seconds",
				isTtl,
				defaults.caching.caching_trip_updates_ttl_seconds,
			),
			caching_vehicle_positions_ttl_seconds: read(
				caching,
				"caching",
				"caching_vehicle_positions_ttl_seconds",
				isTtl,
				defaults.caching.caching_vehicle_positions_ttl_seconds,
			),
		},
		notifications: {
			enabled: read(notifications, "notifications", "enabled", isBoolean, defaults.notifications.enabled),
			hub_endpoint: read(
				notifications,
				"notifications",
				"hub_endpoint",
				isString,
				defaults.notifications.hub_endpoint,
			),
			channel: read(notifications, "notifications", "channel", isString, defaults.notifications.channel),
		},
	};
}

// ---

type Section = Record<string, unknown>;

const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";
const isString = (value: unknown): value is string => typeof value === "string";
const isRoute = (value: unknown): value is string => typeof value === "string" && value.startsWith("/");
const isTtl = (value: unknown): value is number => typeof value === "number" && Number.isInteger(value) && value > 0;

function isSection(value: unknown): value is Section {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(value: unknown, name: string): Section {
	if (typeof value === "undefined" || value === null) return {};
	if (!isSection(value)) throw new ConfigError(`Configuration entry '${name}' must be a mapping.`);
	return value;
}

function read<T>(values: Section, name: string, key: string, guard: (value: unknown) => value is T, fallback: T) {
	const value = values[key];
	if (typeof value === "undefined" || value === null) return fallback;
	if (!guard(value)) throw new ConfigError(`Configuration entry '${name}.${key}' has an invalid value.`);
	return value;
}

function isMissingFile(error: unknown) {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}
