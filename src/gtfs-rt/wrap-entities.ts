import { Temporal } from "temporal-polyfill";

import type { Feed, FeedEntity } from "../types/gtfs-rt.js";

export function wrapEntities(data: FeedEntity[], now = Temporal.Now.instant()): Feed {
	return {
		header: {
			gtfsRealtimeVersion: "2.0",
			incrementality: "FULL_DATASET",
			timestamp: Math.floor(now.epochMilliseconds / 1000),
		},
		entity: data,
	};
}
