import type { FeedKind } from "../config.js";
import type { Feed, FeedEntity } from "../types/gtfs-rt.js";
import type { RowSource } from "../types/rows.js";

import { buildServiceAlertEntities } from "./service-alerts.js";
import { buildTripUpdateEntities } from "./trip-updates.js";
import { buildVehiclePositionEntities } from "./vehicle-positions.js";
import { wrapEntities } from "./wrap-entities.js";

export type AssembleOptions = {
	alertLanguage: string;
};

async function fetchEntities(kind: FeedKind, rowSource: RowSource, options: AssembleOptions): Promise<FeedEntity[]> {
	switch (kind) {
		case "serviceAlerts":
			return buildServiceAlertEntities(await rowSource.fetchServiceAlerts(), options.alertLanguage);
		case "tripUpdates":
			return buildTripUpdateEntities(await rowSource.fetchTripUpdates());
		case "vehiclePositions":
			return buildVehiclePositionEntities(await rowSource.fetchVehiclePositions());
	}
}

export async function assembleFeed(kind: FeedKind, rowSource: RowSource, options: AssembleOptions): Promise<Feed> {
	const entities = await fetchEntities(kind, rowSource, options);
	return wrapEntities(entities);
}
