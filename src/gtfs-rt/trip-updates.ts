import {
	STOP_TIME_SCHEDULE_RELATIONSHIPS,
	type StopTimeEvent,
	type StopTimeUpdate,
	type TripUpdateEntity,
} from "../types/gtfs-rt.js";
import type { StopTimeUpdateRow, TripUpdateRows } from "../types/rows.js";
import { enumValue } from "../utils/enum-value.js";
import { groupBy } from "../utils/group-by.js";

import { buildTripDescriptor, buildVehicleDescriptor } from "./descriptors.js";

export function buildTripUpdateEntities(rows: TripUpdateRows): TripUpdateEntity[] {
	const stopTimeUpdates = groupBy(rows.stopTimeUpdates, (stopTimeUpdate) => stopTimeUpdate.tripUpdateId);

	return rows.tripUpdates.map((row) => {
		const trip = buildTripDescriptor(row);
		const vehicle = buildVehicleDescriptor(row);

		return {
			id: row.tripUpdateId,
			tripUpdate: {
				...(typeof trip !== "undefined" ? { trip } : {}),
				...(typeof vehicle !== "undefined" ? { vehicle } : {}),
				stopTimeUpdate: (stopTimeUpdates.get(row.tripUpdateId) ?? []).map(buildStopTimeUpdate),
			},
		};
	});
}

// ---

function buildStopTimeEvent(time: number | null, delay: number | null, uncertainty: number | null): StopTimeEvent {
	return {
		...(time !== null ? { time } : {}),
		...(delay !== null ? { delay } : {}),
		...(uncertainty !== null ? { uncertainty } : {}),
	};
}

function buildStopTimeUpdate(row: StopTimeUpdateRow): StopTimeUpdate {
	return {
		...(row.stopSequence !== null ? { stopSequence: row.stopSequence } : {}),
		...(row.stopId !== null ? { stopId: row.stopId } : {}),
		arrival: buildStopTimeEvent(row.arrivalTime, row.arrivalDelay, row.arrivalUncertainty),
		departure: buildStopTimeEvent(row.departureTime, row.departureDelay, row.departureUncertainty),
		scheduleRelationship:
			row.scheduleRelationship !== null
				? enumValue(STOP_TIME_SCHEDULE_RELATIONSHIPS, row.scheduleRelationship, "StopTimeUpdate.schedule_relationship")
				: "SCHEDULED",
	};
}
