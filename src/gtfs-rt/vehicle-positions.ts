import {
	CONGESTION_LEVELS,
	type Position,
	VEHICLE_STOP_STATUSES,
	type VehiclePositionEntity,
} from "../types/gtfs-rt.js";
import type { VehiclePositionRow } from "../types/rows.js";
import { optionalEnumValue } from "../utils/enum-value.js";

import { buildTripDescriptor, buildVehicleDescriptor } from "./descriptors.js";

export function buildVehiclePositionEntities(rows: VehiclePositionRow[]): VehiclePositionEntity[] {
	return rows.map((row) => {
		const trip = buildTripDescriptor(row);
		const vehicle = buildVehicleDescriptor(row);
		const currentStatus = optionalEnumValue(VEHICLE_STOP_STATUSES, row.currentStatus, "VehiclePosition.current_status");
		const congestionLevel = optionalEnumValue(
			CONGESTION_LEVELS,
			row.congestionLevel,
			"VehiclePosition.congestion_level",
		);

		return {
			id: row.vehiclePositionId,
			vehicle: {
				...(typeof trip !== "undefined" ? { trip } : {}),
				...(typeof vehicle !== "undefined" ? { vehicle } : {}),
				position: buildPosition(row),
				...(row.currentStopSequence !== null ? { currentStopSequence: row.currentStopSequence } : {}),
				...(row.stopId !== null ? { stopId: row.stopId } : {}),
				...(typeof currentStatus !== "undefined" ? { currentStatus } : {}),
				...(row.timestamp !== null ? { timestamp: row.timestamp } : {}),
				...(typeof congestionLevel !== "undefined" ? { congestionLevel } : {}),
			},
		};
	});
}

function buildPosition(row: VehiclePositionRow): Position {
	return {
		latitude: row.positionLatitude,
		longitude: row.positionLongitude,
		...(row.positionBearing !== null ? { bearing: row.positionBearing } : {}),
		...(row.positionOdometer !== null ? { odometer: row.positionOdometer } : {}),
		...(row.positionSpeed !== null ? { speed: row.positionSpeed } : {}),
	};
}
