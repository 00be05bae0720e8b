import {
	TRIP_SCHEDULE_RELATIONSHIPS,
	type TripDescriptor,
	type VehicleDescriptor,
	WHEELCHAIR_ACCESSIBLE_VALUES,
} from "../types/gtfs-rt.js";
import type { TripReferenceColumns, VehicleReferenceColumns } from "../types/rows.js";
import { optionalEnumValue } from "../utils/enum-value.js";

export function buildTripDescriptor(row: TripReferenceColumns): TripDescriptor | undefined {
	if (
		row.tripId === null &&
		row.tripRouteId === null &&
		row.tripDirectionId === null &&
		row.tripStartTime === null &&
		row.tripStartDate === null &&
		row.tripScheduleRelationship === null
	) {
		return undefined;
	}

	const scheduleRelationship = optionalEnumValue(
		TRIP_SCHEDULE_RELATIONSHIPS,
		row.tripScheduleRelationship,
		"TripDescriptor.schedule_relationship",
	);

	return {
		...(row.tripId !== null ? { tripId: row.tripId } : {}),
		...(row.tripRouteId !== null ? { routeId: row.tripRouteId } : {}),
		...(row.tripDirectionId !== null ? { directionId: row.tripDirectionId } : {}),
		...(row.tripStartTime !== null ? { startTime: row.tripStartTime } : {}),
		...(row.tripStartDate !== null ? { startDate: row.tripStartDate } : {}),
		...(typeof scheduleRelationship !== "undefined" ? { scheduleRelationship } : {}),
	};
}

export function buildVehicleDescriptor(row: VehicleReferenceColumns): VehicleDescriptor | undefined {
	if (
		row.vehicleId === null &&
		row.vehicleLabel === null &&
		row.vehicleLicensePlate === null &&
		row.vehicleWheelchairAccessible === null
	) {
		return undefined;
	}

	const wheelchairAccessible = optionalEnumValue(
		WHEELCHAIR_ACCESSIBLE_VALUES,
		row.vehicleWheelchairAccessible,
		"VehicleDescriptor.wheelchair_accessible",
	);

	return {
		...(row.vehicleId !== null ? { id: row.vehicleId } : {}),
		...(row.vehicleLabel !== null ? { label: row.vehicleLabel } : {}),
		...(row.vehicleLicensePlate !== null ? { licensePlate: row.vehicleLicensePlate } : {}),
		...(typeof wheelchairAccessible !== "undefined" ? { wheelchairAccessible } : {}),
	};
}
