import type {
	AlertActivePeriodRow,
	AlertInformedEntityRow,
	RowSource,
	ServiceAlertRow,
	ServiceAlertRows,
	StopTimeUpdateRow,
	TripReferenceColumns,
	TripUpdateRow,
	TripUpdateRows,
	VehiclePositionRow,
	VehicleReferenceColumns,
} from "../types/rows.js";

export const noTripReference: TripReferenceColumns = {
	tripId: null,
	tripRouteId: null,
	tripDirectionId: null,
	tripStartTime: null,
	tripStartDate: null,
	tripScheduleRelationship: null,
};

export const noVehicleReference: VehicleReferenceColumns = {
	vehicleId: null,
	vehicleLabel: null,
	vehicleLicensePlate: null,
	vehicleWheelchairAccessible: null,
};

export function serviceAlertRow(overrides: Partial<ServiceAlertRow> = {}): ServiceAlertRow {
	return {
		serviceAlertId: "SA1",
		cause: null,
		effect: null,
		headerText: null,
		descriptionText: null,
		...overrides,
	};
}

export function activePeriodRow(overrides: Partial<AlertActivePeriodRow> = {}): AlertActivePeriodRow {
	return { serviceAlertId: "SA1", startTimestamp: null, endTimestamp: null, ...overrides };
}

export function informedEntityRow(overrides: Partial<AlertInformedEntityRow> = {}): AlertInformedEntityRow {
	return {
		serviceAlertId: "SA1",
		agencyId: null,
		routeId: null,
		routeType: null,
		stopId: null,
		...noTripReference,
		...overrides,
	};
}

export function tripUpdateRow(overrides: Partial<TripUpdateRow> = {}): TripUpdateRow {
	return { tripUpdateId: "TU1", ...noTripReference, ...noVehicleReference, tripId: "T1", ...overrides };
}

export function stopTimeUpdateRow(overrides: Partial<StopTimeUpdateRow> = {}): StopTimeUpdateRow {
	return {
		tripUpdateId: "TU1",
		stopSequence: null,
		stopId: null,
		arrivalTime: null,
		arrivalDelay: null,
		arrivalUncertainty: null,
		departureTime: null,
		departureDelay: null,
		departureUncertainty: null,
		scheduleRelationship: null,
		...overrides,
	};
}

export function vehiclePositionRow(overrides: Partial<VehiclePositionRow> = {}): VehiclePositionRow {
	return {
		vehiclePositionId: "VP1",
		...noTripReference,
		...noVehicleReference,
		positionLatitude: 49.5,
		positionLongitude: 1.25,
		positionBearing: null,
		positionOdometer: null,
		positionSpeed: null,
		currentStopSequence: null,
		stopId: null,
		currentStatus: null,
		timestamp: null,
		congestionLevel: null,
		...overrides,
	};
}

export type MutableRowSource = RowSource & {
	serviceAlerts: ServiceAlertRows;
	tripUpdates: TripUpdateRows;
	vehiclePositions: VehiclePositionRow[];
};

export function createFakeRowSource(): MutableRowSource {
	const source: MutableRowSource = {
		serviceAlerts: { alerts: [], activePeriods: [], informedEntities: [] },
		tripUpdates: { tripUpdates: [], stopTimeUpdates: [] },
		vehiclePositions: [],
		fetchServiceAlerts: async () => source.serviceAlerts,
		fetchTripUpdates: async () => source.tripUpdates,
		fetchVehiclePositions: async () => source.vehiclePositions,
	};
	return source;
}
