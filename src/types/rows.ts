//- Lake rows, one type per realtime table. Nullable columns stay `null` when unset.

export type TripReferenceColumns = {
	tripId: string | null;
	tripRouteId: string | null;
	tripDirectionId: number | null;
	tripStartTime: string | null;
	tripStartDate: string | null;
	tripScheduleRelationship: string | null;
};

export type VehicleReferenceColumns = {
	vehicleId: string | null;
	vehicleLabel: string | null;
	vehicleLicensePlate: string | null;
	vehicleWheelchairAccessible: string | null;
};

export type ServiceAlertRow = {
	serviceAlertId: string;
	cause: string | null;
	effect: string | null;
	headerText: string | null;
	descriptionText: string | null;
};

export type AlertActivePeriodRow = {
	serviceAlertId: string;
	startTimestamp: number | null;
	endTimestamp: number | null;
};

export type AlertInformedEntityRow = TripReferenceColumns & {
	serviceAlertId: string;
	agencyId: string | null;
	routeId: string | null;
	routeType: number | null;
	stopId: string | null;
};

export type TripUpdateRow = TripReferenceColumns &
	VehicleReferenceColumns & {
		tripUpdateId: string;
	};

export type StopTimeUpdateRow = {
	tripUpdateId: string;
	stopSequence: number | null;
	stopId: string | null;
	arrivalTime: number | null;
	arrivalDelay: number | null;
	arrivalUncertainty: number | null;
	departureTime: number | null;
	departureDelay: number | null;
	departureUncertainty: number | null;
	scheduleRelationship: string | null;
};

export type VehiclePositionRow = TripReferenceColumns &
	VehicleReferenceColumns & {
		vehiclePositionId: string;
		positionLatitude: number;
		positionLongitude: number;
		positionBearing: number | null;
		positionOdometer: number | null;
		positionSpeed: number | null;
		currentStopSequence: number | null;
		stopId: string | null;
		currentStatus: string | null;
		timestamp: number | null;
		congestionLevel: string | null;
	};

//- Row sets returned by the lake, one per feed.

export type ServiceAlertRows = {
	alerts: ServiceAlertRow[];
	activePeriods: AlertActivePeriodRow[];
	informedEntities: AlertInformedEntityRow[];
};

export type TripUpdateRows = {
	tripUpdates: TripUpdateRow[];
	stopTimeUpdates: StopTimeUpdateRow[];
};

export type RowSource = {
	fetchServiceAlerts(): Promise<ServiceAlertRows>;
	fetchTripUpdates(): Promise<TripUpdateRows>;
	fetchVehiclePositions(): Promise<VehiclePositionRow[]>;
};
