import Database from "better-sqlite3";

import type {
	AlertActivePeriodRow,
	AlertInformedEntityRow,
	RowSource,
	ServiceAlertRow,
	StopTimeUpdateRow,
	TripUpdateRow,
	VehiclePositionRow,
} from "../types/rows.js";

import { ensureRealtimeSchema } from "./schema.js";

const TRIP_REFERENCE_SELECT = `
	trip_id AS tripId,
	trip_route_id AS tripRouteId,
	trip_direction_id AS tripDirectionId,
	trip_start_time AS tripStartTime,
	trip_start_date AS tripStartDate,
	trip_schedule_relationship AS tripScheduleRelationship`;

const VEHICLE_REFERENCE_SELECT = `
	vehicle_id AS vehicleId,
	vehicle_label AS vehicleLabel,
	vehicle_license_plate AS vehicleLicensePlate,
	vehicle_wheelchair_accessible AS vehicleWheelchairAccessible`;

export function openLake(filename: string) {
	const db = new Database(filename, { fileMustExist: false });
	db.pragma("journal_mode = WAL");
	ensureRealtimeSchema(db);
	return db;
}

// Every feed reads its parent and child tables inside one transaction, so a
// concurrent writer cannot slip between the two reads of a join.
export function createRealtimeSource(db: Database.Database): RowSource {
	const selectAlerts = db.prepare<[], ServiceAlertRow>(`
		SELECT
			service_alert_id AS serviceAlertId,
			cause,
			effect,
			header_text AS headerText,
			description_text AS descriptionText
		FROM service_alerts
		ORDER BY rowid
	`);
	const selectActivePeriods = db.prepare<[], AlertActivePeriodRow>(`
		SELECT
			service_alert_id AS serviceAlertId,
			start_timestamp AS startTimestamp,
			end_timestamp AS endTimestamp
		FROM alert_active_periods
		ORDER BY rowid
	`);
	const selectInformedEntities = db.prepare<[], AlertInformedEntityRow>(`
		SELECT
			service_alert_id AS serviceAlertId,
			agency_id AS agencyId,
			route_id AS routeId,
			route_type AS routeType,
			stop_id AS stopId,${TRIP_REFERENCE_SELECT}
		FROM alert_informed_entities
		ORDER BY rowid
	`);
	const selectTripUpdates = db.prepare<[], TripUpdateRow>(`
		SELECT
			trip_update_id AS tripUpdateId,${TRIP_REFERENCE_SELECT},${VEHICLE_REFERENCE_SELECT}
		FROM trip_updates
		ORDER BY rowid
	`);
	const selectStopTimeUpdates = db.prepare<[], StopTimeUpdateRow>(`
		SELECT
			trip_update_id AS tripUpdateId,
			stop_sequence AS stopSequence,
			stop_id AS stopId,
			arrival_time AS arrivalTime,
			arrival_delay AS arrivalDelay,
			arrival_uncertainty AS arrivalUncertainty,
			departure_time AS departureTime,
			departure_delay AS departureDelay,
			departure_uncertainty AS departureUncertainty,
			schedule_relationship AS scheduleRelationship
		FROM trip_stop_time_updates
		ORDER BY rowid
	`);
	const selectVehiclePositions = db.prepare<[], VehiclePositionRow>(`
		SELECT
			vehicle_position_id AS vehiclePositionId,${TRIP_REFERENCE_SELECT},${VEHICLE_REFERENCE_SELECT},
			position_latitude AS positionLatitude,
			position_longitude AS positionLongitude,
			position_bearing AS positionBearing,
			position_odometer AS positionOdometer,
			position_speed AS positionSpeed,
			current_stop_sequence AS currentStopSequence,
			stop_id AS stopId,
			current_status AS currentStatus,
			timestamp,
			congestion_level AS congestionLevel
		FROM vehicle_positions
		ORDER BY rowid
	`);

	const readServiceAlerts = db.transaction(() => ({
		alerts: selectAlerts.all(),
		activePeriods: selectActivePeriods.all(),
		informedEntities: selectInformedEntities.all(),
	}));
	const readTripUpdates = db.transaction(() => ({
		tripUpdates: selectTripUpdates.all(),
		stopTimeUpdates: selectStopTimeUpdates.all(),
	}));

	return {
		fetchServiceAlerts: async () => readServiceAlerts.deferred(),
		fetchTripUpdates: async () => readTripUpdates.deferred(),
		fetchVehiclePositions: async () => selectVehiclePositions.all(),
	};
}
