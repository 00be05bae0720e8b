import type Database from "better-sqlite3";

const TRIP_REFERENCE_COLUMNS = `
		trip_id                       TEXT,
		trip_route_id                 TEXT,
		trip_direction_id             INTEGER,
		trip_start_time               TEXT,
		trip_start_date               TEXT,
		trip_schedule_relationship    TEXT`;

const VEHICLE_REFERENCE_COLUMNS = `
		vehicle_id                    TEXT,
		vehicle_label                 TEXT,
		vehicle_license_plate         TEXT,
		vehicle_wheelchair_accessible TEXT`;

export const REALTIME_SCHEMA = `
	CREATE TABLE IF NOT EXISTS service_alerts (
		service_alert_id TEXT NOT NULL PRIMARY KEY,
		cause            TEXT,
		effect           TEXT,
		header_text      TEXT,
		description_text TEXT
	);

	CREATE TABLE IF NOT EXISTS alert_active_periods (
		service_alert_id TEXT NOT NULL,
		start_timestamp  INTEGER,
		end_timestamp    INTEGER
	);
	CREATE INDEX IF NOT EXISTS idx_alert_active_periods_alert ON alert_active_periods(service_alert_id);

	CREATE TABLE IF NOT EXISTS alert_informed_entities (
		service_alert_id TEXT NOT NULL,
		agency_id        TEXT,
		route_id         TEXT,
		route_type       INTEGER,
		stop_id          TEXT,${TRIP_REFERENCE_COLUMNS}
	);
	CREATE INDEX IF NOT EXISTS idx_alert_informed_entities_alert ON alert_informed_entities(service_alert_id);

	CREATE TABLE IF NOT EXISTS trip_updates (
		trip_update_id TEXT NOT NULL PRIMARY KEY,${TRIP_REFERENCE_COLUMNS},${VEHICLE_REFERENCE_COLUMNS}
	);

	CREATE TABLE IF NOT EXISTS trip_stop_time_updates (
		trip_update_id        TEXT NOT NULL,
		stop_sequence         INTEGER,
		stop_id               TEXT,
		arrival_time          INTEGER,
		arrival_delay         INTEGER,
		arrival_uncertainty   INTEGER,
		departure_time        INTEGER,
		departure_delay       INTEGER,
		departure_uncertainty INTEGER,
		schedule_relationship TEXT
	);
	CREATE INDEX IF NOT EXISTS idx_trip_stop_time_updates_trip ON trip_stop_time_updates(trip_update_id);

	CREATE TABLE IF NOT EXISTS vehicle_positions (
		vehicle_position_id   TEXT NOT NULL PRIMARY KEY,${TRIP_REFERENCE_COLUMNS},${VEHICLE_REFERENCE_COLUMNS},
		position_latitude     REAL NOT NULL,
		position_longitude    REAL NOT NULL,
		position_bearing      REAL,
		position_odometer     REAL,
		position_speed        REAL,
		current_stop_sequence INTEGER,
		stop_id               TEXT,
		current_status        TEXT,
		timestamp             INTEGER,
		congestion_level      TEXT
	);
`;

export function ensureRealtimeSchema(db: Database.Database) {
	db.exec(REALTIME_SCHEMA);
}
