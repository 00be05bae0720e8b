export type Feed = {
	header: Header;
	entity: FeedEntity[];
};

export type Header = {
	gtfsRealtimeVersion: string;
	incrementality: Incrementality;
	timestamp: number;
};

export type FeedEntity = AlertEntity | TripUpdateEntity | VehiclePositionEntity;

export type AlertEntity = {
	id: string;
	alert: Alert;
};

export type TripUpdateEntity = {
	id: string;
	tripUpdate: TripUpdate;
};

export type VehiclePositionEntity = {
	id: string;
	vehicle: VehiclePosition;
};

export type Alert = {
	activePeriod: TimeRange[];
	informedEntity: EntitySelector[];
	cause?: AlertCause;
	effect?: AlertEffect;
	headerText?: TranslatedString;
	descriptionText?: TranslatedString;
};

export type TripUpdate = {
	trip?: TripDescriptor;
	vehicle?: VehicleDescriptor;
	stopTimeUpdate: StopTimeUpdate[];
};

export type VehiclePosition = {
	trip?: TripDescriptor;
	vehicle?: VehicleDescriptor;
	position: Position;
	currentStopSequence?: number;
	stopId?: string;
	currentStatus?: VehicleStopStatus;
	timestamp?: number;
	congestionLevel?: CongestionLevel;
};

// ---

export type Incrementality = "FULL_DATASET";

export const ALERT_CAUSES = [
	"UNKNOWN_CAUSE",
	"OTHER_CAUSE",
	"TECHNICAL_PROBLEM",
	"STRIKE",
	"DEMONSTRATION",
	"ACCIDENT",
	"HOLIDAY",
	"WEATHER",
	"MAINTENANCE",
	"CONSTRUCTION",
	"POLICE_ACTIVITY",
	"MEDICAL_EMERGENCY",
] as const;
export type AlertCause = (typeof ALERT_CAUSES)[number];

export const ALERT_EFFECTS = [
	"NO_SERVICE",
	"REDUCED_SERVICE",
	"SIGNIFICANT_DELAYS",
	"DETOUR",
	"ADDITIONAL_SERVICE",
	"MODIFIED_SERVICE",
	"OTHER_EFFECT",
	"UNKNOWN_EFFECT",
	"STOP_MOVED",
	"NO_EFFECT",
	"ACCESSIBILITY_ISSUE",
] as const;
export type AlertEffect = (typeof ALERT_EFFECTS)[number];

export const CONGESTION_LEVELS = [
	"UNKNOWN_CONGESTION_LEVEL",
	"RUNNING_SMOOTHLY",
	"STOP_AND_GO",
	"CONGESTION",
	"SEVERE_CONGESTION",
] as const;
export type CongestionLevel = (typeof CONGESTION_LEVELS)[number];

export type EntitySelector = {
	agencyId?: string;
	routeId?: string;
	routeType?: number;
	trip?: TripDescriptor;
	stopId?: string;
};

export type Position = {
	latitude: number;
	longitude: number;
	bearing?: number;
	odometer?: number;
	speed?: number;
};

export type StopTimeEvent = {
	delay?: number;
	time?: number;
	uncertainty?: number;
};

export const STOP_TIME_SCHEDULE_RELATIONSHIPS = [
	"SCHEDULED",
	"SKIPPED",
	"NO_DATA",
	"UNSCHEDULED",
] as const;
export type StopTimeScheduleRelationship = (typeof STOP_TIME_SCHEDULE_RELATIONSHIPS)[number];

export type StopTimeUpdate = {
	stopSequence?: number;
	stopId?: string;
	arrival: StopTimeEvent;
	departure: StopTimeEvent;
	scheduleRelationship: StopTimeScheduleRelationship;
};

export type TimeRange = {
	start?: number;
	end?: number;
};

export type TranslatedString = {
	translation: Array<{ text: string; language: string }>;
};

export const TRIP_SCHEDULE_RELATIONSHIPS = [
	"SCHEDULED",
	"ADDED",
	"UNSCHEDULED",
	"CANCELED",
	"REPLACEMENT",
	"DUPLICATED",
	"DELETED",
] as const;
export type TripScheduleRelationship = (typeof TRIP_SCHEDULE_RELATIONSHIPS)[number];

export type TripDescriptor = {
	tripId?: string;
	routeId?: string;
	directionId?: number;
	startTime?: string;
	startDate?: string;
	scheduleRelationship?: TripScheduleRelationship;
};

export type VehicleDescriptor = {
	id?: string;
	label?: string;
	licensePlate?: string;
	wheelchairAccessible?: WheelchairAccessible;
};

export const VEHICLE_STOP_STATUSES = [
	"INCOMING_AT",
	"STOPPED_AT",
	"IN_TRANSIT_TO",
] as const;
export type VehicleStopStatus = (typeof VEHICLE_STOP_STATUSES)[number];

export const WHEELCHAIR_ACCESSIBLE_VALUES = [
	"NO_VALUE",
	"UNKNOWN",
	"WHEELCHAIR_ACCESSIBLE",
	"WHEELCHAIR_INACCESSIBLE",
] as const;
export type WheelchairAccessible = (typeof WHEELCHAIR_ACCESSIBLE_VALUES)[number];
