import { Temporal } from "temporal-polyfill";
import { describe, expect, it } from "vitest";

import { wrapEntities } from "../gtfs-rt/wrap-entities.js";
import type { Feed, FeedEntity } from "../types/gtfs-rt.js";

import {
	FeedEncodingError,
	decodeGtfsRt,
	decodeGtfsRtDocument,
	encodeFeed,
	encodeGtfsRt,
	encodeGtfsRtJson,
} from "./gtfsrt-coding.js";

const NOW = Temporal.Instant.fromEpochMilliseconds(1_700_000_000_500);

const feed: Feed = wrapEntities(
	[
		{
			id: "SA1",
			alert: {
				cause: "CONSTRUCTION",
				effect: "DETOUR",
				headerText: { translation: [{ text: "Bridge closed", language: "de-DE" }] },
				descriptionText: { translation: [{ text: "Use detour route", language: "de-DE" }] },
				activePeriod: [{ start: 1000, end: 2000 }],
				informedEntity: [{ routeId: "R1", trip: { tripId: "T1", directionId: 0 } }],
			},
		},
		{
			id: "TU1",
			tripUpdate: {
				trip: { tripId: "T1", scheduleRelationship: "SCHEDULED" },
				vehicle: { id: "V1", wheelchairAccessible: "WHEELCHAIR_ACCESSIBLE" },
				stopTimeUpdate: [
					{
						stopSequence: 1,
						stopId: "S1",
						arrival: { time: 1_700_000_100, delay: 0 },
						departure: {},
						scheduleRelationship: "SCHEDULED",
					},
				],
			},
		},
		{
			id: "VP1",
			vehicle: {
				position: { latitude: 49.4431, longitude: 1.0993, bearing: 90, speed: 8.3 },
				currentStatus: "STOPPED_AT",
				timestamp: 1_700_000_000,
			},
		},
	],
	NOW,
);

function feedOf(...entities: FeedEntity[]) {
	return wrapEntities(entities, NOW);
}

describe("encodeGtfsRt", () => {
	it("produces the same bytes for the same feed", () => {
		expect(Buffer.from(encodeGtfsRt(feed)).equals(Buffer.from(encodeGtfsRt(feed)))).toBe(true);
	});

	it("keeps zero values that were explicitly set", () => {
		const decoded = decodeGtfsRt(encodeGtfsRt(feed));
		expect(decoded.entity[1].tripUpdate.stopTimeUpdate[0].arrival).toEqual({ time: 1_700_000_100, delay: 0 });
		expect(decoded.entity[0].alert.informedEntity[0].trip).toEqual({ tripId: "T1", directionId: 0 });
	});

	it("rejects a trip update without a trip descriptor", () => {
		const invalid = feedOf({ id: "TU9", tripUpdate: { stopTimeUpdate: [] } });
		expect(() => encodeGtfsRt(invalid)).toThrow(FeedEncodingError);
		expect(() => encodeGtfsRtJson(invalid)).toThrow(FeedEncodingError);
	});

	it("rejects a negative value in an unsigned field", () => {
		const invalid = feedOf({
			id: "TU9",
			tripUpdate: {
				trip: { tripId: "T1" },
				stopTimeUpdate: [{ stopSequence: -1, arrival: {}, departure: {}, scheduleRelationship: "SCHEDULED" }],
			},
		});

		expect(() => encodeGtfsRt(invalid)).toThrow(
			"FeedMessage.entity[0].tripUpdate.stopTimeUpdate[0].stopSequence: uint32 expected, got '-1'",
		);
	});

	it("rejects a fraction in an integer field", () => {
		const invalid = feedOf({
			id: "TU9",
			tripUpdate: {
				trip: { tripId: "T1" },
				stopTimeUpdate: [{ arrival: { delay: 12.7 }, departure: {}, scheduleRelationship: "SCHEDULED" }],
			},
		});

		expect(() => encodeGtfsRt(invalid)).toThrow(FeedEncodingError);
		expect(() => encodeGtfsRtJson(invalid)).toThrow("arrival.delay: int32 expected, got '12.7'");
	});

	it("rejects a timestamp beyond the safe integer range", () => {
		const invalid = feedOf({
			id: "VP9",
			vehicle: { position: { latitude: 1, longitude: 2 }, timestamp: 2 ** 60 },
		});

		expect(() => encodeGtfsRt(invalid)).toThrow("FeedMessage.entity[0].vehicle.timestamp: uint64 expected");
	});
});

describe("encodeGtfsRtJson", () => {
	it("carries the float values a binary consumer decodes", () => {
		const document = JSON.parse(encodeGtfsRtJson(feed));
		const decoded = decodeGtfsRt(encodeGtfsRt(feed));

		expect(document.entity[2].vehicle.position).toEqual(decoded.entity[2].vehicle.position);
		expect(document.entity[2].vehicle.position).toEqual({
			latitude: Math.fround(49.4431),
			longitude: Math.fround(1.0993),
			bearing: 90,
			speed: Math.fround(8.3),
		});
	});

	it("renders the decoded binary payload", () => {
		expect(JSON.parse(encodeGtfsRtJson(feed))).toEqual(decodeGtfsRtDocument(encodeGtfsRt(feed)));
	});

	it("uses the field names of the schema", () => {
		const document = JSON.parse(encodeGtfsRtJson(feed));
		expect(document.header).toEqual({
			gtfs_realtime_version: "2.0",
			incrementality: "FULL_DATASET",
			timestamp: 1_700_000_000,
		});
		expect(document.entity[0]).toEqual({
			id: "SA1",
			alert: {
				active_period: [{ start: 1000, end: 2000 }],
				informed_entity: [{ route_id: "R1", trip: { trip_id: "T1", direction_id: 0 } }],
				cause: "CONSTRUCTION",
				effect: "DETOUR",
				header_text: { translation: [{ text: "Bridge closed", language: "de-DE" }] },
				description_text: { translation: [{ text: "Use detour route", language: "de-DE" }] },
			},
		});
		expect(document.entity[1].trip_update.stop_time_update).toEqual([
			{
				stop_sequence: 1,
				stop_id: "S1",
				arrival: { time: 1_700_000_100, delay: 0 },
				departure: {},
				schedule_relationship: "SCHEDULED",
			},
		]);
	});

	it("keeps empty repeated fields", () => {
		const document = JSON.parse(encodeGtfsRtJson(feedOf({ id: "SA2", alert: { activePeriod: [], informedEntity: [] } })));
		expect(document.entity).toEqual([{ id: "SA2", alert: { active_period: [], informed_entity: [] } }]);
	});

	it("renders an empty feed with an empty entity list", () => {
		expect(JSON.parse(encodeGtfsRtJson(feedOf())).entity).toEqual([]);
	});
});

describe("encodeFeed", () => {
	it("returns UTF-8 JSON bytes in json mode", () => {
		expect(Buffer.from(encodeFeed(feed, "json")).toString("utf-8")).toBe(encodeGtfsRtJson(feed));
	});

	it("returns the protobuf payload in protobuf mode", () => {
		expect(Buffer.from(encodeFeed(feed, "protobuf")).equals(Buffer.from(encodeGtfsRt(feed)))).toBe(true);
	});
});
