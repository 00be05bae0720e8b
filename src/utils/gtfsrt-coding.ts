import { fileURLToPath } from "node:url";
import protobufjs from "protobufjs";
import type { Field, Message, Type } from "protobufjs";

import type { Feed } from "../types/gtfs-rt.js";

const protoPath = fileURLToPath(new URL("../../assets/gtfs-realtime.proto", import.meta.url));

const root = protobufjs.loadSync(protoPath).resolveAll();
const feedMessage = root.lookupType("transit_realtime.FeedMessage");

// Text documents use the field names of the schema itself (gtfs_realtime_version, informed_entity...).
const documentRoot = new protobufjs.Root().loadSync(protoPath, { keepCase: true });
const feedDocument = documentRoot.lookupType("transit_realtime.FeedMessage");

export type FeedFormat = "protobuf" | "json";

export class FeedEncodingError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "FeedEncodingError";
	}
}

function isInteger(value: unknown, min: number, max: number) {
	return typeof value === "number" && Number.isInteger(value) && value >= min && value <= max;
}

function checkScalar(type: string, value: unknown) {
	switch (type) {
		case "string":
			return typeof value === "string";
		case "bool":
			return typeof value === "boolean";
		case "float":
		case "double":
			return typeof value === "number" && Number.isFinite(value);
		case "int32":
		case "sint32":
		case "sfixed32":
			return isInteger(value, -0x80000000, 0x7fffffff);
		case "uint32":
		case "fixed32":
			return isInteger(value, 0, 0xffffffff);
		case "int64":
		case "sint64":
		case "sfixed64":
			return isInteger(value, Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER);
		case "uint64":
		case "fixed64":
			return isInteger(value, 0, Number.MAX_SAFE_INTEGER);
		case "bytes":
			return value instanceof Uint8Array;
		default:
			return false;
	}
}

function checkValue(field: Field, value: unknown, path: string): string | null {
	const resolved = field.resolvedType;
	if (resolved instanceof protobufjs.Type) return checkMessage(resolved, value, path);
	if (resolved instanceof protobufjs.Enum) {
		return typeof value === "string" && Object.hasOwn(resolved.values, value)
			? null
			: `${path}: unknown ${resolved.name} value '${String(value)}'`;
	}
	return checkScalar(field.type, value) ? null : `${path}: ${field.type} expected, got '${String(value)}'`;
}

// fromObject coerces whatever it is given (strings to 0, -1 to 4294967295, 12.7 to 12),
// so plain values are checked against the schema before any conversion happens.
function checkMessage(type: Type, value: unknown, path: string): string | null {
	if (typeof value !== "object" || value === null || Array.isArray(value)) return `${path}: object expected`;

	const entries: [string, unknown][] = Object.entries(value);
	const fields = new Map(entries);
	for (const name of fields.keys()) {
		if (!Object.hasOwn(type.fields, name)) return `${path}.${name}: unknown field`;
	}

	for (const field of type.fieldsArray) {
		const fieldPath = `${path}.${field.name}`;
		const fieldValue = fields.get(field.name);
		if (typeof fieldValue === "undefined" || fieldValue === null) {
			if (field.required) return `${fieldPath}: required field missing`;
			continue;
		}

		if (field.repeated) {
			if (!Array.isArray(fieldValue)) return `${fieldPath}: array expected`;
			const items: unknown[] = fieldValue;
			for (const [index, item] of items.entries()) {
				const problem = checkValue(field, item, `${fieldPath}[${index}]`);
				if (problem !== null) return problem;
			}
			continue;
		}

		const problem = checkValue(field, fieldValue, fieldPath);
		if (problem !== null) return problem;
	}
	return null;
}

function toCheckedMessage(payload: Feed) {
	const problem = checkMessage(feedMessage, payload, "FeedMessage");
	if (problem !== null) {
		throw new FeedEncodingError(`Feed does not conform to the GTFS-RT schema: ${problem}.`);
	}

	let message: Message;
	try {
		message = feedMessage.fromObject(payload);
	} catch (cause) {
		throw new FeedEncodingError("Feed could not be converted to a GTFS-RT message.", { cause });
	}
	return message;
}

export function encodeGtfsRt(payload: Feed) {
	return feedMessage.encode(toCheckedMessage(payload)).finish();
}

// Renders what a binary consumer would decode, float32 rounding included.
export function decodeGtfsRtDocument(payload: Uint8Array) {
	return feedDocument.toObject(feedDocument.decode(payload), {
		arrays: true,
		enums: String,
		longs: Number,
	});
}

export function encodeGtfsRtJson(payload: Feed) {
	return JSON.stringify(decodeGtfsRtDocument(encodeGtfsRt(payload)));
}

export function encodeFeed(payload: Feed, format: FeedFormat): Uint8Array {
	return format === "json" ? Buffer.from(encodeGtfsRtJson(payload), "utf-8") : encodeGtfsRt(payload);
}

export function decodeGtfsRt(payload: Uint8Array) {
	const decoded = feedMessage.decode(payload);
	return feedMessage.toObject(decoded, {
		enums: String,
		longs: Number,
	});
}
