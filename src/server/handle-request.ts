import type { Context } from "hono";
import { stream } from "hono/streaming";

import type { FeedFormat } from "../utils/gtfsrt-coding.js";

const CONTENT_TYPES: Record<FeedFormat, string> = {
	json: "application/json",
	protobuf: "application/octet-stream",
};

export function parseFormat(selector: string | undefined): FeedFormat {
	return selector === "json" ? "json" : "protobuf";
}

export function handleRequest(c: Context, format: FeedFormat, payload: Uint8Array) {
	c.header("Content-Type", CONTENT_TYPES[format]);
	return stream(c, async (stream) => {
		await stream.write(payload);
	});
}
