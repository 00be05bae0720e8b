import { FeedEncodingError } from "./gtfsrt-coding.js";

export function enumValue<T extends string>(values: readonly T[], value: string, field: string): T {
	const match = values.find((candidate) => candidate === value);
	if (typeof match === "undefined") {
		throw new FeedEncodingError(`Unknown value '${value}' for ${field}.`);
	}
	return match;
}

export function optionalEnumValue<T extends string>(values: readonly T[], value: string | null, field: string) {
	return value === null ? undefined : enumValue(values, value, field);
}
