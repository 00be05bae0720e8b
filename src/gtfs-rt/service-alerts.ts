import {
	ALERT_CAUSES,
	ALERT_EFFECTS,
	type AlertEntity,
	type EntitySelector,
	type TimeRange,
	type TranslatedString,
} from "../types/gtfs-rt.js";
import type { AlertActivePeriodRow, AlertInformedEntityRow, ServiceAlertRows } from "../types/rows.js";
import { optionalEnumValue } from "../utils/enum-value.js";
import { groupBy } from "../utils/group-by.js";

import { buildTripDescriptor } from "./descriptors.js";

export function buildServiceAlertEntities(rows: ServiceAlertRows, language: string): AlertEntity[] {
	const activePeriods = groupBy(rows.activePeriods, (period) => period.serviceAlertId);
	const informedEntities = groupBy(rows.informedEntities, (entity) => entity.serviceAlertId);

	return rows.alerts.map((row) => {
		const cause = optionalEnumValue(ALERT_CAUSES, row.cause, "Alert.cause");
		const effect = optionalEnumValue(ALERT_EFFECTS, row.effect, "Alert.effect");

		return {
			id: row.serviceAlertId,
			alert: {
				...(typeof cause !== "undefined" ? { cause } : {}),
				...(typeof effect !== "undefined" ? { effect } : {}),
				...(row.headerText !== null ? { headerText: translate(row.headerText, language) } : {}),
				...(row.descriptionText !== null ? { descriptionText: translate(row.descriptionText, language) } : {}),
				activePeriod: (activePeriods.get(row.serviceAlertId) ?? []).map(buildTimeRange),
				informedEntity: (informedEntities.get(row.serviceAlertId) ?? []).map(buildEntitySelector),
			},
		};
	});
}

// ---

function translate(text: string, language: string): TranslatedString {
	return { translation: [{ text, language }] };
}

function buildTimeRange(row: AlertActivePeriodRow): TimeRange {
	return {
		...(row.startTimestamp !== null ? { start: row.startTimestamp } : {}),
		...(row.endTimestamp !== null ? { end: row.endTimestamp } : {}),
	};
}

function buildEntitySelector(row: AlertInformedEntityRow): EntitySelector {
	const trip = buildTripDescriptor(row);
	return {
		...(row.agencyId !== null ? { agencyId: row.agencyId } : {}),
		...(row.routeId !== null ? { routeId: row.routeId } : {}),
		...(row.routeType !== null ? { routeType: row.routeType } : {}),
		...(row.stopId !== null ? { stopId: row.stopId } : {}),
		...(typeof trip !== "undefined" ? { trip } : {}),
	};
}
