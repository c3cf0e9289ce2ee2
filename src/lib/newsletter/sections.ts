// ---------------------------------------------------------------------------
// Newsletter — Session Lines & Prose Requests
// ---------------------------------------------------------------------------

import { warningFor } from "@/lib/catalog/capacity";
import { formatDate, formatTime, formatWeekday } from "@/lib/catalog/format";
import { eventGroupKey } from "@/lib/catalog/grouping";
import type { EventDetails } from "@/lib/catalog/schemas";
import type { CapacityThresholds, CourseCategory, GroupedCatalog, SessionRecord } from "@/lib/catalog/types";
import type { SectionProseRequests } from "@/lib/prose/resolver";
import type { SessionLine } from "./types";

/**
 * "{Day(s)} {time} @ {venue} — {durationText} starting {date}".
 * The duration clause is left out when the export has none.
 */
export function sessionLineText(session: SessionRecord): string {
	const day = session.day ?? formatWeekday(session.startDate);
	const where = `${day} ${formatTime(session.time)} @ ${session.venue}`;
	const starting = `starting ${formatDate(session.startDate)}`;
	const duration = session.durationText.trim();
	return duration.length > 0 ? `${where} — ${session.durationText} ${starting}` : `${where} ${starting}`;
}

export function sessionLine(session: SessionRecord, thresholds?: CapacityThresholds): SessionLine {
	return {
		text: sessionLineText(session),
		warning: warningFor(session.participantCount, thresholds),
	};
}

/** Index event details by event name; later entries win. */
export function indexEventDetails(events: readonly EventDetails[] = []): Map<string, EventDetails> {
	return new Map(events.map((details) => [details.name, details]));
}

/**
 * Details for events that have no session rows. They still get a block
 * (description, image, booking link), after the events built from rows.
 */
export function detailOnlyEvents(catalog: GroupedCatalog, events: readonly EventDetails[] = []): EventDetails[] {
	const scheduled = new Set(catalog.events.map((group) => group.name));
	return [...indexEventDetails(events).values()].filter((details) => !scheduled.has(details.name));
}

/** Everything the prose provider is asked for before assembly. */
export function buildProseRequests(
	catalog: GroupedCatalog,
	events: readonly EventDetails[] = [],
): SectionProseRequests {
	const details = indexEventDetails(events);
	const tiersByCategory = new Map<CourseCategory, string[]>();
	for (const group of catalog.courses) {
		const tiers = tiersByCategory.get(group.category) ?? [];
		tiers.push(group.skillTier);
		tiersByCategory.set(group.category, tiers);
	}

	return {
		categories: [...tiersByCategory].map(([category, tiers]) => ({ category, tiers })),
		tiers: catalog.courses.map((group) => ({
			key: group.key,
			request: {
				category: group.category,
				tier: group.skillTier,
				sessionCount: group.sessions.length,
				earliestStart: formatDate(group.minStartDate),
			},
		})),
		events: [
			...catalog.events.map((group) => ({
				key: group.key,
				request: {
					name: group.name,
					description: details.get(group.name)?.description,
					sessions: group.sessions.map(sessionLineText),
				},
			})),
			...detailOnlyEvents(catalog, events).map((unscheduled) => ({
				key: eventGroupKey(unscheduled.name),
				request: { name: unscheduled.name, description: unscheduled.description, sessions: [] },
			})),
		],
	};
}
