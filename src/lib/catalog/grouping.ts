// ---------------------------------------------------------------------------
// Course Catalog — Grouping Engine
// Courses by (category, tier), events by name. Empty groups are never built.
// ---------------------------------------------------------------------------

import { compareDates, compareTimes } from "./calendar";
import { orderedTiers, rank } from "./skill-tiers";
import type {
	CatalogSummary,
	CourseCategory,
	CourseGroup,
	CourseSession,
	EventGroup,
	EventSession,
	GroupedCatalog,
	SessionRecord,
} from "./types";

const CATEGORY_ORDER: Record<CourseCategory, number> = {
	AdultCourse: 0,
	JuniorCourse: 1,
};

/** Code-unit comparison; independent of the host locale. */
function compareText(a: string, b: string): number {
	if (a === b) return 0;
	return a < b ? -1 : 1;
}

/** startDate, then venue, then time, then input position. */
export function compareSessions(a: SessionRecord, b: SessionRecord): number {
	return (
		compareDates(a.startDate, b.startDate) ||
		compareText(a.venue, b.venue) ||
		compareTimes(a.time, b.time) ||
		a.rowIndex - b.rowIndex
	);
}

export function courseGroupKey(category: CourseCategory, tier: string): string {
	return `${category}:${tier}`;
}

export function eventGroupKey(name: string): string {
	return `event:${name}`;
}

function sumParticipants(sessions: readonly SessionRecord[]): number {
	return sessions.reduce((total, s) => total + s.participantCount, 0);
}

function bucket<T extends SessionRecord>(records: readonly T[], keyOf: (record: T) => string): Map<string, T[]> {
	const buckets = new Map<string, T[]>();
	for (const record of records) {
		const key = keyOf(record);
		const members = buckets.get(key);
		if (members) {
			members.push(record);
		} else {
			buckets.set(key, [record]);
		}
	}
	return buckets;
}

function isEvent(record: SessionRecord): record is EventSession {
	return record.category === "Event";
}

function isCourse(record: SessionRecord): record is CourseSession {
	return record.category !== "Event";
}

/**
 * Bucket validated records into display groups.
 *
 * Every record ends up in exactly one group. Sessions inside a group are
 * ordered by {@link compareSessions}; the first one supplies `minStartDate`.
 */
export function groupSessions(records: readonly SessionRecord[]): GroupedCatalog {
	const courseBuckets = bucket(records.filter(isCourse), (r) => courseGroupKey(r.category, r.skillTier));
	const eventBuckets = bucket(records.filter(isEvent), (r) => eventGroupKey(r.name));

	const courses: CourseGroup[] = [];
	for (const [key, members] of courseBuckets) {
		const sessions = [...members].sort(compareSessions);
		const first = sessions[0];
		courses.push({
			key,
			category: first.category,
			skillTier: first.skillTier,
			sessions,
			minStartDate: first.startDate,
			participantTotal: sumParticipants(sessions),
		});
	}
	courses.sort(
		(a, b) =>
			CATEGORY_ORDER[a.category] - CATEGORY_ORDER[b.category] || rank(a.skillTier) - rank(b.skillTier),
	);

	const events: EventGroup[] = [];
	for (const [key, members] of eventBuckets) {
		const sessions = [...members].sort(compareSessions);
		const first = sessions[0];
		events.push({
			key,
			name: first.name,
			sessions,
			minStartDate: first.startDate,
			participantTotal: sumParticipants(sessions),
		});
	}
	events.sort((a, b) => compareDates(a.minStartDate, b.minStartDate) || compareText(a.name, b.name));

	return { courses, events };
}

/** Per-category counts and the tiers present, for logging and overviews. */
export function summarizeCatalog(records: readonly SessionRecord[]): CatalogSummary {
	const summary: CatalogSummary = {
		total: records.length,
		byCategory: { AdultCourse: 0, JuniorCourse: 0, Event: 0 },
		tiers: { AdultCourse: [], JuniorCourse: [] },
	};

	for (const record of records) {
		summary.byCategory[record.category]++;
	}
	for (const tier of orderedTiers()) {
		for (const category of ["AdultCourse", "JuniorCourse"] as const) {
			if (records.some((r) => r.category === category && r.skillTier === tier)) {
				summary.tiers[category].push(tier);
			}
		}
	}

	return summary;
}
