// ---------------------------------------------------------------------------
// Course Catalog — Types
// Session records, skill tiers, display groups and capacity warnings
// ---------------------------------------------------------------------------

/** Top-level classification of a row in the export. */
export const CATEGORIES = ["AdultCourse", "JuniorCourse", "Event"] as const;
export type Category = (typeof CATEGORIES)[number];

/** Categories that are grouped by skill tier. */
export type CourseCategory = Exclude<Category, "Event">;

export const SKILL_TIERS = ["Beginner", "Improver", "Intermediate", "Advanced"] as const;
export type SkillTier = (typeof SKILL_TIERS)[number];

/** A date without time zone, as printed in the export. `month` is 1-based. */
export interface CalendarDate {
	readonly year: number;
	readonly month: number;
	readonly day: number;
}

/** 24-hour wall-clock time. */
export interface TimeOfDay {
	readonly hour: number;
	readonly minute: number;
}

interface SessionFields {
	/** 0-based position of the source row in the input sequence */
	readonly rowIndex: number;
	readonly name: string;
	readonly venue: string;
	readonly startDate: CalendarDate;
	readonly time: TimeOfDay;
	/** Free-form, rendered exactly as exported (e.g. "6 weeks") */
	readonly durationText: string;
	readonly participantCount: number;
	/** Explicit weekday label from the optional `Day` column, else null */
	readonly day: string | null;
}

export interface CourseSession extends SessionFields {
	readonly category: CourseCategory;
	readonly skillTier: SkillTier;
}

export interface EventSession extends SessionFields {
	readonly category: "Event";
	readonly skillTier: null;
}

/** One validated row. `skillTier` is present iff the category is not `Event`. */
export type SessionRecord = CourseSession | EventSession;

/** All course sessions sharing (category, skillTier). */
export interface CourseGroup {
	/** Stable identifier, e.g. "AdultCourse:Beginner" */
	readonly key: string;
	readonly category: CourseCategory;
	readonly skillTier: SkillTier;
	/** Sorted by startDate, venue, time, rowIndex */
	readonly sessions: readonly CourseSession[];
	readonly minStartDate: CalendarDate;
	readonly participantTotal: number;
}

/** All event sessions sharing the same name. */
export interface EventGroup {
	/** Stable identifier, e.g. "event:Summer Social" */
	readonly key: string;
	readonly name: string;
	readonly sessions: readonly EventSession[];
	readonly minStartDate: CalendarDate;
	readonly participantTotal: number;
}

export interface GroupedCatalog {
	/** AdultCourse groups first, then JuniorCourse; tier rank within each */
	readonly courses: readonly CourseGroup[];
	/** Ordered by minStartDate, then name */
	readonly events: readonly EventGroup[];
}

export type CapacityWarning = "Limited spots!" | "Full!";

export interface CapacityThresholds {
	/** Lowest participant count that is reported as "Limited spots!" */
	limited: number;
	/** Lowest participant count that is reported as "Full!" */
	full: number;
}

/** Row index → human-readable reason for every rejected row. */
export type ValidationReport = ReadonlyMap<number, string>;

export interface ParseResult {
	records: SessionRecord[];
	report: ValidationReport;
}

export interface CatalogSummary {
	total: number;
	byCategory: Record<Category, number>;
	/** Tiers present per course category, in rank order */
	tiers: Record<CourseCategory, SkillTier[]>;
}
