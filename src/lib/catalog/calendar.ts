// ---------------------------------------------------------------------------
// Course Catalog — Calendar Primitives
// Parsing and ordering of export dates and times (no time zones involved)
// ---------------------------------------------------------------------------

import { format, isValid, parse } from "date-fns";
import type { CalendarDate, TimeOfDay } from "./types";

/** Export shapes; the regex pins digit counts that date-fns patterns leave open */
const DATE_FORMATS = [
	{ shape: /^\d{4}-\d{1,2}-\d{1,2}$/, pattern: "yyyy-M-d" },
	{ shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, pattern: "d/M/yyyy" },
] as const;

const TIME_FORMATS = [
	{ shape: /^\d{1,2}:\d{2}$/, pattern: "H:mm" },
	{ shape: /^\d{1,2}:\d{2}:\d{2}$/, pattern: "H:mm:ss" },
] as const;

const REFERENCE_DATE = new Date(2000, 0, 1);

function parseWith(value: string, formats: ReadonlyArray<{ shape: RegExp; pattern: string }>): Date | null {
	const match = formats.find((f) => f.shape.test(value));
	if (!match) return null;
	const parsed = parse(value, match.pattern, REFERENCE_DATE);
	return isValid(parsed) ? parsed : null;
}

/** Local-midnight Date for date-fns formatting and weekday lookups */
export function toLocalDate(date: CalendarDate): Date {
	const local = new Date(REFERENCE_DATE);
	local.setFullYear(date.year, date.month - 1, date.day);
	return local;
}

/**
 * Parse `YYYY-MM-DD` or `DD/MM/YYYY`.
 * Returns null for any other shape and for dates that do not exist (31/02/2025).
 */
export function parseCalendarDate(raw: string): CalendarDate | null {
	const parsed = parseWith(raw.trim(), DATE_FORMATS);
	if (parsed === null) return null;
	return { year: parsed.getFullYear(), month: parsed.getMonth() + 1, day: parsed.getDate() };
}

/** Parse a 24-hour `H:MM`, `HH:MM` or `HH:MM:SS` time. Seconds are dropped. */
export function parseTimeOfDay(raw: string): TimeOfDay | null {
	const parsed = parseWith(raw.trim(), TIME_FORMATS);
	if (parsed === null) return null;
	return { hour: parsed.getHours(), minute: parsed.getMinutes() };
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
	return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function compareTimes(a: TimeOfDay, b: TimeOfDay): number {
	return a.hour - b.hour || a.minute - b.minute;
}

/** `2025-07-27` */
export function toIsoDate(date: CalendarDate): string {
	return format(toLocalDate(date), "yyyy-MM-dd");
}

/** Midnight UTC of the date: `2025-07-27T00:00:00.000Z` */
export function toIsoTimestamp(date: CalendarDate): string {
	return `${toIsoDate(date)}T00:00:00.000Z`;
}
