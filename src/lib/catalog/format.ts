// ---------------------------------------------------------------------------
// Course Catalog — Time/Date Formatter
// Fixed English display forms; sorting never happens on these strings.
// ---------------------------------------------------------------------------

import { format } from "date-fns";
import { toLocalDate } from "./calendar";
import { FormatError } from "./errors";
import type { CalendarDate, TimeOfDay } from "./types";

function required<T>(value: T | null | undefined, what: string): T {
	if (value === null || value === undefined) {
		throw new FormatError(`Cannot format ${what}: value is ${String(value)}`);
	}
	return value;
}

/**
 * 12-hour form with lowercase suffix and no leading zero.
 * Minutes are shown only when non-zero: 18:00 → "6pm", 09:30 → "9:30am".
 *
 * @throws {FormatError} when `time` is null or undefined
 */
export function formatTime(time: TimeOfDay | null | undefined): string {
	const { hour, minute } = required(time, "time");
	const at = new Date(2000, 0, 1, hour, minute);
	return format(at, minute === 0 ? "haaa" : "h:mmaaa");
}

/**
 * Day of month and abbreviated month: 2025-08-04 → "4 Aug".
 *
 * @throws {FormatError} when `date` is null or undefined
 */
export function formatDate(date: CalendarDate | null | undefined): string {
	return format(toLocalDate(required(date, "date")), "d MMM");
}

/**
 * Plural weekday for recurring sessions: 2025-08-04 → "Mondays".
 *
 * @throws {FormatError} when `date` is null or undefined
 */
export function formatWeekday(date: CalendarDate | null | undefined): string {
	return `${format(toLocalDate(required(date, "date")), "EEEE")}s`;
}
