// ---------------------------------------------------------------------------
// Course Catalog — Booking-Link Builder
// ---------------------------------------------------------------------------

import { toIsoTimestamp } from "./calendar";
import type { EventDetails } from "./schemas";
import { bookingCode } from "./skill-tiers";
import type { CourseCategory, CourseGroup } from "./types";

const ROUTE_SEGMENTS: Record<CourseCategory, string> = {
	AdultCourse: "Adult",
	JuniorCourse: "Junior",
};

/**
 * Booking-site value for the `date-range[]` filter: the ISO timestamp as a
 * JSON string, URI-encoded → `%222025-07-27T00:00:00.000Z%22`.
 * Only the quotes end up percent-encoded, as in the booking site's own links.
 */
export function encodeDateAnchor(group: Pick<CourseGroup, "minStartDate">): string {
	return encodeURI(JSON.stringify(toIsoTimestamp(group.minStartDate)));
}

/**
 * Booking page for one course group, pre-filtered to the group's tier and
 * starting at its earliest session.
 *
 * @param baseUrl Coaching root of the booking site, e.g. "https://booking.example.com/Coaching"
 */
export function courseBookingUrl(
	group: Pick<CourseGroup, "category" | "skillTier" | "minStartDate">,
	baseUrl: string,
): string {
	const root = baseUrl.replace(/\/+$/, "");
	const segment = ROUTE_SEGMENTS[group.category];
	const code = bookingCode(group.skillTier);
	return `${root}/${segment}?skill-level%5B%5D=${code}&date-range[]=${encodeDateAnchor(group)}`;
}

/** Event links are opaque: the supplied URL is returned untouched, or null. */
export function eventBookingUrl(details: Pick<EventDetails, "bookingUrl"> | undefined): string | null {
	return details?.bookingUrl ?? null;
}
