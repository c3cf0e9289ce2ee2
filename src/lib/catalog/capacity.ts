// ---------------------------------------------------------------------------
// Course Catalog — Capacity Annotator
// ---------------------------------------------------------------------------

import type { CapacityThresholds, CapacityWarning } from "./types";

export const DEFAULT_CAPACITY_THRESHOLDS: Readonly<CapacityThresholds> = {
	limited: 7,
	full: 10,
};

const SEVERITY: Record<CapacityWarning, number> = {
	"Limited spots!": 1,
	"Full!": 2,
};

/**
 * Capacity label for a session with `participantCount` active participants.
 *
 * `count >= full` → "Full!", `limited <= count < full` → "Limited spots!",
 * otherwise null.
 */
export function warningFor(
	participantCount: number,
	thresholds: CapacityThresholds = DEFAULT_CAPACITY_THRESHOLDS,
): CapacityWarning | null {
	if (participantCount >= thresholds.full) return "Full!";
	if (participantCount >= thresholds.limited) return "Limited spots!";
	return null;
}

/** The most severe warning among `warnings`, or null when none applies. */
export function mostSevere(warnings: Iterable<CapacityWarning | null>): CapacityWarning | null {
	let worst: CapacityWarning | null = null;
	for (const warning of warnings) {
		if (warning !== null && (worst === null || SEVERITY[warning] > SEVERITY[worst])) {
			worst = warning;
		}
	}
	return worst;
}
