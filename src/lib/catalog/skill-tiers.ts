// ---------------------------------------------------------------------------
// Course Catalog — Skill-Tier Registry
// Static display order, booking codes and headings for the four tiers
// ---------------------------------------------------------------------------

import { ConfigurationError } from "./errors";
import { SKILL_TIERS, type SkillTier } from "./types";

export interface SkillTierEntry {
	/** Display order, Beginner lowest */
	readonly rank: number;
	/** Filter value expected by the booking site; not ordered like `rank` */
	readonly bookingCode: number;
	readonly label: string;
	readonly icon: string;
}

/** Booking codes are imposed by the booking site and must match it exactly. */
export const SKILL_TIER_TABLE = {
	Beginner: { rank: 1, bookingCode: 1, label: "Beginner", icon: "🌱" },
	Improver: { rank: 2, bookingCode: 4, label: "Improver", icon: "📈" },
	Intermediate: { rank: 3, bookingCode: 2, label: "Intermediate", icon: "🎯" },
	Advanced: { rank: 4, bookingCode: 3, label: "Advanced", icon: "🏆" },
} as const satisfies Record<SkillTier, SkillTierEntry>;

const ORDERED_TIERS: readonly SkillTier[] = [...SKILL_TIERS].sort(
	(a, b) => SKILL_TIER_TABLE[a].rank - SKILL_TIER_TABLE[b].rank,
);

function isSkillTier(value: string): value is SkillTier {
	return Object.hasOwn(SKILL_TIER_TABLE, value);
}

/**
 * Look up a tier's registry entry.
 *
 * @throws {ConfigurationError} when the tier is not in the table
 */
export function tierEntry(tier: string): SkillTierEntry {
	if (!isSkillTier(tier)) {
		throw new ConfigurationError(`Unknown skill tier "${tier}" — not in the skill-tier table`);
	}
	return SKILL_TIER_TABLE[tier];
}

export function rank(tier: SkillTier): number {
	return tierEntry(tier).rank;
}

export function bookingCode(tier: SkillTier): number {
	return tierEntry(tier).bookingCode;
}

export function displayLabel(tier: SkillTier): string {
	return tierEntry(tier).label;
}

export function tierIcon(tier: SkillTier): string {
	return tierEntry(tier).icon;
}

/** Beginner, Improver, Intermediate, Advanced */
export function orderedTiers(): readonly SkillTier[] {
	return ORDERED_TIERS;
}

/** Case-insensitive match against the tier names; null when unrecognized. */
export function parseSkillTier(raw: string): SkillTier | null {
	const needle = raw.trim().toLowerCase();
	return ORDERED_TIERS.find((tier) => tier.toLowerCase() === needle) ?? null;
}
