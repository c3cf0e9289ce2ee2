// ---------------------------------------------------------------------------
// Newsletter Prose — Fallback Table
// Used whenever the prose provider is absent, fails, times out or answers blank.
// ---------------------------------------------------------------------------

import type { CourseCategory, SkillTier } from "@/lib/catalog/types";

export interface FallbackProseTable {
	subjectLine: string;
	previewText: string;
	summary: string;
	categories: Record<CourseCategory, string>;
	tiers: Record<SkillTier, string>;
	event: string;
}

export const FALLBACK_PROSE: Readonly<FallbackProseTable> = {
	subjectLine: "🎾 New Courses Available!",
	previewText: "New courses and fun events this month",
	summary:
		"Check out what's coming up this month — from new tennis courses to help you improve your game!",
	categories: {
		AdultCourse:
			"Perfect for players of all levels, our adult courses focus on technique, strategy, and match play.",
		JuniorCourse:
			"Fun and engaging courses for young players, using the colored ball progression system.",
	},
	tiers: {
		Beginner: "Perfect for those new to tennis or returning after a break.",
		Improver: "For players who are confident rallying and ready to level up.",
		Intermediate: "For regular players wanting to refine technique and strategy.",
		Advanced: "For experienced players focusing on advanced techniques and match play.",
	},
	event:
		"Join us for a friendly session at the club. Come solo or with a partner — it's a great way to meet other players.",
};
