// ---------------------------------------------------------------------------
// Newsletter Prose — Prompt Builders
// ---------------------------------------------------------------------------

import { displayLabel } from "@/lib/catalog/skill-tiers";
import type {
	CategoryProseRequest,
	DocumentProseRequest,
	EventProseRequest,
	TierProseRequest,
} from "./types";

const AUDIENCE = "casual adult tennis players and parents of junior players";
const CATEGORY_NAMES = { AdultCourse: "adult courses", JuniorCourse: "junior courses" } as const;

export function subjectLinePrompt(request: DocumentProseRequest): string {
	return `Write one subject line for a friendly community tennis newsletter.

Newsletter content: ${request.bodyText}
Tone: upbeat, clear, slightly playful but not cheesy.
Audience: ${AUDIENCE}.
One leading emoji is fine.

Return only the subject line, without quotes or numbering.`;
}

export function previewTextPrompt(request: DocumentProseRequest): string {
	return `Write one email preview text for a community tennis newsletter.

Requirements:
- under 150 characters
- warm, informative, lightly enthusiastic
- sounds like a friendly tip from someone in the know
- highlights: ${request.bodyText}

Return only the preview text.`;
}

export function summaryPrompt(request: DocumentProseRequest): string {
	return `Write a short introductory paragraph (max 2 lines) for a friendly tennis newsletter.

Audience: ${AUDIENCE}.
Tone: welcoming, lightly seasonal, like a coach giving a quick update.
No emoji at the start; one elsewhere is fine.
Newsletter includes: ${request.bodyText}

Return only the summary.`;
}

export function categoryPrompt(request: CategoryProseRequest): string {
	const tiers = request.tiers.length > 0 ? request.tiers.join(", ") : "all levels";
	return `Write 1–2 warm lines introducing the ${CATEGORY_NAMES[request.category]} section of a community tennis newsletter.

Levels on offer: ${tiers}.
Audience: ${AUDIENCE}.
Tone: inviting and clear, not salesy. Do not start with an emoji.

Return only the introduction.`;
}

export function tierPrompt(request: TierProseRequest): string {
	return `Write a short, encouraging description of the tennis skill level "${displayLabel(request.tier)}" for ${CATEGORY_NAMES[request.category]}.

Requirements:
- under 100 characters
- explains who the level is for
- no emojis, no level name, no quotes

Examples:
- Perfect for those new to tennis or returning after a break.
- For players who are confident rallying and ready to level up.

Return only the description.`;
}

export function eventPrompt(request: EventProseRequest): string {
	const sessions = request.sessions.length > 0 ? request.sessions.join("; ") : "see booking page";
	return `Rewrite this event for a community tennis newsletter in at most 3 sentences.

Title: ${request.name}
Organizer description: ${request.description ?? "(none)"}
Sessions: ${sessions}

Keep date, time and location. Mention the vibe (social doubles, camp, drop-in).
Tone: warm, clear, lightly enthusiastic; limited emojis.

Return only the rewritten description.`;
}
