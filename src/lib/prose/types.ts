// ---------------------------------------------------------------------------
// Newsletter Prose — Collaborator Contract
// ---------------------------------------------------------------------------

import type { CourseCategory, SkillTier } from "@/lib/catalog/types";

/** Document-level requests see the plain text of the rendered body. */
export interface DocumentProseRequest {
	bodyText: string;
}

export interface CategoryProseRequest {
	category: CourseCategory;
	/** Tier labels present in this category, in rank order */
	tiers: string[];
}

export interface TierProseRequest {
	category: CourseCategory;
	tier: SkillTier;
	sessionCount: number;
	/** Display date of the earliest session, e.g. "27 Jul" */
	earliestStart: string;
}

export interface EventProseRequest {
	name: string;
	/** Organizer's own description, if any */
	description?: string;
	/** Rendered session lines, e.g. "Saturdays 2pm @ Belair Park — 2 hours starting 16 Aug" */
	sessions: string[];
}

export interface ProseCallOptions {
	/** Aborted once the caller has stopped waiting; pending work should stop */
	signal?: AbortSignal;
}

/**
 * Source of generated prose. Each method resolves to the text or rejects;
 * a blank answer counts as a failure. Implementations hold their own
 * credentials and retry policy.
 */
export interface ProseProvider {
	subjectLine(request: DocumentProseRequest, options?: ProseCallOptions): Promise<string>;
	previewText(request: DocumentProseRequest, options?: ProseCallOptions): Promise<string>;
	summary(request: DocumentProseRequest, options?: ProseCallOptions): Promise<string>;
	categoryDescription(request: CategoryProseRequest, options?: ProseCallOptions): Promise<string>;
	tierDescription(request: TierProseRequest, options?: ProseCallOptions): Promise<string>;
	eventDescription(request: EventProseRequest, options?: ProseCallOptions): Promise<string>;
}

export type ProseSource = "generated" | "fallback";

export interface ResolvedText {
	text: string;
	source: ProseSource;
}

/** Intro text per section, keyed like the sections themselves. */
export interface SectionProse {
	categories: Partial<Record<CourseCategory, ResolvedText>>;
	/** Course group key ("AdultCourse:Beginner") or event key ("event:…") */
	groups: Record<string, ResolvedText>;
}

export interface DocumentProse {
	subjectLine: ResolvedText;
	previewText: ResolvedText;
	summary: ResolvedText;
}
