// ---------------------------------------------------------------------------
// Newsletter — Document Assembler
// Grouped catalog + resolved prose → ordered HTML blocks and section manifest.
// Synchronous and deterministic: identical input renders identical bytes.
// ---------------------------------------------------------------------------

import { courseBookingUrl, eventBookingUrl } from "@/lib/catalog/booking-links";
import { mostSevere } from "@/lib/catalog/capacity";
import { eventGroupKey } from "@/lib/catalog/grouping";
import { displayLabel, tierIcon } from "@/lib/catalog/skill-tiers";
import type { CapacityThresholds, CourseCategory, CourseGroup, EventGroup } from "@/lib/catalog/types";
import { populateTemplate } from "@/lib/html/populator";
import { FALLBACK_PROSE } from "@/lib/prose/fallbacks";
import { detailOnlyEvents, indexEventDetails, sessionLine } from "./sections";
import {
	CATEGORY_BLOCK_TEMPLATE,
	CATEGORY_TITLES,
	COURSE_SECTION_TEMPLATE,
	DOCUMENT_TEMPLATE,
	EVENT_BLOCK_TEMPLATE,
	INTRO_BLOCK_TEMPLATE,
	JUNIOR_AGE_GROUPS,
} from "./templates";
import type {
	AssembledSections,
	AssembleInput,
	ContentBlock,
	NewsletterDocument,
	SectionManifest,
	SessionLine,
} from "./types";

const COURSE_CATEGORIES: readonly CourseCategory[] = ["AdultCourse", "JuniorCourse"];

/** Always the first block; accepted in a requested order and otherwise ignored there */
export const INTRO_BLOCK_KEY = "intro";

export const CATEGORY_BLOCK_KEYS: Record<CourseCategory, string> = {
	AdultCourse: "adults",
	JuniorCourse: "juniors",
};

interface RenderedSection {
	html: string;
	manifest: SectionManifest;
}

export interface BlockOrder {
	order: string[];
	/** Requested keys with no matching block, each reported once */
	unknown: string[];
}

/**
 * Requested keys that exist come first (duplicates dropped); every other
 * available block follows in its default position.
 */
export function resolveBlockOrder(available: readonly string[], requested: readonly string[] = []): BlockOrder {
	const known = new Set(available);
	const placed = new Set<string>();
	const order: string[] = [];
	const unknown: string[] = [];

	for (const key of requested) {
		if (!known.has(key)) {
			if (!unknown.includes(key)) unknown.push(key);
			continue;
		}
		if (placed.has(key)) continue;
		placed.add(key);
		order.push(key);
	}
	for (const key of available) {
		if (!placed.has(key)) {
			placed.add(key);
			order.push(key);
		}
	}

	return { order, unknown };
}

function countWarnings(lines: readonly SessionLine[]): SectionManifest["warnings"] {
	return {
		limited: lines.filter((l) => l.warning === "Limited spots!").length,
		full: lines.filter((l) => l.warning === "Full!").length,
	};
}

function renderCourseSection(
	group: CourseGroup,
	intro: string,
	bookingBaseUrl: string,
	thresholds: CapacityThresholds | undefined,
): RenderedSection {
	const lines = group.sessions.map((s) => sessionLine(s, thresholds));
	const label = displayLabel(group.skillTier);
	const icon = tierIcon(group.skillTier);
	const bookingUrl = courseBookingUrl(group, bookingBaseUrl);

	const html = populateTemplate(COURSE_SECTION_TEMPLATE, {
		icon,
		label,
		intro,
		lines,
		bookingUrl,
		ctaLabel: `Book ${label}`,
	}).trimEnd();

	return {
		html,
		manifest: {
			key: group.key,
			kind: "course",
			category: group.category,
			skillTier: group.skillTier,
			heading: `${icon} ${label}`,
			bookingUrl,
			sessionCount: group.sessions.length,
			participantTotal: group.participantTotal,
			warning: mostSevere(lines.map((l) => l.warning)),
			warnings: countWarnings(lines),
		},
	};
}

/** Events without session rows render with an empty session list. */
type EventBlockSource = Pick<EventGroup, "key" | "name" | "sessions" | "participantTotal">;

function renderEventBlock(
	group: EventBlockSource,
	description: string,
	imageUrl: string | undefined,
	bookingUrl: string | null,
	thresholds: CapacityThresholds | undefined,
): RenderedSection {
	const lines = group.sessions.map((s) => sessionLine(s, thresholds));

	const html = populateTemplate(EVENT_BLOCK_TEMPLATE, {
		name: group.name,
		imageUrl,
		description,
		lines,
		bookingUrl,
	}).trimEnd();

	return {
		html,
		manifest: {
			key: group.key,
			kind: "event",
			category: "Event",
			skillTier: null,
			heading: group.name,
			bookingUrl,
			sessionCount: group.sessions.length,
			participantTotal: group.participantTotal,
			warning: mostSevere(lines.map((l) => l.warning)),
			warnings: countWarnings(lines),
		},
	};
}

/**
 * Render one block per course category and per event group, then arrange
 * them by the requested order. Missing prose falls back to the fixed table.
 */
export function assembleSections(input: AssembleInput): AssembledSections {
	const { catalog, prose, thresholds } = input;
	const details = indexEventDetails(input.events);
	const blocks = new Map<string, ContentBlock>();
	const manifests = new Map<string, SectionManifest[]>();

	for (const category of COURSE_CATEGORIES) {
		const groups = catalog.courses.filter((g) => g.category === category);
		if (groups.length === 0) continue;

		const sections = groups.map((group) =>
			renderCourseSection(
				group,
				prose?.groups[group.key]?.text ?? FALLBACK_PROSE.tiers[group.skillTier],
				input.bookingBaseUrl,
				thresholds,
			),
		);

		const key = CATEGORY_BLOCK_KEYS[category];
		const html = populateTemplate(CATEGORY_BLOCK_TEMPLATE, {
			title: CATEGORY_TITLES[category],
			description: prose?.categories[category]?.text ?? FALLBACK_PROSE.categories[category],
			ageGroups: category === "JuniorCourse" ? JUNIOR_AGE_GROUPS : [],
			sections: sections.map((s) => s.html).join("\n"),
		}).trimEnd();

		blocks.set(key, { key, kind: "category", html });
		manifests.set(key, sections.map((s) => s.manifest));
	}

	for (const group of catalog.events) {
		const eventDetails = details.get(group.name);
		const rendered = renderEventBlock(
			group,
			prose?.groups[group.key]?.text ?? eventDetails?.description ?? FALLBACK_PROSE.event,
			eventDetails?.imageUrl,
			eventBookingUrl(eventDetails),
			thresholds,
		);
		blocks.set(group.key, { key: group.key, kind: "event", html: rendered.html });
		manifests.set(group.key, [rendered.manifest]);
	}

	for (const unscheduled of detailOnlyEvents(catalog, input.events)) {
		const key = eventGroupKey(unscheduled.name);
		const rendered = renderEventBlock(
			{ key, name: unscheduled.name, sessions: [], participantTotal: 0 },
			prose?.groups[key]?.text ?? unscheduled.description ?? FALLBACK_PROSE.event,
			unscheduled.imageUrl,
			eventBookingUrl(unscheduled),
			thresholds,
		);
		blocks.set(key, { key, kind: "event", html: rendered.html });
		manifests.set(key, [rendered.manifest]);
	}

	const requested = input.order?.filter((key) => key !== INTRO_BLOCK_KEY);
	const { order, unknown } = resolveBlockOrder([...blocks.keys()], requested);
	const ordered: ContentBlock[] = [];
	const sections: SectionManifest[] = [];
	for (const key of order) {
		const block = blocks.get(key);
		if (block) ordered.push(block);
		sections.push(...(manifests.get(key) ?? []));
	}

	return { blocks: ordered, sections, unknownOrderKeys: unknown };
}

export interface ComposeOptions {
	/** Rendered as the document's <h1> */
	subjectLine?: string;
	summary?: string;
}

/** Wrap content blocks, plus an intro block when a subject or summary is given, in the document shell. */
export function composeNewsletter(blocks: readonly ContentBlock[], options: ComposeOptions = {}): NewsletterDocument {
	const all: ContentBlock[] = [];
	if (options.subjectLine || options.summary) {
		const html = populateTemplate(INTRO_BLOCK_TEMPLATE, {
			subjectLine: options.subjectLine,
			summary: options.summary,
		}).trimEnd();
		all.push({ key: INTRO_BLOCK_KEY, kind: "intro", html });
	}
	all.push(...blocks);

	const html = populateTemplate(DOCUMENT_TEMPLATE, {
		body: all.map((b) => b.html).join("\n"),
	});

	return { blocks: all, html };
}

export interface AssembledNewsletter extends AssembledSections {
	document: NewsletterDocument;
}

/** {@link assembleSections} followed by {@link composeNewsletter}. */
export function assembleNewsletter(input: AssembleInput & ComposeOptions): AssembledNewsletter {
	const assembled = assembleSections(input);
	return {
		...assembled,
		document: composeNewsletter(assembled.blocks, {
			subjectLine: input.subjectLine,
			summary: input.summary,
		}),
	};
}
