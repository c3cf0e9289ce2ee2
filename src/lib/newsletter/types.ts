// ---------------------------------------------------------------------------
// Newsletter — Types
// Content blocks, section manifest and the generator's result
// ---------------------------------------------------------------------------

import type { EventDetails } from "@/lib/catalog/schemas";
import type {
	CapacityThresholds,
	CapacityWarning,
	Category,
	CatalogSummary,
	GroupedCatalog,
	SkillTier,
	ValidationReport,
} from "@/lib/catalog/types";
import type { SectionProse } from "@/lib/prose/types";

export type BlockKind = "intro" | "category" | "event";

export interface ContentBlock {
	/** "intro", "adults", "juniors" or "event:{name}" */
	key: string;
	kind: BlockKind;
	html: string;
}

export interface SessionLine {
	/** "{Day(s)} {time} @ {venue} — {durationText} starting {date}" */
	text: string;
	warning: CapacityWarning | null;
}

/** Machine-readable record per rendered course or event section. */
export interface SectionManifest {
	/** Group key, e.g. "AdultCourse:Beginner" or "event:Summer Social" */
	key: string;
	kind: "course" | "event";
	category: Category;
	skillTier: SkillTier | null;
	heading: string;
	bookingUrl: string | null;
	sessionCount: number;
	participantTotal: number;
	/** Most severe warning among the sessions */
	warning: CapacityWarning | null;
	warnings: { limited: number; full: number };
}

export interface AssembleInput {
	catalog: GroupedCatalog;
	/** Booking site root for course links */
	bookingBaseUrl: string;
	/** Category, tier and event intros; missing entries use the fallback table */
	prose?: SectionProse;
	events?: readonly EventDetails[];
	/** Requested top-level order; omitted blocks follow in default order; "intro" always stays first */
	order?: readonly string[];
	thresholds?: CapacityThresholds;
}

export interface AssembledSections {
	/** Category and event blocks in resolved order */
	blocks: ContentBlock[];
	sections: SectionManifest[];
	/** Requested order keys that matched no block */
	unknownOrderKeys: string[];
}

export interface NewsletterDocument {
	/** Intro block (when a subject or summary is set) followed by the content blocks */
	blocks: ContentBlock[];
	html: string;
}

/** Companion payload for downstream email tools. */
export interface NewsletterPayload {
	subject: string;
	content: string;
	preview_text: string;
}

export interface NewsletterManifest {
	runId: string;
	generatedAt: string;
	summary: CatalogSummary;
	sections: SectionManifest[];
	/** Rejected rows, keyed by 0-based row index */
	report: Record<string, string>;
	unknownOrderKeys: string[];
	/** SHA-256 of the rendered HTML and section manifest */
	contentHash: string;
}

export interface NewsletterGenerationEvent {
	event: "newsletter.generated";
	runId: string;
	totalRows: number;
	validRows: number;
	skippedRows: number;
	courseSections: number;
	eventSections: number;
	proseFallbacks: number;
	durationMs: number;
}

export interface NewsletterGenerationResult {
	runId: string;
	document: NewsletterDocument;
	sections: SectionManifest[];
	report: ValidationReport;
	subjectLine: string;
	previewText: string;
	summary: string;
	payload: NewsletterPayload;
	manifest: NewsletterManifest;
	/** Directory the files were written to, when file output is enabled */
	outputDir: string | null;
}
