// ---------------------------------------------------------------------------
// Newsletter — Generator Orchestrator
// rows → records → groups → prose → blocks → document, manifest and payload
// ---------------------------------------------------------------------------

import { v4 as uuidv4 } from "uuid";
import { ValidationError } from "@/lib/catalog/errors";
import { groupSessions, summarizeCatalog } from "@/lib/catalog/grouping";
import { parseRows, type RawRow } from "@/lib/catalog/record-parser";
import { type EventDetails, EventDetailsListSchema } from "@/lib/catalog/schemas";
import type { CapacityThresholds } from "@/lib/catalog/types";
import { type AppConfig, loadConfig } from "@/lib/config";
import { computeContentHash } from "@/lib/html/content-hash";
import { writeNewsletterFiles } from "@/lib/html/writer";
import {
	logProseFallback,
	logRunComplete,
	logRunFailure,
	logSkippedRow,
	logUnknownOrderKeys,
} from "@/lib/monitoring/newsletter-logger";
import { createProseProvider } from "@/lib/prose/factory";
import { type ProseResolverOptions, resolveDocumentProse, resolveSectionProse } from "@/lib/prose/resolver";
import { htmlToText } from "@/lib/prose/text";
import type { ProseProvider } from "@/lib/prose/types";
import { assembleSections, composeNewsletter } from "./assembler";
import { buildProseRequests } from "./sections";
import type { NewsletterGenerationEvent, NewsletterGenerationResult, NewsletterManifest } from "./types";

export interface NewsletterGeneratorOptions {
	/** Booking site root for course links */
	bookingBaseUrl: string;
	/** null or omitted: every text comes from the fallback table */
	prose?: ProseProvider | null;
	/** Upper bound per prose request (default: 15000) */
	proseTimeoutMs?: number;
	thresholds?: CapacityThresholds;
	/** Directory for newsletter.html, manifest.json and payload.json; null disables file output */
	outputDir?: string | null;
}

export interface NewsletterRequest {
	rows: readonly RawRow[];
	/** Details per event name; validated before use */
	events?: readonly EventDetails[];
	/** Top-level block order, e.g. ["juniors", "adults", "event:Summer Social"] */
	order?: readonly string[];
	/** Reject the whole input when any row is invalid */
	strict?: boolean;
	/** Caller-edited texts replace the resolved ones */
	subjectLine?: string;
	previewText?: string;
	summary?: string;
}

/**
 * Orchestrates one newsletter run:
 * 1. Validate rows and event details
 * 2. Group sessions
 * 3. Resolve category, tier and event prose (with fallbacks)
 * 4. Assemble blocks in the requested order
 * 5. Resolve subject line, preview text and summary from the body text
 * 6. Compose the document, manifest and delivery payload
 * 7. Optionally write them to the output directory
 */
export class NewsletterGenerator {
	private readonly bookingBaseUrl: string;
	private readonly prose: ProseProvider | null;
	private readonly proseTimeoutMs: number;
	private readonly thresholds: CapacityThresholds | undefined;
	private readonly outputDir: string | null;

	constructor(options: NewsletterGeneratorOptions) {
		this.bookingBaseUrl = options.bookingBaseUrl;
		this.prose = options.prose ?? null;
		this.proseTimeoutMs = options.proseTimeoutMs ?? 15000;
		this.thresholds = options.thresholds;
		this.outputDir = options.outputDir ?? null;
	}

	/**
	 * Runs the full pipeline. Failed runs are logged and rethrown; nothing
	 * is written for them.
	 */
	async generate(request: NewsletterRequest): Promise<NewsletterGenerationResult> {
		const runId = uuidv4();
		try {
			return await this.run(runId, request);
		} catch (err) {
			logRunFailure(runId, err);
			throw err;
		}
	}

	private async run(runId: string, request: NewsletterRequest): Promise<NewsletterGenerationResult> {
		const startMs = Date.now();

		// Step 1: Validate input
		const events = this.parseEventDetails(request.events);
		const { records, report } = parseRows(request.rows, { strict: request.strict });
		for (const [rowIndex, reason] of report) {
			logSkippedRow(runId, rowIndex, reason);
		}

		// Step 2: Group
		const catalog = groupSessions(records);

		// Step 3: Section prose
		let proseFallbacks = 0;
		const resolverOptions: ProseResolverOptions = {
			timeoutMs: this.proseTimeoutMs,
			onFallback: (label, reason) => {
				proseFallbacks++;
				logProseFallback(runId, label, reason);
			},
		};
		const sectionProse = await resolveSectionProse(
			this.prose,
			buildProseRequests(catalog, events),
			resolverOptions,
		);

		// Step 4: Blocks
		const assembled = assembleSections({
			catalog,
			bookingBaseUrl: this.bookingBaseUrl,
			prose: sectionProse,
			events,
			order: request.order,
			thresholds: this.thresholds,
		});
		if (assembled.unknownOrderKeys.length > 0) {
			logUnknownOrderKeys(runId, assembled.unknownOrderKeys);
		}

		// Step 5: Document-level prose, skipped when the caller supplied all three
		const overridden = Boolean(request.subjectLine && request.previewText && request.summary);
		const documentProse = await resolveDocumentProse(
			overridden ? null : this.prose,
			{ bodyText: htmlToText(assembled.blocks.map((b) => b.html).join("\n")) },
			resolverOptions,
		);
		const subjectLine = request.subjectLine || documentProse.subjectLine.text;
		const previewText = request.previewText || documentProse.previewText.text;
		const summary = request.summary || documentProse.summary.text;

		// Step 6: Compose
		const document = composeNewsletter(assembled.blocks, { subjectLine, summary });
		const manifest: NewsletterManifest = {
			runId,
			generatedAt: new Date().toISOString(),
			summary: summarizeCatalog(records),
			sections: assembled.sections,
			report: Object.fromEntries([...report].map(([rowIndex, reason]) => [String(rowIndex), reason])),
			unknownOrderKeys: assembled.unknownOrderKeys,
			contentHash: computeContentHash(document.html, assembled.sections),
		};
		const payload = { subject: subjectLine, content: document.html, preview_text: previewText };

		// Step 7: Files
		if (this.outputDir) {
			await writeNewsletterFiles(this.outputDir, { html: document.html, manifest, payload });
		}

		const event: NewsletterGenerationEvent = {
			event: "newsletter.generated",
			runId,
			totalRows: request.rows.length,
			validRows: records.length,
			skippedRows: report.size,
			courseSections: assembled.sections.filter((s) => s.kind === "course").length,
			eventSections: assembled.sections.filter((s) => s.kind === "event").length,
			proseFallbacks,
			durationMs: Date.now() - startMs,
		};
		logRunComplete(event);

		return {
			runId,
			document,
			sections: assembled.sections,
			report,
			subjectLine,
			previewText,
			summary,
			payload,
			manifest,
			outputDir: this.outputDir,
		};
	}

	private parseEventDetails(events: readonly EventDetails[] | undefined): EventDetails[] {
		const result = EventDetailsListSchema.safeParse(events ?? []);
		if (!result.success) {
			const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
			throw new ValidationError(`Event details invalid: ${issues}`);
		}
		return result.data;
	}
}

/** Generator wired from the environment configuration. */
export function createNewsletterGenerator(config: AppConfig = loadConfig()): NewsletterGenerator {
	return new NewsletterGenerator({
		bookingBaseUrl: config.BOOKING_BASE_URL,
		prose: createProseProvider(config),
		proseTimeoutMs: config.PROSE_TIMEOUT_MS,
		thresholds: { limited: config.CAPACITY_LIMITED_AT, full: config.CAPACITY_FULL_AT },
		outputDir: config.NEWSLETTER_OUTPUT_DIR,
	});
}
