// ---------------------------------------------------------------------------
// Newsletter Prose — Resolver
// Awaits the provider per context and substitutes fallback text on any failure.
// ---------------------------------------------------------------------------

import { FALLBACK_PROSE } from "./fallbacks";
import type {
	CategoryProseRequest,
	DocumentProse,
	DocumentProseRequest,
	EventProseRequest,
	ProseCallOptions,
	ProseProvider,
	ResolvedText,
	SectionProse,
	TierProseRequest,
} from "./types";

export interface ProseResolverOptions {
	/** Upper bound for a single provider call */
	timeoutMs: number;
	/** Called once per context that fell back after a provider failure */
	onFallback?: (label: string, reason: string) => void;
}

export interface SectionProseRequests {
	categories: CategoryProseRequest[];
	tiers: Array<{ key: string; request: TierProseRequest }>;
	events: Array<{ key: string; request: EventProseRequest }>;
}

export class ProseTimeoutError extends Error {
	constructor(label: string, timeoutMs: number) {
		super(`Prose request "${label}" timed out after ${timeoutMs}ms`);
		this.name = "ProseTimeoutError";
	}
}

/** Races `call` against the timeout; the signal handed to `call` is aborted when the timeout wins. */
function withTimeout<T>(call: (signal: AbortSignal) => Promise<T>, label: string, timeoutMs: number): Promise<T> {
	const controller = new AbortController();
	let timer: ReturnType<typeof setTimeout> | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			const error = new ProseTimeoutError(label, timeoutMs);
			controller.abort(error);
			reject(error);
		}, timeoutMs);
	});
	const pending = Promise.resolve().then(() => call(controller.signal));
	return Promise.race([pending, timeout]).finally(() => clearTimeout(timer));
}

type ProviderCall = (signal: AbortSignal) => Promise<string>;

function bindProvider(
	provider: ProseProvider | null,
	call: (provider: ProseProvider, options: ProseCallOptions) => Promise<string>,
): ProviderCall | null {
	if (provider === null) return null;
	const bound = provider;
	return (signal) => call(bound, { signal });
}

/**
 * Run one provider call. Never rejects: a rejection, a timeout or a blank
 * answer yields `fallback`. A null `call` means no provider is configured.
 * On timeout the signal passed to `call` is aborted.
 */
export async function requestProse(
	label: string,
	call: ProviderCall | null,
	fallback: string,
	options: ProseResolverOptions,
): Promise<ResolvedText> {
	if (call === null) return { text: fallback, source: "fallback" };

	try {
		const text = (await withTimeout(call, label, options.timeoutMs)).trim();
		if (text.length > 0) return { text, source: "generated" };
		options.onFallback?.(label, "provider returned blank text");
	} catch (err) {
		options.onFallback?.(label, err instanceof Error ? err.message : String(err));
	}
	return { text: fallback, source: "fallback" };
}

/** Category, tier and event intros, requested concurrently. */
export async function resolveSectionProse(
	provider: ProseProvider | null,
	requests: SectionProseRequests,
	options: ProseResolverOptions,
): Promise<SectionProse> {
	const categoryTexts = Promise.all(
		requests.categories.map(
			async (request) =>
				[
					request.category,
					await requestProse(
						`category:${request.category}`,
						bindProvider(provider, (p, callOptions) => p.categoryDescription(request, callOptions)),
						FALLBACK_PROSE.categories[request.category],
						options,
					),
				] as const,
		),
	);

	const tierTexts = Promise.all(
		requests.tiers.map(
			async ({ key, request }) =>
				[
					key,
					await requestProse(
						key,
						bindProvider(provider, (p, callOptions) => p.tierDescription(request, callOptions)),
						FALLBACK_PROSE.tiers[request.tier],
						options,
					),
				] as const,
		),
	);

	const eventTexts = Promise.all(
		requests.events.map(
			async ({ key, request }) =>
				[
					key,
					await requestProse(
						key,
						bindProvider(provider, (p, callOptions) => p.eventDescription(request, callOptions)),
						request.description ?? FALLBACK_PROSE.event,
						options,
					),
				] as const,
		),
	);

	const [categoryEntries, tiers, events] = await Promise.all([categoryTexts, tierTexts, eventTexts]);

	const categories: SectionProse["categories"] = {};
	for (const [category, text] of categoryEntries) {
		categories[category] = text;
	}

	return { categories, groups: Object.fromEntries([...tiers, ...events]) };
}

/** Subject line, preview text and summary for the rendered body. */
export async function resolveDocumentProse(
	provider: ProseProvider | null,
	request: DocumentProseRequest,
	options: ProseResolverOptions,
): Promise<DocumentProse> {
	const [subjectLine, previewText, summary] = await Promise.all([
		requestProse(
			"subjectLine",
			bindProvider(provider, (p, callOptions) => p.subjectLine(request, callOptions)),
			FALLBACK_PROSE.subjectLine,
			options,
		),
		requestProse(
			"previewText",
			bindProvider(provider, (p, callOptions) => p.previewText(request, callOptions)),
			FALLBACK_PROSE.previewText,
			options,
		),
		requestProse(
			"summary",
			bindProvider(provider, (p, callOptions) => p.summary(request, callOptions)),
			FALLBACK_PROSE.summary,
			options,
		),
	]);

	return { subjectLine, previewText, summary };
}
