// ---------------------------------------------------------------------------
// Unit Tests: Prose Resolver
// Provider answers, rejections, timeouts and blank answers → fallback text
// ---------------------------------------------------------------------------

import { FALLBACK_PROSE } from "@/lib/prose/fallbacks";
import {
	ProseTimeoutError,
	type SectionProseRequests,
	requestProse,
	resolveDocumentProse,
	resolveSectionProse,
} from "@/lib/prose/resolver";
import type {
	CategoryProseRequest,
	EventProseRequest,
	ProseProvider,
	TierProseRequest,
} from "@/lib/prose/types";
import { describe, expect, it, vi } from "vitest";

function createProvider(overrides: Partial<ProseProvider> = {}): ProseProvider {
	return {
		subjectLine: vi.fn(async () => "Serve up summer"),
		previewText: vi.fn(async () => "New courses at Belair Park"),
		summary: vi.fn(async () => "Courts are drying out and courses are filling up."),
		categoryDescription: vi.fn(async ({ category }: CategoryProseRequest) => `Intro for ${category}`),
		tierDescription: vi.fn(async ({ tier }: TierProseRequest) => `Intro for ${tier}`),
		eventDescription: vi.fn(async ({ name }: EventProseRequest) => `Intro for ${name}`),
		...overrides,
	};
}

const requests: SectionProseRequests = {
	categories: [{ category: "AdultCourse", tiers: ["Beginner"] }],
	tiers: [
		{
			key: "AdultCourse:Beginner",
			request: { category: "AdultCourse", tier: "Beginner", sessionCount: 2, earliestStart: "27 Jul" },
		},
	],
	events: [
		{
			key: "event:Summer Social",
			request: { name: "Summer Social", description: "Doubles and drinks", sessions: [] },
		},
		{ key: "event:Club Night", request: { name: "Club Night", sessions: [] } },
	],
};

describe("requestProse", () => {
	it("returns generated text, trimmed", async () => {
		const result = await requestProse("summary", async () => "  Hello  ", "fallback", { timeoutMs: 100 });
		expect(result).toEqual({ text: "Hello", source: "generated" });
	});

	it("uses the fallback without reporting when no provider is configured", async () => {
		const onFallback = vi.fn();
		const result = await requestProse("summary", null, "fallback", { timeoutMs: 100, onFallback });

		expect(result).toEqual({ text: "fallback", source: "fallback" });
		expect(onFallback).not.toHaveBeenCalled();
	});

	it("falls back when the provider rejects", async () => {
		const onFallback = vi.fn();
		const result = await requestProse(
			"summary",
			async () => {
				throw new Error("quota exceeded");
			},
			"fallback",
			{ timeoutMs: 100, onFallback },
		);

		expect(result).toEqual({ text: "fallback", source: "fallback" });
		expect(onFallback).toHaveBeenCalledWith("summary", "quota exceeded");
	});

	it("falls back when the provider throws synchronously", async () => {
		const result = await requestProse(
			"summary",
			() => {
				throw new Error("not configured");
			},
			"fallback",
			{ timeoutMs: 100 },
		);
		expect(result.source).toBe("fallback");
	});

	it("falls back on a blank answer", async () => {
		const onFallback = vi.fn();
		const result = await requestProse("summary", async () => "   ", "fallback", { timeoutMs: 100, onFallback });

		expect(result.text).toBe("fallback");
		expect(onFallback).toHaveBeenCalledWith("summary", "provider returned blank text");
	});

	it("falls back when the provider does not answer in time", async () => {
		const onFallback = vi.fn();
		const never = () => new Promise<string>(() => undefined);
		const result = await requestProse("subjectLine", never, "fallback", { timeoutMs: 20, onFallback });

		expect(result).toEqual({ text: "fallback", source: "fallback" });
		expect(onFallback).toHaveBeenCalledWith("subjectLine", 'Prose request "subjectLine" timed out after 20ms');
	});

	it("aborts the provider call once it times out", async () => {
		let received: AbortSignal | undefined;
		const result = await requestProse(
			"summary",
			(signal) => {
				received = signal;
				return new Promise<string>(() => undefined);
			},
			"fallback",
			{ timeoutMs: 20 },
		);

		expect(result.source).toBe("fallback");
		expect(received?.aborted).toBe(true);
		expect(received?.reason).toBeInstanceOf(ProseTimeoutError);
	});

	it("leaves the signal alone when the provider answers in time", async () => {
		let received: AbortSignal | undefined;
		await requestProse(
			"summary",
			async (signal) => {
				received = signal;
				return "Hello";
			},
			"fallback",
			{ timeoutMs: 100 },
		);

		expect(received?.aborted).toBe(false);
	});

	it("names the timeout error", () => {
		expect(new ProseTimeoutError("summary", 5).name).toBe("ProseTimeoutError");
	});
});

describe("resolveSectionProse", () => {
	it("keys generated texts by category and group", async () => {
		const prose = await resolveSectionProse(createProvider(), requests, { timeoutMs: 100 });

		expect(prose.categories.AdultCourse).toEqual({ text: "Intro for AdultCourse", source: "generated" });
		expect(prose.groups["AdultCourse:Beginner"]).toEqual({ text: "Intro for Beginner", source: "generated" });
		expect(prose.groups["event:Club Night"]).toEqual({ text: "Intro for Club Night", source: "generated" });
	});

	it("uses the fallback table without a provider", async () => {
		const prose = await resolveSectionProse(null, requests, { timeoutMs: 100 });

		expect(prose.categories.AdultCourse?.text).toBe(FALLBACK_PROSE.categories.AdultCourse);
		expect(prose.groups["AdultCourse:Beginner"].text).toBe(FALLBACK_PROSE.tiers.Beginner);
		expect(prose.groups["event:Summer Social"].text).toBe("Doubles and drinks");
		expect(prose.groups["event:Club Night"].text).toBe(FALLBACK_PROSE.event);
	});

	it("falls back per context and reports each failure", async () => {
		const onFallback = vi.fn();
		const provider = createProvider({
			tierDescription: vi.fn(async () => {
				throw new Error("503 Service Unavailable");
			}),
		});

		const prose = await resolveSectionProse(provider, requests, { timeoutMs: 100, onFallback });

		expect(prose.groups["AdultCourse:Beginner"]).toEqual({
			text: FALLBACK_PROSE.tiers.Beginner,
			source: "fallback",
		});
		expect(prose.categories.AdultCourse?.source).toBe("generated");
		expect(onFallback).toHaveBeenCalledTimes(1);
		expect(onFallback).toHaveBeenCalledWith("AdultCourse:Beginner", "503 Service Unavailable");
	});
});

describe("resolveDocumentProse", () => {
	it("passes the body text to every document-level request", async () => {
		const provider = createProvider();
		const prose = await resolveDocumentProse(provider, { bodyText: "Adult Courses" }, { timeoutMs: 100 });

		expect(prose.subjectLine.text).toBe("Serve up summer");
		expect(prose.previewText.text).toBe("New courses at Belair Park");
		expect(prose.summary.text).toBe("Courts are drying out and courses are filling up.");
		expect(provider.subjectLine).toHaveBeenCalledWith(
			{ bodyText: "Adult Courses" },
			{ signal: expect.any(AbortSignal) },
		);
	});

	it("always yields a complete set of texts without a provider", async () => {
		const prose = await resolveDocumentProse(null, { bodyText: "" }, { timeoutMs: 100 });

		expect(prose).toEqual({
			subjectLine: { text: FALLBACK_PROSE.subjectLine, source: "fallback" },
			previewText: { text: FALLBACK_PROSE.previewText, source: "fallback" },
			summary: { text: FALLBACK_PROSE.summary, source: "fallback" },
		});
	});
});
