// ---------------------------------------------------------------------------
// Unit Tests: Prose Text Helpers
// ---------------------------------------------------------------------------

import { cleanProse, htmlToText } from "@/lib/prose/text";
import { describe, expect, it } from "vitest";

describe("cleanProse", () => {
	it("strips one pair of wrapping quotes", () => {
		expect(cleanProse('"Serve up summer"')).toBe("Serve up summer");
		expect(cleanProse("'Serve up summer'")).toBe("Serve up summer");
	});

	it("strips list numbering and dash bullets and joins lines", () => {
		expect(cleanProse("- First line\n2) Second line\n\n3. Third line")).toBe("First line Second line Third line");
	});

	it("strips numbering inside wrapping quotes", () => {
		expect(cleanProse('"1. Serve up summer"')).toBe("Serve up summer");
	});

	it("leaves leading numbers that are not list markers", () => {
		expect(cleanProse("2025 starts with a bang")).toBe("2025 starts with a bang");
	});

	it("returns an empty string for missing content", () => {
		expect(cleanProse(null)).toBe("");
		expect(cleanProse(undefined)).toBe("");
		expect(cleanProse("  \n ")).toBe("");
	});
});

describe("htmlToText", () => {
	it("drops tags, decodes entities and collapses whitespace", () => {
		expect(htmlToText("<h2>Events</h2>\n<p>Doubles &amp; drinks</p>\n<li>A &lt;b&gt; &#x27;c&#x27;</li>")).toBe(
			"Events Doubles & drinks A <b> 'c'",
		);
	});

	it("decodes &amp; last", () => {
		expect(htmlToText("<p>&amp;lt;</p>")).toBe("&lt;");
	});
});
