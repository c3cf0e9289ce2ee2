// ---------------------------------------------------------------------------
// Unit Tests: Content Hash
// ---------------------------------------------------------------------------

import { computeContentHash } from "@/lib/html/content-hash";
import { describe, expect, it } from "vitest";

describe("computeContentHash", () => {
	it("returns a SHA-256 hex string", () => {
		expect(computeContentHash("<h1>Test</h1>", { name: "value" })).toMatch(/^[a-f0-9]{64}$/);
	});

	it("returns consistent hashes for identical inputs", () => {
		expect(computeContentHash("<h1>Test</h1>", { a: 1, b: 2 })).toBe(computeContentHash("<h1>Test</h1>", { a: 1, b: 2 }));
	});

	it("ignores key insertion order, including nested objects", () => {
		const hash1 = computeContentHash("<p/>", [{ key: "adults", warnings: { limited: 1, full: 0 } }]);
		const hash2 = computeContentHash("<p/>", [{ warnings: { full: 0, limited: 1 }, key: "adults" }]);
		expect(hash1).toBe(hash2);
	});

	it("keeps array order significant", () => {
		expect(computeContentHash("<p/>", ["adults", "juniors"])).not.toBe(computeContentHash("<p/>", ["juniors", "adults"]));
	});

	it("produces different hashes for different documents", () => {
		expect(computeContentHash("<h1>V1</h1>", { a: 1 })).not.toBe(computeContentHash("<h1>V2</h1>", { a: 1 }));
	});
});
