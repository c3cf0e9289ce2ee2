// ---------------------------------------------------------------------------
// Content Hash Computation
// SHA-256 over the rendered document and its data, sorted keys
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";

function compareKeys(a: string, b: string): number {
	if (a === b) return 0;
	return a < b ? -1 : 1;
}

/**
 * Compute a SHA-256 hash of the combined template output + data.
 * Keys are sorted for deterministic output regardless of insertion order.
 */
export function computeContentHash(html: string, data: unknown): string {
	const normalized = JSON.stringify({ html, data }, (_key, value: unknown) => {
		if (value !== null && typeof value === "object" && !Array.isArray(value)) {
			return Object.fromEntries(Object.entries(value).sort(([a], [b]) => compareKeys(a, b)));
		}
		return value;
	});

	return createHash("sha256").update(normalized, "utf-8").digest("hex");
}
