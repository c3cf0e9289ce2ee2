// ---------------------------------------------------------------------------
// Newsletter Prose — Text Helpers
// ---------------------------------------------------------------------------

const LIST_MARKER_RE = /^(?:\d+[.)-]|-)\s*/;

/**
 * Normalize a model answer to a single line of prose:
 * - strips one pair of wrapping double or single quotes
 * - strips list numbering ("1.", "2)") and dash bullets per line
 * - joins the remaining non-empty lines with single spaces
 */
export function cleanProse(raw: string | null | undefined): string {
	if (!raw) return "";

	let text = raw.trim();
	if (text.length >= 2) {
		const first = text[0];
		const last = text[text.length - 1];
		if ((first === '"' && last === '"') || (first === "'" && last === "'")) {
			text = text.slice(1, -1);
		}
	}

	return text
		.split("\n")
		.map((line) => line.trim().replace(LIST_MARKER_RE, "").trim())
		.filter((line) => line.length > 0)
		.join(" ");
}

/** Plain text of rendered markup, whitespace collapsed. Used to brief the provider. */
export function htmlToText(html: string): string {
	return html
		.replace(/<[^>]+>/g, " ")
		.replace(/&nbsp;/g, " ")
		.replace(/&lt;/g, "<")
		.replace(/&gt;/g, ">")
		.replace(/&quot;/g, '"')
		.replace(/&#x27;|&#39;/g, "'")
		.replace(/&#x3D;/g, "=")
		.replace(/&#x60;/g, "`")
		.replace(/&amp;/g, "&")
		.replace(/\s+/g, " ")
		.trim();
}
