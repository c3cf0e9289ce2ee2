// ---------------------------------------------------------------------------
// Template Population Engine (Handlebars.js)
// populateTemplate(templateHtml, data): string
// ---------------------------------------------------------------------------

import Handlebars from "handlebars";
import { escapeHtml } from "./escape";

// Private environment: helpers never leak into the global Handlebars instance.
const handlebars = Handlebars.create();

const compiled = new Map<string, Handlebars.TemplateDelegate>();

/**
 * Usage in templates:
 *   {{image sourceUrl altText}}     → full-width <img>
 *   {{ctaButton url label}}         → centred call-to-action link
 *
 * URLs go through escapeHtml rather than Handlebars' escaping, which would
 * also rewrite "=" inside query strings.
 */
handlebars.registerHelper("image", (sourceUrl: unknown, altText: unknown) => {
	const safeUrl = escapeHtml(String(sourceUrl ?? ""));
	const safeAlt = escapeHtml(typeof altText === "string" ? altText : "");
	return new handlebars.SafeString(
		`<img src="${safeUrl}" alt="${safeAlt}" style="width: 100%; max-width: 600px; margin: 10px auto; display: block;" />`,
	);
});

handlebars.registerHelper("ctaButton", (url: unknown, label: unknown) => {
	const safeUrl = escapeHtml(String(url ?? ""));
	const safeLabel = escapeHtml(String(label ?? ""));
	return new handlebars.SafeString(
		`<p style="text-align: center;"><a href="${safeUrl}" class="cta-button">${safeLabel}</a></p>`,
	);
});

/**
 * Populates an HTML template with data using Handlebars.
 * - XSS escaping is active by default ({{var}})
 * - Triple-stache ({{{var}}}) for trusted HTML content
 * - Missing placeholders resolve to empty strings
 * - Compiled templates are cached per source string
 *
 * @param templateHtml HTML template string
 * @param data         Data object for placeholders
 * @returns            Rendered HTML
 */
export function populateTemplate(templateHtml: string, data: object): string {
	let template = compiled.get(templateHtml);
	if (!template) {
		template = handlebars.compile(templateHtml, { noEscape: false, strict: false });
		compiled.set(templateHtml, template);
	}
	return template(data);
}
