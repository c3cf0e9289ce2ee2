// ---------------------------------------------------------------------------
// Unit Tests: Template Populator (Handlebars)
// Escaping, helpers, whitespace of the newsletter templates
// ---------------------------------------------------------------------------

import { escapeHtml } from "@/lib/html/escape";
import { populateTemplate } from "@/lib/html/populator";
import Handlebars from "handlebars";
import { describe, expect, it } from "vitest";

describe("populateTemplate", () => {
	it("escapes HTML in data values by default", () => {
		const result = populateTemplate("<p>{{name}}</p>", { name: '<script>alert("x")</script>' });
		expect(result).toBe("<p>&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;</p>");
	});

	it("allows triple-stache for trusted markup", () => {
		expect(populateTemplate("<div>{{{body}}}</div>", { body: "<h2>Events</h2>" })).toBe("<div><h2>Events</h2></div>");
	});

	it("renders missing placeholders as empty strings", () => {
		expect(populateTemplate("<h1>{{title}}</h1><p>{{missing}}</p>", { title: "Present" })).toBe(
			"<h1>Present</h1><p></p>",
		);
	});

	it("drops standalone block tags together with their line", () => {
		const template = "<ul>\n{{#each items}}\n<li>{{this}}</li>\n{{/each}}\n</ul>\n";
		expect(populateTemplate(template, { items: ["A", "B"] })).toBe("<ul>\n<li>A</li>\n<li>B</li>\n</ul>\n");
	});

	it("treats an empty list as false in #if", () => {
		const template = "a\n{{#if items}}\nlist\n{{/if}}\nb\n";
		expect(populateTemplate(template, { items: [] })).toBe("a\nb\n");
	});

	it("renders the same output for repeated calls", () => {
		const template = "<p>{{n}}</p>";
		expect(populateTemplate(template, { n: 1 })).toBe("<p>1</p>");
		expect(populateTemplate(template, { n: 2 })).toBe("<p>2</p>");
	});
});

describe("template helpers", () => {
	it("renders a call-to-action link with an escaped URL", () => {
		const result = populateTemplate('{{ctaButton url "Book Beginner"}}', {
			url: "https://booking.example.com/Adult?a=1&b=2",
		});

		expect(result).toBe(
			'<p style="text-align: center;"><a href="https://booking.example.com/Adult?a=1&amp;b=2" class="cta-button">Book Beginner</a></p>',
		);
	});

	it("keeps '=' in query strings", () => {
		const result = populateTemplate("{{ctaButton url label}}", {
			url: "https://booking.example.com/Adult?skill-level%5B%5D=1",
			label: "Go",
		});
		expect(result).toContain('href="https://booking.example.com/Adult?skill-level%5B%5D=1"');
	});

	it("renders an image with escaped alt text", () => {
		const result = populateTemplate("{{image src alt}}", { src: "https://img.example.com/a.png", alt: "Tom's camp" });

		expect(result).toBe(
			'<img src="https://img.example.com/a.png" alt="Tom&#39;s camp" style="width: 100%; max-width: 600px; margin: 10px auto; display: block;" />',
		);
	});

	it("does not register helpers on the global Handlebars instance", () => {
		expect(Handlebars.helpers.ctaButton).toBeUndefined();
	});
});

describe("escapeHtml", () => {
	it("escapes & < > \" '", () => {
		expect(escapeHtml(`<a href="x">Tom's & co</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;Tom&#39;s &amp; co&lt;/a&gt;");
	});
});
