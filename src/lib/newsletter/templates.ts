// ---------------------------------------------------------------------------
// Newsletter — Handlebars Templates
// One template per block type. Standalone block tags drop their own line.
// ---------------------------------------------------------------------------

export const COURSE_SECTION_TEMPLATE = `<h3>{{icon}} {{label}}</h3>
<p>{{intro}}</p>
<ul>
{{#each lines}}
<li>{{text}}{{#if warning}} <strong>({{warning}})</strong>{{/if}}</li>
{{/each}}
</ul>
{{#if bookingUrl}}
{{ctaButton bookingUrl ctaLabel}}
{{/if}}
`;

export const CATEGORY_BLOCK_TEMPLATE = `<h2>{{title}}</h2>
<p>{{description}}</p>
{{#if ageGroups}}
<p><strong>Age Groups:</strong></p>
<ul>
{{#each ageGroups}}
<li>{{this}}</li>
{{/each}}
</ul>
{{/if}}
{{{sections}}}
`;

export const EVENT_BLOCK_TEMPLATE = `<div style="margin: 40px 0;">
<h2>{{name}}</h2>
{{#if imageUrl}}
{{image imageUrl name}}
{{/if}}
<p>{{description}}</p>
{{#if lines}}
<ul>
{{#each lines}}
<li>{{text}}{{#if warning}} <strong>({{warning}})</strong>{{/if}}</li>
{{/each}}
</ul>
{{/if}}
{{#if bookingUrl}}
{{ctaButton bookingUrl "Book Your Spot"}}
{{/if}}
</div>
`;

export const INTRO_BLOCK_TEMPLATE = `{{#if subjectLine}}
<h1>{{subjectLine}}</h1>
{{/if}}
{{#if summary}}
<div class="summary"><p>{{summary}}</p></div>
{{/if}}
`;

export const DOCUMENT_TEMPLATE = `<div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto; width: 100%; box-sizing: border-box; text-align: left;">
{{{body}}}
</div>
`;

export const CATEGORY_TITLES = {
	AdultCourse: "Adult Courses",
	JuniorCourse: "Term Time Junior Courses",
} as const;

/** Colour-ball stages shown above the junior courses. */
export const JUNIOR_AGE_GROUPS: readonly string[] = [
	"🔵 Blue (4–6) – New to tennis",
	"🔴 Red (6–8) – Rallying, volleying, serving",
	"🟠 Orange (8–11) – Hitting from mid-court and learning tactics. Great for beginners and improvers.",
	"🟢 Green (11–14) – Playing on full-size courts with standard balls. All levels welcome, with drills matched to ability.",
];
