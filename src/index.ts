export { courseBookingUrl, encodeDateAnchor, eventBookingUrl } from "./lib/catalog/booking-links";
export { DEFAULT_CAPACITY_THRESHOLDS, mostSevere, warningFor } from "./lib/catalog/capacity";
export { ConfigurationError, FormatError, ValidationError } from "./lib/catalog/errors";
export { formatDate, formatTime, formatWeekday } from "./lib/catalog/format";
export { groupSessions, summarizeCatalog } from "./lib/catalog/grouping";
export { describeReport, parseRows, validateRow } from "./lib/catalog/record-parser";
export type { RawRow, RowOutcome } from "./lib/catalog/record-parser";
export { EventDetailsListSchema, EventDetailsSchema, SESSION_COLUMNS } from "./lib/catalog/schemas";
export type { EventDetails } from "./lib/catalog/schemas";
export {
	SKILL_TIER_TABLE,
	bookingCode,
	displayLabel,
	orderedTiers,
	parseSkillTier,
	rank,
	tierIcon,
} from "./lib/catalog/skill-tiers";
export type * from "./lib/catalog/types";
export { loadConfig, resetConfig } from "./lib/config";
export type { AppConfig } from "./lib/config";
export { writeNewsletterFiles } from "./lib/html/writer";
export { flushRollbar, reportError } from "./lib/monitoring/reporting";
export { assembleNewsletter, assembleSections, composeNewsletter, resolveBlockOrder } from "./lib/newsletter/assembler";
export { NewsletterGenerator, createNewsletterGenerator } from "./lib/newsletter/generator";
export type { NewsletterGeneratorOptions, NewsletterRequest } from "./lib/newsletter/generator";
export type * from "./lib/newsletter/types";
export { ChatProseClient, ProseServiceError } from "./lib/prose/client";
export { createProseProvider } from "./lib/prose/factory";
export { FALLBACK_PROSE } from "./lib/prose/fallbacks";
export { ProseTimeoutError, resolveDocumentProse, resolveSectionProse } from "./lib/prose/resolver";
export type * from "./lib/prose/types";
