// ---------------------------------------------------------------------------
// Environment Configuration Loader
// Validate all env vars on first use with Zod
// ---------------------------------------------------------------------------
//
// Recommended flag values per environment:
//
// ┌──────────────────────────────┬──────────┬──────────┬──────────┐
// │ Flag                         │ Local    │ CI/Test  │ Prod     │
// ├──────────────────────────────┼──────────┼──────────┼──────────┤
// │ ROLLBAR_ENABLED              │ 1        │ 0        │ 1        │
// │ PROSE_ENABLED                │ 0        │ 0        │ 1        │
// │ TELEMETRY_CONSENT            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_ALLOW_PII            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_SAMPLE_RATE_INFO     │ 1        │ —        │ 0.05     │
// │ ROLLBAR_SAMPLE_RATE_WARN     │ 1        │ —        │ 0.05     │
// │ ROLLBAR_SAMPLE_RATE_ERROR    │ 1        │ —        │ 1        │
// │ ROLLBAR_SAMPLE_RATE_CRITICAL │ 1        │ —        │ 1        │
// └──────────────────────────────┴──────────┴──────────┴──────────┘
// * Set to 1 only with explicit user consent (GDPR).
// — Not applicable (Rollbar is disabled in CI).
// ---------------------------------------------------------------------------

import { z } from "zod";
import { ConfigurationError } from "@/lib/catalog/errors";

/**
 * Coerce environment variable strings to booleans for use in Zod schemas.
 *
 * Truthy values: `"1"`, `1`, `true`, `"true"`
 * Falsy values:  `"0"`, `0`, `false`, `"false"`; unset falls back to the default
 *
 * @example
 * ```ts
 * const Schema = z.object({
 *   PROSE_ENABLED: envBool(false),  // set "1" to call the prose service
 * });
 * ```
 */
const envBool = (defaultValue: boolean) =>
	z
		.preprocess((v) => {
			if (v == null || v === "") return undefined;
			if (v === "1" || v === 1 || v === true || v === "true") return true;
			if (v === "0" || v === 0 || v === false || v === "false") return false;
			return v;
		}, z.boolean().optional())
		.transform((v) => v ?? defaultValue);

const EnvSchema = z
	.object({
		// Booking system: course links are built below this root
		BOOKING_BASE_URL: z.string().url(),

		// Capacity thresholds (participants already booked)
		CAPACITY_LIMITED_AT: z.coerce.number().int().nonnegative().default(7),
		CAPACITY_FULL_AT: z.coerce.number().int().positive().default(10),

		// Prose service (chat-completions compatible)
		PROSE_ENABLED: envBool(false),
		PROSE_API_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
		PROSE_API_KEY: z.string().default(""),
		PROSE_MODEL: z.string().min(1).default("gpt-4o"),
		PROSE_MAX_TOKENS: z.coerce.number().int().positive().default(150),
		PROSE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
		PROSE_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

		// Output
		NEWSLETTER_OUTPUT_DIR: z.string().min(1).default("output"),

		// Rollbar
		ROLLBAR_SERVER_TOKEN: z.string().default(""),
		ROLLBAR_ENABLED: envBool(true),

		// Rollbar sampling rates (0.0–1.0)
		ROLLBAR_SAMPLE_RATE_ALL: z.coerce.number().min(0).max(1).default(1),
		ROLLBAR_SAMPLE_RATE_INFO: z.coerce.number().min(0).max(1).default(0.05),
		ROLLBAR_SAMPLE_RATE_WARN: z.coerce.number().min(0).max(1).default(0.05),
		ROLLBAR_SAMPLE_RATE_ERROR: z.coerce.number().min(0).max(1).default(1),
		ROLLBAR_SAMPLE_RATE_CRITICAL: z.coerce.number().min(0).max(1).default(1),

		// Privacy
		TELEMETRY_CONSENT: envBool(false),
		ROLLBAR_ALLOW_PII: envBool(false),
	})
	.refine((env) => env.CAPACITY_LIMITED_AT < env.CAPACITY_FULL_AT, {
		message: "CAPACITY_LIMITED_AT must be lower than CAPACITY_FULL_AT",
		path: ["CAPACITY_LIMITED_AT"],
	})
	.refine((env) => !env.PROSE_ENABLED || env.PROSE_API_KEY.length > 0, {
		message: "PROSE_API_KEY required when PROSE_ENABLED=true",
		path: ["PROSE_API_KEY"],
	})
	// Rollbar token validation: require token if enabled
	.refine((env) => !env.ROLLBAR_ENABLED || env.ROLLBAR_SERVER_TOKEN.length > 0, {
		message: "ROLLBAR_SERVER_TOKEN required when ROLLBAR_ENABLED=true",
		path: ["ROLLBAR_SERVER_TOKEN"],
	});

export type AppConfig = z.infer<typeof EnvSchema>;

let _config: AppConfig | null = null;

/**
 * Load and validate environment configuration.
 * Throws a ConfigurationError listing every invalid variable.
 * Loads from `process.env` are cached after the first success; an explicit
 * `env` object is validated on every call.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const fromProcess = env === process.env;
	if (fromProcess && _config) return _config;

	const result = EnvSchema.safeParse(env);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
		throw new ConfigurationError(`Environment configuration invalid:\n${issues}`);
	}

	if (fromProcess) _config = result.data;
	return result.data;
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
	_config = null;
}
