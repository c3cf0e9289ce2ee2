// ---------------------------------------------------------------------------
// Prose Provider Factory
// Creates a configured ChatProseClient, or null for no-external-call mode
// ---------------------------------------------------------------------------

import { type AppConfig, loadConfig } from "../config";
import { ChatProseClient } from "./client";
import type { ProseProvider } from "./types";

/**
 * Create the prose provider described by the environment.
 *
 * @returns null when `PROSE_ENABLED` is off; every text then comes from the
 *          fallback table
 */
export function createProseProvider(config: AppConfig = loadConfig()): ProseProvider | null {
	if (!config.PROSE_ENABLED) return null;

	return new ChatProseClient({
		baseUrl: config.PROSE_API_BASE_URL,
		apiKey: config.PROSE_API_KEY,
		model: config.PROSE_MODEL,
		maxTokens: config.PROSE_MAX_TOKENS,
		temperature: config.PROSE_TEMPERATURE,
		rateLimit: 2, // 2 requests per second
		maxRetries: 3,
	});
}
