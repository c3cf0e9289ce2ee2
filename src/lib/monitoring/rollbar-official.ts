// ---------------------------------------------------------------------------
// Rollbar Configuration
// Singleton instance with environment detection, test no-op and PII filtering
// ---------------------------------------------------------------------------

import Rollbar from "rollbar";
import { isTelemetryConsentGranted } from "./privacy";

/** The subset of the Rollbar API the newsletter pipeline logs through. */
export interface ServerLogger {
	critical(...args: Rollbar.LogArgument[]): unknown;
	error(...args: Rollbar.LogArgument[]): unknown;
	warning(...args: Rollbar.LogArgument[]): unknown;
	info(...args: Rollbar.LogArgument[]): unknown;
	debug(...args: Rollbar.LogArgument[]): unknown;
	wait(callback: () => void): void;
}

// ── Enablement rules ──────────────────────────────────────────────────────

const isTestMode =
	process.env.NODE_ENV === "test" ||
	// Vitest sets VITEST, VITEST_POOL_ID
	typeof process.env.VITEST !== "undefined";
const isDevelopment = process.env.NODE_ENV === "development";
const isExplicitlyDisabled = process.env.ROLLBAR_ENABLED === "0" || process.env.ROLLBAR_ENABLED === "false";

// ── Base configuration ────────────────────────────────────────────────────

const baseConfig = {
	// In development, disable automatic capture; errors are still reported
	// explicitly via reportError()
	captureUncaught: !isDevelopment,
	captureUnhandledRejections: !isDevelopment,
	environment: process.env.NODE_ENV || "development",
	enabled: !isExplicitlyDisabled,
};

const noopLogger: ServerLogger = {
	critical: () => undefined,
	error: () => undefined,
	warning: () => undefined,
	info: () => undefined,
	debug: () => undefined,
	wait: (cb) => cb(),
};

// Server-side singleton instance
// In test mode, export a no-op instance to avoid network calls.
export const serverInstance: ServerLogger = isTestMode
	? noopLogger
	: new Rollbar({
			accessToken: process.env.ROLLBAR_SERVER_TOKEN,
			...baseConfig,
			payload: {
				server: { root: process.cwd() },
			},
			// PII filtering: always scrub secrets; scrub participant-identifying fields when consent is not granted
			scrubFields: [
				"password",
				"apiKey",
				"api_key",
				"secret",
				"token",
				"authorization",
				...(isTelemetryConsentGranted()
					? []
					: ["email", "user_email", "userEmail", "user_ip", "ip_address", "person"]),
			],
		});
