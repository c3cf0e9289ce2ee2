// ---------------------------------------------------------------------------
// Structured Error Reporting
// Severity levels, per-level sampling and flushing on top of serverInstance
// ---------------------------------------------------------------------------

import { serverInstance } from "./rollbar-official";

export const ErrorSeverity = {
	CRITICAL: "critical",
	ERROR: "error",
	WARNING: "warning",
	INFO: "info",
	DEBUG: "debug",
} as const;

export type ErrorSeverityType = (typeof ErrorSeverity)[keyof typeof ErrorSeverity];

export interface ErrorContext {
	runId?: string;
	stage?: string;
	timestamp?: Date;
	additionalData?: Record<string, unknown>;
}

function isReportingDisabled(): boolean {
	return process.env.ROLLBAR_ENABLED === "0" || process.env.ROLLBAR_ENABLED === "false";
}

function readNumberEnv(name: string, fallback: number): number {
	const v = process.env[name];
	if (!v) return fallback;
	const n = Number(v);
	return Number.isFinite(n) ? n : fallback;
}

function sampleRate(severity: ErrorSeverityType): number {
	const rates: Record<ErrorSeverityType, number> = {
		critical: readNumberEnv("ROLLBAR_SAMPLE_RATE_CRITICAL", 1),
		error: readNumberEnv("ROLLBAR_SAMPLE_RATE_ERROR", 1),
		warning: readNumberEnv("ROLLBAR_SAMPLE_RATE_WARN", 0.05),
		info: readNumberEnv("ROLLBAR_SAMPLE_RATE_INFO", 0.05),
		debug: readNumberEnv("ROLLBAR_SAMPLE_RATE_INFO", 0.05),
	};
	return Math.max(0, Math.min(1, rates[severity]));
}

/**
 * Report to Rollbar at `severity`, subject to ROLLBAR_SAMPLE_RATE_ALL and the
 * per-level rate. Context lands under `custom`.
 */
export function reportError(
	error: Error | string,
	context?: ErrorContext,
	severity: ErrorSeverityType = ErrorSeverity.ERROR,
): void {
	if (isReportingDisabled()) return;

	const rateAll = readNumberEnv("ROLLBAR_SAMPLE_RATE_ALL", 1);
	if (!(Math.random() < sampleRate(severity) && Math.random() < rateAll)) return;

	const rollbarContext = {
		custom: {
			runId: context?.runId,
			stage: context?.stage,
			timestamp: (context?.timestamp ?? new Date()).toISOString(),
			...context?.additionalData,
		},
	};

	try {
		serverInstance[severity](error, rollbarContext);
	} catch (reportingError) {
		console.error("Rollbar reporting failed:", reportingError);
	}
}

/** Resolves once queued Rollbar items have been sent. Call before the process exits. */
export function flushRollbar(): Promise<void> {
	return new Promise((resolve) => {
		if (isReportingDisabled()) return resolve();
		serverInstance.wait(() => resolve());
	});
}
