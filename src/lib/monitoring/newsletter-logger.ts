// ---------------------------------------------------------------------------
// Newsletter Run Logging — Rollbar Integration
// Structured entries for skipped rows, prose fallbacks and run outcomes
// ---------------------------------------------------------------------------

import type { NewsletterGenerationEvent } from "@/lib/newsletter/types";
import { redactRowReason } from "./privacy";
import { ErrorSeverity, reportError } from "./reporting";
import { serverInstance } from "./rollbar-official";

function runContext(runId: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		runId,
		...extra,
		timestamp: new Date().toISOString(),
	};
}

/** One warning per rejected row. `rowIndex` is 0-based. */
export function logSkippedRow(runId: string, rowIndex: number, reason: string): void {
	serverInstance.warning(
		`Newsletter row skipped: ${redactRowReason(reason)}`,
		runContext(runId, { rowIndex }),
	);
}

export function logProseFallback(runId: string, label: string, reason: string): void {
	serverInstance.warning(`Prose fallback used for "${label}": ${reason}`, runContext(runId, { label }));
}

export function logRunComplete(event: NewsletterGenerationEvent): void {
	serverInstance.info("Newsletter generation complete", { ...event });
}

/** Aborted runs go through {@link reportError}, sampled by ROLLBAR_SAMPLE_RATE_ERROR. */
export function logRunFailure(runId: string, error: unknown, stage = "generate"): void {
	const message = error instanceof Error ? error.message : String(error);
	reportError(
		`Newsletter generation failed: ${message}`,
		{
			runId,
			stage,
			additionalData: { error: message, errorName: error instanceof Error ? error.name : undefined },
		},
		ErrorSeverity.ERROR,
	);
}

export function logUnknownOrderKeys(runId: string, keys: readonly string[]): void {
	serverInstance.warning(`Unknown block keys in requested order: ${keys.join(", ")}`, runContext(runId, { keys }));
}
