// ---------------------------------------------------------------------------
// Privacy & Consent helpers for telemetry/monitoring.
// Default: No PII attached unless explicit consent.
// ---------------------------------------------------------------------------

/**
 * Returns whether telemetry consent is granted.
 * Environment-driven: TELEMETRY_CONSENT or ROLLBAR_ALLOW_PII set to "1".
 */
export function isTelemetryConsentGranted(): boolean {
	return process.env.TELEMETRY_CONSENT === "1" || process.env.ROLLBAR_ALLOW_PII === "1";
}

/** Quoted cell values in a row-failure reason, redacted unless consent is granted. */
export function redactRowReason(reason: string): string {
	return isTelemetryConsentGranted() ? reason : reason.replace(/"[^"]*"/g, '"[redacted]"');
}
