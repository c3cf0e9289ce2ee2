// ---------------------------------------------------------------------------
// Course Catalog — Error Taxonomy
// ---------------------------------------------------------------------------

import type { ValidationReport } from "./types";

export interface ValidationErrorDetails {
	/** Set for a single rejected row */
	rowIndex?: number;
	/** Set when the whole input is rejected */
	report?: ValidationReport;
}

/**
 * Malformed or unrecognized input.
 *
 * Row-level instances carry `rowIndex` and are collected into a report rather
 * than thrown. The parser only throws when the whole input is rejected (strict
 * mode, or no valid rows), and then `report` holds every row failure.
 */
export class ValidationError extends Error {
	public readonly rowIndex: number | null;
	public readonly report: ValidationReport;

	constructor(message: string, details: ValidationErrorDetails = {}) {
		super(message);
		this.name = "ValidationError";
		this.rowIndex = details.rowIndex ?? null;
		this.report = details.report ?? new Map();
	}
}

/** A null value reached the formatter. Indicates an upstream invariant violation. */
export class FormatError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "FormatError";
	}
}

/** Static configuration does not match what was requested (unknown tier, bad env). */
export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigurationError";
	}
}
