// ---------------------------------------------------------------------------
// Course Catalog — Record Parser & Validator
// Every row is validated independently; failures are collected, not thrown.
// ---------------------------------------------------------------------------

import { ValidationError } from "./errors";
import { SessionRowSchema } from "./schemas";
import type { ParseResult, SessionRecord, ValidationReport } from "./types";

/** One export row: column name → raw cell value. */
export type RawRow = Readonly<Record<string, unknown>>;

export type RowOutcome =
	| { ok: true; record: SessionRecord }
	| { ok: false; error: ValidationError };

export interface ParseOptions {
	/** Reject the whole input when any row is invalid (default: false) */
	strict?: boolean;
}

/**
 * Validate a single row. Never throws; all issues of the row are joined
 * into one reason.
 */
export function validateRow(row: RawRow, rowIndex: number): RowOutcome {
	const result = SessionRowSchema.safeParse(row);
	if (!result.success) {
		const reason = result.error.issues.map((issue) => issue.message).join("; ");
		return { ok: false, error: new ValidationError(reason, { rowIndex }) };
	}
	return { ok: true, record: { ...result.data, rowIndex } };
}

/**
 * Parse export rows into session records.
 *
 * Non-strict: returns the valid records plus a report of rejected rows.
 * Strict: any rejected row rejects the input.
 *
 * @throws {ValidationError} carrying the full report when the input is rejected
 *         (strict mode with failures, or no valid rows at all)
 */
export function parseRows(rows: readonly RawRow[], options: ParseOptions = {}): ParseResult {
	const records: SessionRecord[] = [];
	const report = new Map<number, string>();

	rows.forEach((row, index) => {
		const outcome = validateRow(row, index);
		if (outcome.ok) {
			records.push(outcome.record);
		} else {
			report.set(index, outcome.error.message);
		}
	});

	if (options.strict && report.size > 0) {
		throw new ValidationError(
			`Input rejected (strict mode): ${report.size} of ${rows.length} rows are invalid`,
			{ report },
		);
	}

	if (records.length === 0) {
		throw new ValidationError(
			rows.length === 0 ? "Input contains no rows" : `Input rejected: none of the ${rows.length} rows are valid`,
			{ report },
		);
	}

	return { records, report };
}

/** Itemized, human-readable list of skipped rows (row numbers are 1-based). */
export function describeReport(report: ValidationReport): string[] {
	return [...report.entries()]
		.sort(([a], [b]) => a - b)
		.map(([rowIndex, reason]) => `Row ${rowIndex + 1}: ${reason}`);
}
