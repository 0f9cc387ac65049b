// CHANGE: Decode pylint's captured JSON report into findings
// WHY: pylint prints nothing (not even `[]`) when there are no findings, and JSON.parse rejects ""
// PURITY: CORE
// EFFECT: Effect<ReadonlyArray<RawFinding>, ParseError>
// INVARIANT: isEmptyReport(buffer) → decodeReport(buffer) = []
// COMPLEXITY: O(n) where n = |buffer|

import { Effect, Schema } from "effect";

import { ParseError } from "./errors.js";
import { PylintReport, type RawFinding } from "./types/findings.js";

const decodePylintReport = Schema.decodeUnknown(PylintReport);

/**
 * True when the analyzer wrote nothing but whitespace.
 *
 * @pure true
 */
export function isEmptyReport(buffer: string): boolean {
	return buffer.trim().length === 0;
}

/**
 * Parses a report buffer into findings in emission order.
 *
 * @pure true (no side effects; failure is a value)
 * @effect Effect<ReadonlyArray<RawFinding>, ParseError>
 */
export function decodeReport(
	buffer: string,
): Effect.Effect<ReadonlyArray<RawFinding>, ParseError> {
	if (isEmptyReport(buffer)) {
		return Effect.succeed([]);
	}
	return decodePylintReport(buffer).pipe(
		Effect.mapError(
			(error) =>
				new ParseError({
					entity: "pylint",
					detail: error.message,
				}),
		),
	);
}
