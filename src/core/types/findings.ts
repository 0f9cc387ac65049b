// CHANGE: Model pylint's JSON report items as an Effect Schema
// WHY: The report arrives as untyped JSON; decoding validates the five consumed fields in one place
// SOURCE: https://effect.website/docs/schema/introduction
// PURITY: CORE
// INVARIANT: ∀ f ∈ decode(report): f.line ∈ ℤ ∧ f.column ∈ ℤ ∧ typeof f.type = "string"

import { Schema } from "effect";

/**
 * Message categories pylint emits in the `type` field.
 *
 * `informational` covers `I`-class messages (e.g. `locally-disabled`).
 */
export const KNOWN_FINDING_TYPES = [
	"convention",
	"error",
	"fatal",
	"refactor",
	"warning",
	"informational",
] as const;

export type KnownFindingType = (typeof KNOWN_FINDING_TYPES)[number];

/**
 * A single pylint report entry.
 *
 * Only `line` (1-indexed), `column` (0-indexed), `type`, `symbol` and
 * `message` are consumed; the remaining keys (`obj`, `path`, `message-id`,
 * `module`, `endLine`, `endColumn`) pass through decoding untouched.
 */
export const RawFinding = Schema.Struct({
	line: Schema.Int,
	column: Schema.Int,
	type: Schema.String,
	symbol: Schema.String,
	message: Schema.String,
});

export type RawFinding = typeof RawFinding.Type;

/**
 * pylint `--output-format=json` report: a JSON array of findings.
 */
export const PylintReport = Schema.parseJson(Schema.Array(RawFinding));

export type PylintReport = typeof PylintReport.Type;
