// CHANGE: Coordinate remapping from pylint findings to LSP diagnostics
// WHY: pylint lines are 1-indexed, LSP lines 0-indexed; both index columns from 0
// FORMAT THEOREM: ∀f, d = toDiagnostic(f, lines):
//   d.range.start = (f.line - 1, f.column) ∧ d.range.end.line = d.range.start.line
//   ∧ d.range.end.character = |lines[f.line - 1]| (0 when that line does not exist)
// PURITY: CORE
// COMPLEXITY: O(1) per finding, O(n) per report

import type { Diagnostic, Range } from "vscode-languageserver-types";

import type { RawFinding } from "./types/findings.js";
import { toSeverity } from "./severity.js";

/**
 * Value of `Diagnostic.source` for everything this adapter emits.
 */
export const DIAGNOSTIC_SOURCE = "pylint";

/**
 * Length of the given 0-indexed line, or 0 when the document has no such line.
 *
 * An empty document can still fail linting (e.g. an invalid module name),
 * in which case pylint reports line 1 of nothing.
 *
 * @pure true
 */
export function lineEndCharacter(
	lines: ReadonlyArray<string>,
	line: number,
): number {
	if (line < 0) return 0;
	return lines[line]?.length ?? 0;
}

/**
 * Range spanning from the finding's column to the end of its line.
 *
 * @pure true
 */
export function findingRange(
	finding: Pick<RawFinding, "line" | "column">,
	lines: ReadonlyArray<string>,
): Range {
	const line = finding.line - 1;
	return {
		start: { line, character: finding.column },
		end: { line, character: lineEndCharacter(lines, line) },
	};
}

/**
 * `[<symbol>] <message>`
 *
 * @pure true
 */
export function formatMessage(
	finding: Pick<RawFinding, "symbol" | "message">,
): string {
	return `[${finding.symbol}] ${finding.message}`;
}

/**
 * Translates one pylint finding into an LSP diagnostic.
 *
 * @pure true
 */
export function toDiagnostic(
	finding: RawFinding,
	lines: ReadonlyArray<string>,
): Diagnostic {
	return {
		source: DIAGNOSTIC_SOURCE,
		range: findingRange(finding, lines),
		message: formatMessage(finding),
		severity: toSeverity(finding.type),
	};
}

/**
 * Translates a whole report, preserving emission order.
 *
 * @pure true
 * @invariant result.length === findings.length
 */
export function toDiagnostics(
	findings: ReadonlyArray<RawFinding>,
	lines: ReadonlyArray<string>,
): ReadonlyArray<Diagnostic> {
	return findings.map((finding) => toDiagnostic(finding, lines));
}

/**
 * Prepares a path for pylint's command-line argument splitter.
 *
 * The splitter treats backslashes as escapes, so on Windows every `\`
 * becomes `/`. Paths on other platforms pass through untouched.
 *
 * @pure true
 */
export function normalizeArgumentPath(
	path: string,
	platform: NodeJS.Platform,
): string {
	return platform === "win32" ? path.replaceAll("\\", "/") : path;
}
