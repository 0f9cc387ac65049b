// CHANGE: Pure mapping from pylint message category to LSP severity
// WHY: pylint's `type` is an open string; every value must land on a defined severity
// SOURCE: https://pylint.readthedocs.io/en/stable/user_guide/messages/messages_overview.html
// FORMAT THEOREM: ∀t ∈ String: toSeverity(t) ∈ {Error, Warning, Information, Hint}
// PURITY: CORE
// COMPLEXITY: O(1)

import { match } from "ts-pattern";
import { DiagnosticSeverity } from "vscode-languageserver-types";

/**
 * Severity assigned to categories pylint may add later.
 */
export const DEFAULT_SEVERITY: DiagnosticSeverity = DiagnosticSeverity.Warning;

/**
 * Maps a pylint message category to an LSP severity.
 *
 * convention → Information, error | fatal → Error, refactor → Hint,
 * warning → Warning, informational → Information; anything else falls
 * back to {@link DEFAULT_SEVERITY}.
 *
 * @pure true
 */
export function toSeverity(type: string): DiagnosticSeverity {
	return match(type)
		.returnType<DiagnosticSeverity>()
		.with("convention", "informational", () => DiagnosticSeverity.Information)
		.with("error", "fatal", () => DiagnosticSeverity.Error)
		.with("refactor", () => DiagnosticSeverity.Hint)
		.with("warning", () => DiagnosticSeverity.Warning)
		.otherwise(() => DEFAULT_SEVERITY);
}
