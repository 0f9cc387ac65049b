// CHANGE: Pure decision function computing the CLI exit code from diagnostics
// WHY: Termination logic belongs in the Functional Core; the bin layer only calls process.exit
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀d ∈ Diagnostics: (∃x ∈ d: x.severity = Error) ↔ exitCodeFor(d) = 1
// PURITY: CORE
// COMPLEXITY: O(n) where n = |diagnostics|

import { pipe } from "effect";
import { DiagnosticSeverity } from "vscode-languageserver-types";

import type { DecisionState, ExitCode } from "./models.js";
import type { DiagnosticList } from "./types/index.js";

/**
 * Computes process exit code from decision state.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	state.hasErrorDiagnostics ? 1 : 0;

/**
 * Derives the decision state from a lint result.
 *
 * @pure true
 */
export const decisionStateFor = (
	diagnostics: DiagnosticList,
): DecisionState => ({
	hasErrorDiagnostics: diagnostics.some(
		(diagnostic) => diagnostic.severity === DiagnosticSeverity.Error,
	),
});

/**
 * @example
 * ```ts
 * exitCodeFor([{ severity: DiagnosticSeverity.Hint, ... }]); // 0
 * ```
 */
export const exitCodeFor = (diagnostics: DiagnosticList): ExitCode =>
	pipe(diagnostics, decisionStateFor, computeExitCode);
