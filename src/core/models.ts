// CHANGE: Functional Core domain models for the CLI outcome
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable

/**
 * Exit code for the CLI process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Decision state for producing an exit code from one lint pass.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly hasErrorDiagnostics: boolean;
}
