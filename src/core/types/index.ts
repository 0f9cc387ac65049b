// CHANGE: Central export file for all type definitions
// WHY: Single import point for types used across CORE, SHELL and APP
// SOURCE: n/a

export type { AnalyzerConfig, CLIOptions, ExecError } from "./config.js";
export type { Diagnostic, DiagnosticList, LintDocument } from "./document.js";
export {
	extractStderrFromError,
	extractStdoutFromError,
} from "./exec-helpers.js";
export type { KnownFindingType } from "./findings.js";
export { KNOWN_FINDING_TYPES, PylintReport, RawFinding } from "./findings.js";
