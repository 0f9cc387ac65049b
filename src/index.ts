// CHANGE: Public API entry point for language-server hosts
// WHY: Hosts construct a DiagnosticAdapter and call lint() on open/change/save
// PURITY: Re-exports only (meta-module)

/**
 * Adapter translating pylint reports into LSP diagnostics.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { DiagnosticAdapter, createPylintAnalyzer } from "pylint-diagnostics";
 *
 * const adapter = new DiagnosticAdapter({ analyzer: createPylintAnalyzer() });
 * const diagnostics = await Effect.runPromise(
 *   adapter.lint({ path: "/work/app.py", lines }, true),
 * );
 * ```
 */
export {
	DiagnosticAdapter,
	type DiagnosticAdapterOptions,
} from "./app/diagnostic-adapter.js";
export {
	type DiagnosticCache,
	InMemoryDiagnosticCache,
} from "./app/diagnostic-cache.js";
export { runLint } from "./app/runLint.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (pure remapping)
// ═══════════════════════════════════════════════════════════════════════════════

export { exitCodeFor } from "./core/decision.js";
export {
	type AppError,
	ConfigError,
	describeError,
	ExternalToolError,
	FSError,
	type LintError,
	ParseError,
} from "./core/errors.js";
export type { ExitCode } from "./core/models.js";
export {
	DIAGNOSTIC_SOURCE,
	normalizeArgumentPath,
	toDiagnostic,
	toDiagnostics,
} from "./core/remap.js";
export { decodeReport } from "./core/report.js";
export { DEFAULT_SEVERITY, toSeverity } from "./core/severity.js";
export type { Analyzer } from "./core/types/analyzer.js";
export type {
	AnalyzerConfig,
	CLIOptions,
	Diagnostic,
	DiagnosticList,
	LintDocument,
} from "./core/types/index.js";
export { RawFinding } from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (pylint subprocess)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	buildPylintArgs,
	createPylintAnalyzer,
	DEFAULT_ANALYZER_CONFIG,
} from "./shell/analyzer/pylint.js";
