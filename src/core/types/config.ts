// CHANGE: Configuration and CLI option types for the pylint adapter
// WHY: Defaults, config file, environment and flags all resolve into these shapes
// SOURCE: n/a

/**
 * Resolved analyzer configuration.
 *
 * @property pylintPath Executable used to run pylint
 * @property pylintArgs Extra flags placed before the file path
 */
export interface AnalyzerConfig {
	readonly pylintPath: string;
	readonly pylintArgs: ReadonlyArray<string>;
}

/**
 * Command-line options for `pylint-diagnostics`.
 *
 * @property targetPath File to lint
 * @property pylintPath Overrides the configured executable when set
 * @property pylintArgs Extra flags appended after configured ones
 * @property debug Enables debug logging
 */
export interface CLIOptions {
	readonly targetPath: string;
	readonly pylintPath?: string;
	readonly pylintArgs: ReadonlyArray<string>;
	readonly debug: boolean;
}

/**
 * Error raised by `child_process.exec`, carrying the captured streams.
 */
export interface ExecError extends Error {
	readonly code?: number | string;
	readonly stdout?: string;
	readonly stderr?: string;
}
