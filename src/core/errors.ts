// CHANGE: Typed domain error ADT for the diagnostics adapter using Effect.Data
// WHY: Analyzer and decoding failures travel in the Effect error channel, not as thrown exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * The external analyzer could not be launched or exited without producing a report.
 *
 * @pure true (Data class)
 * @invariant reason.length > 0
 */
export class ExternalToolError extends Data.TaggedError("ExternalToolError")<{
	readonly tool: "pylint";
	readonly reason: string;
}> {}

/**
 * The analyzer produced output that is not a valid report.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ParseError extends Data.TaggedError("ParseError")<{
	readonly entity: "pylint";
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Invalid configuration (config file or command line).
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly source: string;
	readonly detail: string;
}> {}

/**
 * Union of every failure `lint` and the CLI can surface.
 */
export type AppError = ExternalToolError | ParseError | FSError | ConfigError;

/**
 * Errors the adapter's `lint` operation can fail with.
 */
export type LintError = ExternalToolError | ParseError;

/**
 * Human-readable one-liner for an application error.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeError(error: AppError): string {
	switch (error._tag) {
		case "ExternalToolError":
			return `${error.tool}: ${error.reason}`;
		case "ParseError":
			return `failed to parse ${error.entity} output: ${error.detail}`;
		case "FS":
			return error.path === undefined
				? error.detail
				: `${error.path}: ${error.detail}`;
		case "ConfigError":
			return `invalid configuration (${error.source}): ${error.detail}`;
	}
}
