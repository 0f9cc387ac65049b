// CHANGE: Analyzer capability port
// WHY: The adapter must run against an in-process fake in tests and a pylint subprocess in production
// PURITY: CORE (interface only; implementations live in SHELL)
// INVARIANT: analyze(path) yields the raw report text, "" when the analyzer printed nothing

import type { Effect } from "effect";

import type { ExternalToolError } from "../errors.js";

export interface Analyzer {
	/** Tool name, used in logs. */
	readonly name: string;

	/**
	 * Runs the analyzer on a single file and returns its captured report.
	 */
	readonly analyze: (path: string) => Effect.Effect<string, ExternalToolError>;

	/**
	 * Drops state the analyzer keeps between runs. Called immediately
	 * before every `analyze`.
	 */
	readonly resetCache?: () => Effect.Effect<void>;
}
