// CHANGE: Analyzer implementation that runs pylint as a subprocess
// WHY: pylint is a Python program; the adapter reaches it through a subprocess and its JSON reporter
// SOURCE: https://pylint.readthedocs.io/en/stable/user_guide/configuration/all-options.html#output-format
// PURITY: SHELL
// EFFECT: Effect<string, ExternalToolError>
// INVARIANT: One subprocess per analyze(); the file path is the last positional argument

import { Effect } from "effect";

import { ExternalToolError } from "../../core/errors.js";
import type { Analyzer } from "../../core/types/analyzer.js";
import type { AnalyzerConfig } from "../../core/types/index.js";
import { extractStderrFromError } from "../../core/types/index.js";
import {
	type CommandRunner,
	execCommand,
	formatCommandLine,
} from "../utils/exec.js";
import { type Logger, silentLogger } from "../utils/logger.js";

export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
	pylintPath: "pylint",
	pylintArgs: [],
};

/**
 * Argument vector passed to pylint for `path`; the path is the last entry, unaltered.
 *
 * @pure true
 */
export function buildPylintArgs(
	config: AnalyzerConfig,
	path: string,
): ReadonlyArray<string> {
	return ["--output-format=json", ...config.pylintArgs, path];
}

export interface PylintAnalyzerOptions {
	readonly config?: AnalyzerConfig;
	readonly run?: CommandRunner;
	readonly logger?: Logger;
}

/**
 * Creates an {@link Analyzer} that runs pylint once per call.
 *
 * Each run is a fresh interpreter, so there is no astroid cache to reset
 * between runs and `resetCache` is left out.
 */
export function createPylintAnalyzer(
	options: PylintAnalyzerOptions = {},
): Analyzer {
	const config = options.config ?? DEFAULT_ANALYZER_CONFIG;
	const run = options.run ?? execCommand;
	const logger = options.logger ?? silentLogger;

	return {
		name: "pylint",
		analyze: (path) => {
			const args = buildPylintArgs(config, path);
			logger.debug(`Command: ${formatCommandLine(config.pylintPath, args)}`);
			return run(config.pylintPath, args).pipe(
				Effect.mapError((error) => {
					const stderr = extractStderrFromError(error);
					return new ExternalToolError({
						tool: "pylint",
						reason:
							stderr === null
								? `Failed to run pylint: ${error.message}`
								: `Failed to run pylint: ${stderr}`,
					});
				}),
			);
		},
	};
}
