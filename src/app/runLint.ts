// CHANGE: Application layer for the one-shot CLI
// WHY: APP composes config loading, the pylint analyzer and the adapter; BIN owns process.exit
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; failures are logged and become 1
// COMPLEXITY: O(n) where n = findings reported

import { Effect } from "effect";

import { exitCodeFor } from "../core/decision.js";
import { type AppError, ConfigError, describeError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import type { CLIOptions, DiagnosticList } from "../core/types/index.js";
import { createPylintAnalyzer } from "../shell/analyzer/pylint.js";
import { loadAnalyzerConfig } from "../shell/config/index.js";
import { readDocument } from "../shell/document/read.js";
import type { CommandRunner } from "../shell/utils/exec.js";
import {
	createConsoleLogger,
	isDebugEnabled,
	type Logger,
} from "../shell/utils/logger.js";
import { DiagnosticAdapter } from "./diagnostic-adapter.js";

export interface RunLintEnvironment {
	readonly cwd: string;
	readonly env: NodeJS.ProcessEnv;
	readonly platform: NodeJS.Platform;
	readonly logger?: Logger;
	/** Replaces the subprocess runner used to start pylint. */
	readonly run?: CommandRunner;
	/** Receives the serialized result; defaults to stdout. */
	readonly write?: (output: string) => void;
}

/**
 * Lints `cliOptions.targetPath` once and returns its diagnostics.
 *
 * @effect Effect<DiagnosticList, AppError>
 */
export function lintFile(
	cliOptions: CLIOptions,
	environment: RunLintEnvironment,
	logger: Logger,
): Effect.Effect<DiagnosticList, AppError> {
	return Effect.gen(function* () {
		if (cliOptions.targetPath.length === 0) {
			return yield* Effect.fail(
				new ConfigError({
					source: "command line",
					detail: "missing file to lint",
				}),
			);
		}

		const config = yield* loadAnalyzerConfig({
			cwd: environment.cwd,
			env: environment.env,
			cli: cliOptions,
		});
		const document = yield* readDocument(cliOptions.targetPath);

		const adapter = new DiagnosticAdapter({
			analyzer: createPylintAnalyzer({ config, run: environment.run, logger }),
			platform: environment.platform,
			logger,
		});
		logger.info(`🔍 Running pylint on: ${document.path}`);
		return yield* adapter.lint(document, true);
	});
}

/**
 * Orchestrates one CLI run and returns ExitCode as value (no process.exit).
 *
 * @postcondition ∃ Error-severity diagnostic ∨ failure → 1 else 0
 */
export function runLint(
	cliOptions: CLIOptions,
	environment: RunLintEnvironment,
): Effect.Effect<ExitCode> {
	const logger =
		environment.logger ??
		createConsoleLogger({
			debug: cliOptions.debug || isDebugEnabled(environment.env),
		});
	const write =
		environment.write ??
		((output: string): void => {
			console.log(output);
		});

	return lintFile(cliOptions, environment, logger).pipe(
		Effect.map((diagnostics): ExitCode => {
			write(JSON.stringify(diagnostics, null, 2));
			logger.info(`✅ ${diagnostics.length} diagnostic(s)`);
			return exitCodeFor(diagnostics);
		}),
		Effect.catchAll((error) =>
			Effect.sync((): ExitCode => {
				logger.error(describeError(error));
				return 1;
			}),
		),
	);
}
