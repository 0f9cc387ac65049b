// CHANGE: main.ts is a thin APP delegator
// WHY: parses CLI options and delegates orchestration to app/runLint
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value

import { Effect } from "effect";

import { runLint } from "./app/runLint.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 */
export async function main(): Promise<ExitCode> {
	const cliOptions = parseCLIArgs();
	return Effect.runPromise(
		runLint(cliOptions, {
			cwd: process.cwd(),
			env: process.env,
			platform: process.platform,
		}),
	);
}
