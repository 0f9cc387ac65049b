// CHANGE: execFile + Effect pattern with stdout recovery
// WHY: Linters report findings through a non-zero exit code while still printing their report
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<string, ExecError, never>
// INVARIANT: ∀ file, args: the child receives args verbatim (no shell parses them)
// COMPLEXITY: O(1) time, O(n) space where n = stdout length

import { Effect } from "effect";

import type { ExecError } from "../../core/types/index.js";
import { extractStdoutFromError } from "../../core/types/index.js";
import { execFile, promisify } from "./node-mods.js";

const execFileAsync = promisify(execFile);

/** 10 MiB; large projects produce long pylint reports. */
export const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024;

/**
 * Signature shared by {@link execCommand} and its in-process stand-ins.
 */
export type CommandRunner = (
	file: string,
	args: ReadonlyArray<string>,
) => Effect.Effect<string, ExecError>;

function toExecError(error: unknown): ExecError {
	return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run an executable with an argument vector and capture its stdout.
 *
 * A non-zero exit that still printed something on stdout counts as success.
 *
 * @pure false (executes external command)
 * @effect Effect<string, ExecError, never>
 */
export const execCommand: CommandRunner = (file, args) =>
	Effect.tryPromise({
		try: () =>
			execFileAsync(file, [...args], { maxBuffer: DEFAULT_MAX_BUFFER }),
		catch: toExecError,
	}).pipe(
		Effect.map(({ stdout }) => String(stdout)),
		Effect.catchAll((error) => {
			const out = extractStdoutFromError(error);
			if (out !== null) {
				return Effect.succeed(out);
			}
			return Effect.fail(error);
		}),
	);

/**
 * Quotes one argument for display when it is not a plain token.
 *
 * Only used to log a readable command; nothing executes this string.
 *
 * @pure true
 */
export function quoteArgument(argument: string): string {
	if (argument.length > 0 && /^[\w@%+=:,./-]+$/u.test(argument)) {
		return argument;
	}
	return `'${argument.replaceAll("'", "'\\''")}'`;
}

/**
 * Display form of `file args...` for logs.
 *
 * @pure true
 */
export function formatCommandLine(
	file: string,
	args: ReadonlyArray<string>,
): string {
	return [file, ...args].map(quoteArgument).join(" ");
}
