// CHANGE: CLI argument parsing for pylint-diagnostics
// WHY: Handler lookup table keeps each flag's parsing isolated
// SOURCE: n/a

import type { CLIOptions } from "../../core/types/index.js";

interface ArgProcessResult {
	readonly state: CLIOptions;
	readonly skipNext: boolean;
}

type ValueFlagHandler = (state: CLIOptions, value: string) => CLIOptions;

const valueHandlers: Record<string, ValueFlagHandler> = {
	"--pylint": (state, value) => ({ ...state, pylintPath: value }),
	"--arg": (state, value) => ({
		...state,
		pylintArgs: [...state.pylintArgs, value],
	}),
};

// Splits `--flag=value` into its parts; other tokens come back unchanged
function splitInlineValue(arg: string): readonly [string, string | undefined] {
	const eq = arg.indexOf("=");
	if (!arg.startsWith("--") || eq === -1) {
		return [arg, undefined];
	}
	return [arg.slice(0, eq), arg.slice(eq + 1)];
}

function processArgument(
	arg: string,
	next: string | undefined,
	state: CLIOptions,
): ArgProcessResult {
	const [flag, inlineValue] = splitInlineValue(arg);
	const handler = valueHandlers[flag];
	if (handler !== undefined) {
		if (inlineValue !== undefined) {
			return { state: handler(state, inlineValue), skipNext: false };
		}
		if (next !== undefined) {
			return { state: handler(state, next), skipNext: true };
		}
		return { state, skipNext: false };
	}

	if (arg === "--debug") {
		return { state: { ...state, debug: true }, skipNext: false };
	}

	if (!arg.startsWith("--")) {
		return { state: { ...state, targetPath: arg }, skipNext: false };
	}

	return { state, skipNext: false };
}

/**
 * Parses command-line arguments.
 *
 * Unknown `--flags` are ignored; the last positional argument wins.
 *
 * @example
 * ```ts
 * // Command: pylint-diagnostics app/main.py --arg --disable=C0114 --debug
 * const options = parseCLIArgs();
 * // Returns: { targetPath: "app/main.py", pylintArgs: ["--disable=C0114"], debug: true }
 * ```
 */
export function parseCLIArgs(): CLIOptions {
	const args = process.argv.slice(2);
	let state: CLIOptions = {
		targetPath: "",
		pylintArgs: [],
		debug: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args.at(i + 1), state);
		state = result.state;
		if (result.skipNext) {
			i++;
		}
	}

	return state;
}
