// CHANGE: Console logger with an env-gated debug channel
// WHY: stdout carries the JSON result, so every log line goes to stderr
// PURITY: SHELL
// INVARIANT: debug() writes only when debug is enabled

export interface Logger {
	readonly debug: (message: string) => void;
	readonly info: (message: string) => void;
	readonly error: (message: string) => void;
}

const PREFIX = "[pylint-diagnostics]";

/**
 * True when `PYLINT_DIAGNOSTICS_DEBUG=1` is set.
 *
 * @pure true
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv): boolean {
	return env["PYLINT_DIAGNOSTICS_DEBUG"] === "1";
}

export function createConsoleLogger(options: {
	readonly debug: boolean;
}): Logger {
	return {
		debug: (message) => {
			if (options.debug) {
				console.error(PREFIX, message);
			}
		},
		info: (message) => {
			console.error(message);
		},
		error: (message) => {
			console.error(`❌ ${message}`);
		},
	};
}

export const silentLogger: Logger = {
	debug: () => undefined,
	info: () => undefined,
	error: () => undefined,
};
