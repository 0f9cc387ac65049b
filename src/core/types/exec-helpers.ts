// CHANGE: Common exec error handling helper
// WHY: pylint exits non-zero whenever it reports messages, and its report is still on stdout
// SOURCE: https://pylint.readthedocs.io/en/stable/user_guide/usage/run.html#exit-codes

/**
 * Returns the stdout captured on an exec error, or null when there is none.
 *
 * @pure true
 * @invariant result === null ∨ result.trim().length > 0
 */
export function extractStdoutFromError(
	error: Error | { stdout?: string },
): string | null {
	if (!("stdout" in error)) {
		return null;
	}
	const stdout = error.stdout;
	if (typeof stdout !== "string" || stdout.trim().length === 0) {
		return null;
	}
	return stdout;
}

/**
 * Returns the stderr captured on an exec error, trimmed, or null.
 *
 * @pure true
 */
export function extractStderrFromError(
	error: Error | { stderr?: string },
): string | null {
	if (!("stderr" in error) || typeof error.stderr !== "string") {
		return null;
	}
	const stderr = error.stderr.trim();
	return stderr.length === 0 ? null : stderr;
}
