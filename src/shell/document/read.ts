// CHANGE: Load a document from disk in the shape the adapter consumes
// PURITY: SHELL
// EFFECT: Effect<LintDocument, FSError>

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";
import type { LintDocument } from "../../core/types/index.js";
import { fs } from "../utils/node-mods.js";

/**
 * Splits source text into lines without their terminators.
 *
 * @pure true
 * @invariant splitLines("") = []
 */
export function splitLines(text: string): ReadonlyArray<string> {
	return text.length === 0 ? [] : text.split(/\r\n|\r|\n/u);
}

export function readDocument(
	filePath: string,
): Effect.Effect<LintDocument, FSError> {
	return Effect.try({
		try: () => fs.readFileSync(filePath, "utf8"),
		catch: (error) =>
			new FSError({ path: filePath, detail: `Cannot read file: ${String(error)}` }),
	}).pipe(Effect.map((text) => ({ path: filePath, lines: splitLines(text) })));
}
