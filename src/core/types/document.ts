// CHANGE: Host-facing document and diagnostic shapes
// WHY: The host hands over a path plus line texts and expects LSP diagnostics back
// PURITY: CORE

import type { Diagnostic } from "vscode-languageserver-types";

/**
 * Document as seen by the adapter.
 *
 * @property path Filesystem path of the document; also the cache key
 * @property lines Line texts without terminators, possibly empty
 */
export interface LintDocument {
	readonly path: string;
	readonly lines: ReadonlyArray<string>;
}

/**
 * Ordered diagnostics for one document, in analyzer emission order.
 */
export type DiagnosticList = ReadonlyArray<Diagnostic>;

export type { Diagnostic };
