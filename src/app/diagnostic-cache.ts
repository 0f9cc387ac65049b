// CHANGE: Explicit, injectable store for last-known diagnostics
// WHY: Unsaved documents are answered from the previous lint pass; each adapter owns its store
// PURITY: SHELL (mutable state)
// INVARIANT: set(p, d) then get(p) = Some(d); entries are overwritten, never appended or evicted
// COMPLEXITY: O(1) per operation

import { Option } from "effect";

import type { DiagnosticList } from "../core/types/index.js";

export interface DiagnosticCache {
	readonly get: (path: string) => Option.Option<DiagnosticList>;
	readonly set: (path: string, diagnostics: DiagnosticList) => void;
	readonly size: () => number;
}

/**
 * Map-backed cache living as long as its owner.
 */
export class InMemoryDiagnosticCache implements DiagnosticCache {
	private readonly entries = new Map<string, DiagnosticList>();

	get(path: string): Option.Option<DiagnosticList> {
		return Option.fromNullable(this.entries.get(path));
	}

	set(path: string, diagnostics: DiagnosticList): void {
		this.entries.set(path, diagnostics);
	}

	size(): number {
		return this.entries.size;
	}
}
