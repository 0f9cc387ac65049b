// CHANGE: DiagnosticAdapter — stale-result cache policy plus analyzer invocation
// WHY: pylint can only analyze on-disk content; clearing diagnostics on every keystroke makes them flicker
// PURITY: APP (composes CORE remapping with an injected Analyzer and DiagnosticCache)
// EFFECT: Effect<DiagnosticList, ExternalToolError | ParseError>
// INVARIANT: ¬isSaved → lint(doc) = cache.get(doc.path) ?? [] ∧ analyzer not invoked
// INVARIANT: isSaved ∧ success → cache.get(doc.path) = result (overwritten, keyed by the original path)
// INVARIANT: failure → cache unchanged
// COMPLEXITY: O(n) where n = findings in the report

import { Effect, Option } from "effect";

import type { LintError } from "../core/errors.js";
import { normalizeArgumentPath, toDiagnostics } from "../core/remap.js";
import { decodeReport, isEmptyReport } from "../core/report.js";
import type { Analyzer } from "../core/types/analyzer.js";
import type { DiagnosticList, LintDocument } from "../core/types/index.js";
import { type Logger, silentLogger } from "../shell/utils/logger.js";
import {
	type DiagnosticCache,
	InMemoryDiagnosticCache,
} from "./diagnostic-cache.js";

export interface DiagnosticAdapterOptions {
	readonly analyzer: Analyzer;
	/** Defaults to a fresh in-memory cache. */
	readonly cache?: DiagnosticCache;
	/** Platform whose path rules apply to analyzer arguments. */
	readonly platform?: NodeJS.Platform;
	readonly logger?: Logger;
}

export class DiagnosticAdapter {
	readonly cache: DiagnosticCache;

	private readonly analyzer: Analyzer;
	private readonly platform: NodeJS.Platform;
	private readonly logger: Logger;

	constructor(options: DiagnosticAdapterOptions) {
		this.analyzer = options.analyzer;
		this.cache = options.cache ?? new InMemoryDiagnosticCache();
		this.platform = options.platform ?? process.platform;
		this.logger = options.logger ?? silentLogger;
	}

	/**
	 * Diagnostics for `document`.
	 *
	 * Unsaved documents get the last result computed for their path (empty
	 * if there is none). Saved documents are analyzed afresh and the result
	 * replaces the cached one.
	 */
	lint(
		document: LintDocument,
		isSaved: boolean,
	): Effect.Effect<DiagnosticList, LintError> {
		if (!isSaved) {
			return Effect.sync(() => this.cached(document.path));
		}
		return this.analyzeSaved(document);
	}

	private cached(path: string): DiagnosticList {
		this.logger.debug(
			`${path} has not been saved to disk, returning last known diagnostics`,
		);
		return Option.getOrElse(this.cache.get(path), () => []);
	}

	private analyzeSaved(
		document: LintDocument,
	): Effect.Effect<DiagnosticList, LintError> {
		const { analyzer, cache, logger } = this;
		const argumentPath = normalizeArgumentPath(document.path, this.platform);
		return Effect.gen(function* () {
			logger.debug(`Running ${analyzer.name} on ${document.path}`);
			if (analyzer.resetCache !== undefined) {
				yield* analyzer.resetCache();
			}
			const buffer = yield* analyzer.analyze(argumentPath);

			if (isEmptyReport(buffer)) {
				logger.debug(`${analyzer.name} reported nothing for ${document.path}`);
				cache.set(document.path, []);
				return [];
			}

			const findings = yield* decodeReport(buffer);
			const diagnostics = toDiagnostics(findings, document.lines);
			logger.debug(
				`${analyzer.name} reported ${diagnostics.length} finding(s) for ${document.path}`,
			);
			cache.set(document.path, diagnostics);
			return diagnostics;
		});
	}
}
