// CHANGE: Deterministic and property-based specs for coordinate remapping
// FORMAT THEOREM: ∀f: toDiagnostic(f).range.start = (f.line - 1, f.column) ∧ end.line = start.line
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { DiagnosticSeverity } from "vscode-languageserver-types";

import {
	DIAGNOSTIC_SOURCE,
	findingRange,
	formatMessage,
	lineEndCharacter,
	normalizeArgumentPath,
	toDiagnostic,
	toDiagnostics,
} from "../../src/core/remap.js";
import { KNOWN_FINDING_TYPES } from "../../src/core/types/index.js";
import { finding } from "../utils/builders.js";

describe("lineEndCharacter", () => {
	it("returns the length of an existing line", () => {
		expect(lineEndCharacter(["ab", "abcd"], 1)).toBe(4);
	});

	it("returns 0 for a document without lines", () => {
		expect(lineEndCharacter([], 0)).toBe(0);
	});

	it("returns 0 past the last line", () => {
		expect(lineEndCharacter(["ab"], 3)).toBe(0);
	});

	it("returns 0 for a negative line instead of wrapping around", () => {
		expect(lineEndCharacter(["ab", "abcd"], -1)).toBe(0);
	});
});

describe("findingRange", () => {
	it("shifts the line to 0-indexed and keeps the column", () => {
		expect(findingRange({ line: 2, column: 4 }, ["x", "def f(): pass"])).toEqual(
			{
				start: { line: 1, character: 4 },
				end: { line: 1, character: 13 },
			},
		);
	});

	const lineArb = fc.array(fc.string({ maxLength: 40 }), { maxLength: 30 });

	it("satisfies the remapping invariant for arbitrary findings", () => {
		fc.assert(
			fc.property(
				lineArb,
				fc.integer({ min: 1, max: 40 }),
				fc.nat(120),
				(lines, line, column) => {
					const range = findingRange({ line, column }, lines);
					expect(range.start).toEqual({ line: line - 1, character: column });
					expect(range.end.line).toBe(range.start.line);
					expect(range.end.character).toBe(
						line - 1 < lines.length ? (lines[line - 1]?.length ?? 0) : 0,
					);
				},
			),
		);
	});
});

describe("formatMessage", () => {
	it("prefixes the message with the bracketed symbol", () => {
		expect(
			formatMessage({ symbol: "unused-import", message: "Unused import os" }),
		).toBe("[unused-import] Unused import os");
	});
});

describe("toDiagnostic / toDiagnostics", () => {
	it("builds a complete LSP diagnostic", () => {
		expect(
			toDiagnostic(
				finding({
					line: 1,
					column: 0,
					type: "warning",
					symbol: "unused-import",
					message: "Unused import os",
				}),
				["import os"],
			),
		).toEqual({
			source: "pylint",
			range: {
				start: { line: 0, character: 0 },
				end: { line: 0, character: 9 },
			},
			message: "[unused-import] Unused import os",
			severity: DiagnosticSeverity.Warning,
		});
	});

	it("maps every finding in order and always stamps the source", () => {
		const findingArb = fc.record({
			line: fc.integer({ min: 1, max: 20 }),
			column: fc.nat(80),
			type: fc.constantFrom(...KNOWN_FINDING_TYPES),
			symbol: fc.string({ maxLength: 12 }),
			message: fc.string({ maxLength: 40 }),
		});
		fc.assert(
			fc.property(fc.array(findingArb, { maxLength: 15 }), (findings) => {
				const diagnostics = toDiagnostics(findings, ["a", "bb", "ccc"]);
				expect(diagnostics).toHaveLength(findings.length);
				diagnostics.forEach((diagnostic, index) => {
					expect(diagnostic.source).toBe(DIAGNOSTIC_SOURCE);
					expect(diagnostic.range.start.line).toBe(
						(findings[index]?.line ?? 0) - 1,
					);
				});
			}),
		);
	});
});

describe("normalizeArgumentPath", () => {
	it("replaces every backslash on win32", () => {
		expect(normalizeArgumentPath("C:\\a\\b\\c.py", "win32")).toBe("C:/a/b/c.py");
	});

	it("leaves paths alone elsewhere", () => {
		expect(normalizeArgumentPath("/a/b\\c.py", "linux")).toBe("/a/b\\c.py");
		expect(normalizeArgumentPath("/a/b\\c.py", "darwin")).toBe("/a/b\\c.py");
	});

	it("never leaves a backslash behind on win32", () => {
		fc.assert(
			fc.property(fc.string(), (path) => {
				expect(normalizeArgumentPath(path, "win32")).not.toContain("\\");
			}),
		);
	});
});
