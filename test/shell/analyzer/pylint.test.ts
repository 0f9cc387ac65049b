// CHANGE: Unit tests for the pylint subprocess analyzer
// PURITY: SHELL - the subprocess runner is replaced by an in-process stand-in
// INVARIANT: the file path is the last argument; stdout is returned verbatim

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import type { ExecError } from "../../../src/core/types/index.js";
import {
	buildPylintArgs,
	createPylintAnalyzer,
	DEFAULT_ANALYZER_CONFIG,
} from "../../../src/shell/analyzer/pylint.js";
import type { CommandRunner } from "../../../src/shell/utils/exec.js";

interface RecordedCall {
	readonly file: string;
	readonly args: ReadonlyArray<string>;
}

const recordingRunner = (
	result: Effect.Effect<string, ExecError>,
): { readonly run: CommandRunner; readonly calls: RecordedCall[] } => {
	const calls: RecordedCall[] = [];
	return {
		calls,
		run: (file, args) =>
			Effect.suspend(() => {
				calls.push({ file, args });
				return result;
			}),
	};
};

describe("buildPylintArgs", () => {
	it("requests the JSON reporter and places the path last", () => {
		expect(buildPylintArgs(DEFAULT_ANALYZER_CONFIG, "/work/app.py")).toEqual([
			"--output-format=json",
			"/work/app.py",
		]);
	});

	it("inserts extra flags before the path", () => {
		expect(
			buildPylintArgs(
				{ pylintPath: "pylint", pylintArgs: ["--disable=C0114,C0116"] },
				"C:/work/my app.py",
			),
		).toEqual([
			"--output-format=json",
			"--disable=C0114,C0116",
			"C:/work/my app.py",
		]);
	});
});

describe("createPylintAnalyzer", () => {
	it("runs pylint once and returns its stdout", async () => {
		const runner = recordingRunner(Effect.succeed("[]"));
		const analyzer = createPylintAnalyzer({ run: runner.run });

		const output = await Effect.runPromise(analyzer.analyze("/work/app.py"));

		expect(output).toBe("[]");
		expect(runner.calls).toEqual([
			{ file: "pylint", args: ["--output-format=json", "/work/app.py"] },
		]);
	});

	it("hands pylint a path with $, $(...), backticks and \\\" as one literal argument", async () => {
		const runner = recordingRunner(Effect.succeed(""));
		const analyzer = createPylintAnalyzer({ run: runner.run });
		const path = '/work/$HOME/$(echo injected)/`echo tick`/say \\"hi\\".py';

		await Effect.runPromise(analyzer.analyze(path));

		expect(runner.calls).toHaveLength(1);
		expect(runner.calls[0]?.args).toEqual(["--output-format=json", path]);
		expect(runner.calls[0]?.args.at(-1)).toBe(
			'/work/$HOME/$(echo injected)/`echo tick`/say \\"hi\\".py',
		);
	});

	it("has no cache to reset between runs", () => {
		expect(createPylintAnalyzer().resetCache).toBeUndefined();
		expect(createPylintAnalyzer().name).toBe("pylint");
	});

	it("uses the configured executable and flags", async () => {
		const runner = recordingRunner(Effect.succeed(""));
		const analyzer = createPylintAnalyzer({
			run: runner.run,
			config: { pylintPath: "/venv/bin/pylint", pylintArgs: ["--jobs=1"] },
		});

		await Effect.runPromise(analyzer.analyze("a.py"));

		expect(runner.calls).toEqual([
			{
				file: "/venv/bin/pylint",
				args: ["--output-format=json", "--jobs=1", "a.py"],
			},
		]);
	});

	it("logs a readable form of the command it runs", async () => {
		const debug: string[] = [];
		const analyzer = createPylintAnalyzer({
			run: recordingRunner(Effect.succeed("")).run,
			logger: {
				debug: (message) => {
					debug.push(message);
				},
				info: () => undefined,
				error: () => undefined,
			},
		});

		await Effect.runPromise(analyzer.analyze("/work/my app.py"));

		expect(debug).toEqual([
			"Command: pylint --output-format=json '/work/my app.py'",
		]);
	});

	it("maps a launch failure to ExternalToolError using stderr", async () => {
		const failure: ExecError = Object.assign(new Error("Command failed"), {
			stderr: "/bin/sh: 1: pylint: not found\n",
		});
		const analyzer = createPylintAnalyzer({
			run: recordingRunner(Effect.fail(failure)).run,
		});

		const error = await Effect.runPromise(
			Effect.flip(analyzer.analyze("/work/app.py")),
		);

		expect(error).toMatchObject({
			_tag: "ExternalToolError",
			tool: "pylint",
			reason: "Failed to run pylint: /bin/sh: 1: pylint: not found",
		});
	});

	it("falls back to the error message when stderr is empty", async () => {
		const analyzer = createPylintAnalyzer({
			run: recordingRunner(Effect.fail(new Error("spawn EACCES"))).run,
		});

		const error = await Effect.runPromise(
			Effect.flip(analyzer.analyze("/work/app.py")),
		);

		expect(error.reason).toBe("Failed to run pylint: spawn EACCES");
	});
});
