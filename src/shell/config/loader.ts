// CHANGE: Layered analyzer configuration loading
// WHY: defaults ← pylint-diagnostics.config.json ← PYLINT_PATH ← CLI flags
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<AnalyzerConfig, ConfigError | FSError>
// INVARIANT: A missing config file is not an error; an unreadable or invalid one is

import { Effect, Schema } from "effect";

import { ConfigError, FSError } from "../../core/errors.js";
import type { AnalyzerConfig, CLIOptions } from "../../core/types/index.js";
import { DEFAULT_ANALYZER_CONFIG } from "../analyzer/pylint.js";
import { fs, path } from "../utils/node-mods.js";

export const CONFIG_FILE_NAME = "pylint-diagnostics.config.json";

const ConfigFile = Schema.parseJson(
	Schema.Struct({
		pylintPath: Schema.optional(Schema.NonEmptyString),
		pylintArgs: Schema.optional(Schema.Array(Schema.String)),
	}),
);

export type ConfigFile = typeof ConfigFile.Type;

const decodeConfigFile = Schema.decodeUnknown(ConfigFile);

function readConfigFile(
	filePath: string,
): Effect.Effect<string | null, FSError> {
	return Effect.try({
		try: () =>
			fs.existsSync(filePath) ? fs.readFileSync(filePath, "utf8") : null,
		catch: (error) =>
			new FSError({
				path: filePath,
				detail: `Failed to read config: ${String(error)}`,
			}),
	});
}

/**
 * Reads `pylint-diagnostics.config.json` from `cwd`; `{}` when it is absent.
 */
export function loadConfigFile(
	cwd: string,
): Effect.Effect<ConfigFile, ConfigError | FSError> {
	const filePath = path.join(cwd, CONFIG_FILE_NAME);
	return Effect.gen(function* () {
		const text = yield* readConfigFile(filePath);
		if (text === null) {
			return {};
		}
		return yield* decodeConfigFile(text).pipe(
			Effect.mapError(
				(error) =>
					new ConfigError({ source: filePath, detail: error.message }),
			),
		);
	});
}

/**
 * Merges every configuration layer over the defaults.
 *
 * Extra pylint flags accumulate: config file flags come first, CLI flags after.
 *
 * @pure true
 */
export function mergeAnalyzerConfig(
	file: ConfigFile,
	env: NodeJS.ProcessEnv,
	cli: Pick<CLIOptions, "pylintPath" | "pylintArgs">,
): AnalyzerConfig {
	const envPath = env["PYLINT_PATH"];
	return {
		pylintPath:
			cli.pylintPath ??
			(envPath !== undefined && envPath.length > 0 ? envPath : undefined) ??
			file.pylintPath ??
			DEFAULT_ANALYZER_CONFIG.pylintPath,
		pylintArgs: [
			...DEFAULT_ANALYZER_CONFIG.pylintArgs,
			...(file.pylintArgs ?? []),
			...cli.pylintArgs,
		],
	};
}

export function loadAnalyzerConfig(options: {
	readonly cwd: string;
	readonly env: NodeJS.ProcessEnv;
	readonly cli: Pick<CLIOptions, "pylintPath" | "pylintArgs">;
}): Effect.Effect<AnalyzerConfig, ConfigError | FSError> {
	return loadConfigFile(options.cwd).pipe(
		Effect.map((file) => mergeAnalyzerConfig(file, options.env, options.cli)),
	);
}
