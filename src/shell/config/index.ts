// CHANGE: Central export for configuration modules
// SOURCE: n/a

export { parseCLIArgs } from "./cli.js";
export {
	CONFIG_FILE_NAME,
	loadAnalyzerConfig,
	loadConfigFile,
	mergeAnalyzerConfig,
} from "./loader.js";
