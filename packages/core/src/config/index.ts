/**
 * Configuration module exports.
 */

export {
	CONFIG_FILENAME,
	LOG_LEVELS,
	type LogLevel,
	type Tm2SnipConfig,
	isLogLevel,
	findConfigFile,
	parseConfigContent,
	readConfigFile,
} from "./config.js";
