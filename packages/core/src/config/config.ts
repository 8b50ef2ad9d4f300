/**
 * @title Configuration Module
 * @description Loading of the optional `.tm2snip.yml` configuration file.
 *
 * @module config
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { ConfigError, getErrorMessage } from "../errors.js";

/** Default configuration filename, looked up in the working directory. */
export const CONFIG_FILENAME = ".tm2snip.yml";

/** Supported log levels, from least to most verbose. */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Settings that can be read from a configuration file.
 * Every field is optional; absent fields fall back to built-in defaults.
 */
export interface Tm2SnipConfig {
	/** Suffix appended to every namespace key. */
	domain?: string;
	/** Log verbosity. */
	logLevel?: LogLevel;
	/** Target format name shown in output file headers. */
	formatName?: string;
}

/**
 * Check whether a value is a supported log level.
 */
export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string, sourcePath?: string): string | undefined {
	const value = raw[key];
	if (value === undefined || value === null) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new ConfigError(`'${key}' must be a string`, { configPath: sourcePath });
	}
	return value;
}

/**
 * Find the configuration file in a directory.
 *
 * @param directory - Directory to search.
 * @returns Path to the configuration file or null if not found.
 */
export function findConfigFile(directory: string): string | null {
	const configPath = path.join(directory, CONFIG_FILENAME);
	if (fs.existsSync(configPath)) {
		return configPath;
	}
	return null;
}

/**
 * Parse configuration content from a YAML string.
 * Unknown keys are ignored. An empty document yields an empty configuration.
 *
 * @param content - YAML content.
 * @param sourcePath - Source path for error messages (optional).
 * @returns Parsed configuration.
 * @throws ConfigError if the YAML is invalid or a value has the wrong type.
 */
export function parseConfigContent(content: string, sourcePath?: string): Tm2SnipConfig {
	let raw: unknown;
	try {
		raw = yaml.load(content);
	} catch (error) {
		throw new ConfigError(`Failed to parse configuration: ${getErrorMessage(error)}`, {
			configPath: sourcePath,
			cause: error,
		});
	}

	if (raw === undefined || raw === null) {
		return {};
	}
	if (!isRecord(raw)) {
		throw new ConfigError("Configuration file must contain a mapping", { configPath: sourcePath });
	}

	const config: Tm2SnipConfig = {};

	const domain = readString(raw, "domain", sourcePath);
	if (domain !== undefined) {
		config.domain = domain;
	}

	const formatName = readString(raw, "format-name", sourcePath);
	if (formatName !== undefined) {
		config.formatName = formatName;
	}

	const logLevel = readString(raw, "log-level", sourcePath);
	if (logLevel !== undefined) {
		if (!isLogLevel(logLevel)) {
			throw new ConfigError(`'log-level' must be one of: ${LOG_LEVELS.join(", ")}`, { configPath: sourcePath });
		}
		config.logLevel = logLevel;
	}

	return config;
}

/**
 * Read and parse a configuration file.
 *
 * @param configPath - Full path to the configuration file.
 * @returns Parsed configuration.
 * @throws ConfigError if reading or parsing fails.
 */
export function readConfigFile(configPath: string): Tm2SnipConfig {
	let content: string;
	try {
		content = fs.readFileSync(configPath, "utf-8");
	} catch (error) {
		throw new ConfigError(`Failed to read configuration file: ${getErrorMessage(error)}`, {
			configPath,
			cause: error,
		});
	}
	return parseConfigContent(content, configPath);
}
