import { Command, CommanderError, Option } from "commander";
import {
	CONFIG_FILENAME,
	ConfigError,
	LOG_LEVELS,
	findConfigFile,
	readConfigFile,
	type LogLevel,
	type Tm2SnipConfig,
} from "@tm2snip/core";
import { DEFAULT_NAMESPACE_DOMAIN, SNIPMATE_FORMAT_NAME } from "@tm2snip/snippets";
import { DEFAULT_LOG_LEVEL, PROGRAM_DESCRIPTION, PROGRAM_NAME } from "./constants.js";
import { convertSnippetsCommand } from "./commands/convertSnippets.js";
import { logMessage, setLogLevel, setLogOutput } from "./utils/log.js";
import { readPackageVersion } from "./utils/version.js";

/**
 * Process-level collaborators of a CLI run.
 */
export interface CliIO {
	/** Standard output. */
	stdout: (text: string) => void;
	/** Standard error. */
	stderr: (text: string) => void;
	/** Directory searched for the default configuration file. */
	cwd: string;
	/** Program name written in the banner of generated files. */
	programName: string;
	/** Banner time (default: now). */
	now?: Date;
}

type CliOptions = {
	domain?: string;
	config?: string;
	logLevel?: LogLevel;
};

/**
 * Builds the command-line program.
 */
export function createProgram(io: Pick<CliIO, "stdout" | "stderr">): Command {
	return new Command()
		.name(PROGRAM_NAME)
		.description(PROGRAM_DESCRIPTION)
		.version(readPackageVersion())
		.argument("[source]", "directory holding .tmSnippet files")
		.argument("[target]", "existing directory for the .snippets files")
		.option("--domain <name>", `suffix appended to every namespace (default: "${DEFAULT_NAMESPACE_DOMAIN}")`)
		.option("--config <path>", `configuration file (default: ./${CONFIG_FILENAME} when present)`)
		.addOption(new Option("--log-level <level>", "log verbosity").choices(LOG_LEVELS))
		.exitOverride()
		.configureOutput({ writeOut: io.stdout, writeErr: io.stderr });
}

/**
 * Loads the configuration file named on the command line, or the default
 * file from the working directory when there is one.
 */
function loadConfig(configPath: string | undefined, cwd: string): Tm2SnipConfig {
	if (configPath) {
		return readConfigFile(configPath);
	}
	const defaultPath = findConfigFile(cwd);
	return defaultPath ? readConfigFile(defaultPath) : {};
}

/**
 * Runs the command-line interface.
 *
 * With fewer than two positional arguments the usage text is printed and
 * the run succeeds.
 *
 * @param argv - Arguments after the program name.
 * @param io - Process-level collaborators.
 * @returns The process exit code.
 */
export function runCli(argv: readonly string[], io: CliIO): number {
	setLogOutput({ stdout: io.stdout, stderr: io.stderr });

	const program = createProgram(io);
	try {
		program.parse([...argv], { from: "user" });
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode;
		}
		throw error;
	}

	const [sourceDir, targetDir] = program.args;
	if (sourceDir === undefined || targetDir === undefined) {
		io.stdout(program.helpInformation());
		return 0;
	}

	const options = program.opts<CliOptions>();

	let config: Tm2SnipConfig;
	try {
		config = loadConfig(options.config, io.cwd);
	} catch (error) {
		if (error instanceof ConfigError) {
			logMessage(error.format(), "error");
			return 1;
		}
		throw error;
	}

	setLogLevel(options.logLevel ?? config.logLevel ?? DEFAULT_LOG_LEVEL);

	return convertSnippetsCommand(sourceDir, targetDir, {
		domain: options.domain ?? config.domain ?? DEFAULT_NAMESPACE_DOMAIN,
		formatName: config.formatName ?? SNIPMATE_FORMAT_NAME,
		generator: io.programName,
		now: io.now,
	});
}
