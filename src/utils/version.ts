import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { PROGRAM_NAME } from "../constants.js";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads the program version from the nearest package.json named after the program.
 * Looks upwards from this module so it works from both sources and build output.
 *
 * @returns The version, or "0.0.0" when no matching package.json is found.
 */
export function readPackageVersion(): string {
	let directory = path.dirname(fileURLToPath(import.meta.url));
	for (;;) {
		const candidate = path.join(directory, "package.json");
		if (fs.existsSync(candidate)) {
			const pkg: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
			if (isRecord(pkg) && pkg["name"] === PROGRAM_NAME && typeof pkg["version"] === "string") {
				return pkg["version"];
			}
		}
		const parent = path.dirname(directory);
		if (parent === directory) {
			return "0.0.0";
		}
		directory = parent;
	}
}
