/**
 * Shared helpers for detectors.
 */

import { execFileSync } from "node:child_process";

/** Upper bound for a single settings query. */
const COMMAND_TIMEOUT_MS = 5000;

/**
 * Split a delimited list, trimming entries and dropping empty ones.
 *
 * @param value - Raw list (undefined yields an empty list)
 * @param separator - Separator pattern
 * @returns Entries in source order
 */
export function splitList(value: string | undefined, separator: RegExp | string): string[] {
	if (!value) {
		return [];
	}
	return value
		.split(separator)
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
}

/**
 * Run a settings query tool and return its standard output.
 *
 * @param command - Executable name
 * @param args - Arguments
 * @returns Standard output
 * @throws The child process error when the tool is missing, fails or times out
 */
export function runCommand(command: string, args: readonly string[]): string {
	return execFileSync(command, args, {
		encoding: "utf-8",
		timeout: COMMAND_TIMEOUT_MS,
		windowsHide: true,
		stdio: ["ignore", "pipe", "pipe"],
	});
}
