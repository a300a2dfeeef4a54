/**
 * @title Sysconfig Detector Module
 * @description Proxy configuration from `/etc/sysconfig/proxy`.
 *
 * The file exists on SUSE and Red Hat style Linux systems. It holds one
 * `KEY="value"` pair per line:
 *
 * ```plain
 * PROXY_ENABLED="yes"
 * HTTP_PROXY="proxy.local:3128"
 * NO_PROXY="localhost, .internal"
 * ```
 *
 * @module detection
 */

import * as fs from "node:fs";
import { createProxyConfiguration } from "../types/config.js";
import { failed, found, notFound, type DetectionResult, type ProxyDetector } from "../types/detection.js";
import { ConfigParseError, DetectionFailedError, getErrorMessage } from "../errors.js";
import { splitList } from "./utils.js";

/** Detector name used in reports. */
export const SYSCONFIG_DETECTOR = "sysconfig";

/** Default location of the sysconfig proxy file. */
export const DEFAULT_SYSCONFIG_PATH = "/etc/sysconfig/proxy";

const SCHEME_KEYS = [
	["http", "HTTP_PROXY"],
	["https", "HTTPS_PROXY"],
	["ftp", "FTP_PROXY"],
] as const;

/**
 * Options for the sysconfig detector.
 */
export interface SysconfigDetectorOptions {
	/** Path of the file to read (default: `/etc/sysconfig/proxy`). */
	path?: string;
}

/**
 * Remove the closing double quote and anything after it.
 * A missing closing quote is tolerated.
 */
function stripAfterQuote(value: string): string {
	const end = value.indexOf('"');
	return end === -1 ? value : value.slice(0, end);
}

/**
 * Parse `KEY="value"` lines into a map.
 *
 * Blank lines and `#` comments are skipped. Later keys overwrite earlier ones.
 *
 * @param content - File content
 * @param sourcePath - Path used in error messages
 * @returns Key to unquoted value map
 * @throws ConfigParseError for a line without `="`
 */
export function parseKeyValuePairs(content: string, sourcePath = DEFAULT_SYSCONFIG_PATH): Map<string, string> {
	const result = new Map<string, string>();
	const lines = content.split(/\r?\n/);

	lines.forEach((line, index) => {
		const trimmed = line.trim();
		if (trimmed.length === 0 || trimmed.startsWith("#")) {
			return;
		}

		const separator = line.indexOf('="');
		if (separator === -1) {
			throw new ConfigParseError(`Expected KEY="value" but found: ${trimmed}`, {
				source: SYSCONFIG_DETECTOR,
				sourcePath,
				line: index + 1,
			});
		}

		result.set(line.slice(0, separator).trim(), stripAfterQuote(line.slice(separator + 2)));
	});

	return result;
}

/**
 * Parse sysconfig proxy file content.
 *
 * @param content - File content
 * @param sourcePath - Path used in error messages
 * @returns Detection result
 */
export function parseSysconfigProxy(content: string, sourcePath = DEFAULT_SYSCONFIG_PATH): DetectionResult {
	let values: Map<string, string>;
	try {
		values = parseKeyValuePairs(content, sourcePath);
	} catch (error) {
		if (error instanceof ConfigParseError) {
			return failed(error);
		}
		throw error;
	}

	// Anything but an explicit "yes" disables the whole file.
	if (values.get("PROXY_ENABLED")?.trim().toLowerCase() !== "yes") {
		return notFound();
	}

	const proxies: Record<string, string> = {};
	for (const [scheme, key] of SCHEME_KEYS) {
		const address = values.get(key)?.trim();
		if (address) {
			proxies[scheme] = address;
		}
	}

	if (Object.keys(proxies).length === 0) {
		return notFound();
	}

	try {
		return found(
			createProxyConfiguration({
				proxies,
				bypass: splitList(values.get("NO_PROXY"), ",").map((entry) => entry.toLowerCase()),
			}),
		);
	} catch (error) {
		return failed(
			new ConfigParseError(getErrorMessage(error), { source: SYSCONFIG_DETECTOR, sourcePath, cause: error }),
		);
	}
}

/**
 * Create the sysconfig file detector.
 */
export function createSysconfigDetector(options: SysconfigDetectorOptions = {}): ProxyDetector {
	const sourcePath = options.path ?? DEFAULT_SYSCONFIG_PATH;

	return {
		name: SYSCONFIG_DETECTOR,
		getProxyConfig: () => {
			let content: string;
			try {
				content = fs.readFileSync(sourcePath, "utf-8");
			} catch (error) {
				return failed(
					new DetectionFailedError(`Failed to read ${sourcePath}: ${getErrorMessage(error)}`, {
						source: SYSCONFIG_DETECTOR,
						cause: error,
					}),
				);
			}
			return parseSysconfigProxy(content, sourcePath);
		},
	};
}
