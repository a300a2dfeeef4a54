/**
 * @title macOS Detector Module
 * @description Proxy configuration from the System Configuration dynamic store.
 *
 * The default source reads `scutil --proxy`, which prints the dynamic-store
 * proxy dictionary:
 *
 * ```plain
 * <dictionary> {
 *   ExceptionsList : <array> {
 *     0 : *.local
 *   }
 *   ExcludeSimpleHostnames : 1
 *   HTTPEnable : 1
 *   HTTPPort : 3128
 *   HTTPProxy : proxy.example.com
 * }
 * ```
 *
 * @module detection
 */

import { createProxyConfiguration } from "../types/config.js";
import { failed, found, notFound, type DetectionResult, type ProxyDetector } from "../types/detection.js";
import { ConfigParseError, DetectionFailedError, getErrorMessage } from "../errors.js";
import { runCommand } from "./utils.js";

/** Detector name used in reports. */
export const MACOS_DETECTOR = "macos";

const SCUTIL_SOURCE = "scutil --proxy";

const SCHEME_PREFIXES = [
	["http", "HTTP"],
	["https", "HTTPS"],
	["ftp", "FTP"],
] as const;

/**
 * A value in the dynamic store: a scalar, an array or a nested dictionary.
 */
export type DynamicStoreValue = string | DynamicStoreValue[] | DynamicStoreDictionary;

/**
 * A dynamic-store dictionary.
 */
export interface DynamicStoreDictionary {
	[key: string]: DynamicStoreValue;
}

/**
 * Access to the dynamic-store proxy dictionary.
 */
export interface MacosProxySource {
	/** Read the current proxy dictionary. */
	readProxyDictionary(): DynamicStoreDictionary;
}

function parseError(message: string, line?: number): ConfigParseError {
	return new ConfigParseError(message, { source: MACOS_DETECTOR, sourcePath: SCUTIL_SOURCE, line });
}

function openContainer(text: string): DynamicStoreDictionary | DynamicStoreValue[] | undefined {
	if (text === "<dictionary> {") {
		return {};
	}
	if (text === "<array> {") {
		return [];
	}
	return undefined;
}

/**
 * Parse `scutil --proxy` output.
 *
 * @param output - Command output
 * @returns The top-level dictionary
 * @throws ConfigParseError for malformed or truncated output
 */
export function parseScutilOutput(output: string): DynamicStoreDictionary {
	const lines = output.split(/\r?\n/);
	const first = lines.findIndex((line) => line.trim().length > 0);
	if (first === -1 || lines[first]?.trim() !== "<dictionary> {") {
		throw parseError("Expected output to start with <dictionary> {");
	}

	const root: DynamicStoreDictionary = {};
	const stack: (DynamicStoreDictionary | DynamicStoreValue[])[] = [root];

	for (let index = first + 1; index < lines.length; index++) {
		const text = (lines[index] ?? "").trim();
		if (text.length === 0) {
			continue;
		}

		const container = stack[stack.length - 1];
		if (!container) {
			throw parseError(`Unexpected content after the closing brace: ${text}`, index + 1);
		}

		if (text === "}") {
			stack.pop();
			continue;
		}

		const match = /^(.+?)\s*:\s*(.*)$/.exec(text);
		if (!match?.[1]) {
			throw parseError(`Expected "key : value" but found: ${text}`, index + 1);
		}
		const key = match[1];
		const rest = match[2] ?? "";
		const nested = openContainer(rest);
		const value: DynamicStoreValue = nested ?? rest;

		if (Array.isArray(container)) {
			container.push(value);
		} else {
			container[key] = value;
		}
		if (nested) {
			stack.push(nested);
		}
	}

	if (stack.length > 0) {
		throw parseError("Unterminated dictionary in output");
	}

	return root;
}

function stringValue(value: DynamicStoreValue | undefined): string | undefined {
	return typeof value === "string" ? value.trim() : undefined;
}

/**
 * Build a detection result from a dynamic-store proxy dictionary.
 *
 * @param dictionary - Proxy dictionary
 * @returns Detection result; `not-found` when no scheme is enabled
 */
export function proxyConfigFromDictionary(dictionary: DynamicStoreDictionary): DetectionResult {
	const proxies: Record<string, string> = {};

	for (const [scheme, prefix] of SCHEME_PREFIXES) {
		if (stringValue(dictionary[`${prefix}Enable`]) !== "1") {
			continue;
		}
		const host = stringValue(dictionary[`${prefix}Proxy`]);
		if (!host) {
			continue;
		}
		const port = stringValue(dictionary[`${prefix}Port`]);
		proxies[scheme] = port ? `${host}:${port}` : host;
	}

	if (Object.keys(proxies).length === 0) {
		return notFound();
	}

	const exceptions = dictionary["ExceptionsList"];
	const bypass = Array.isArray(exceptions)
		? exceptions.flatMap((entry) => (typeof entry === "string" ? [entry] : []))
		: [];

	return found(
		createProxyConfiguration({
			proxies,
			bypass,
			excludeSimple: stringValue(dictionary["ExcludeSimpleHostnames"]) === "1",
		}),
	);
}

/**
 * Source backed by the `scutil` command line tool.
 */
export const scutilMacosSource: MacosProxySource = {
	readProxyDictionary: () => parseScutilOutput(runCommand("scutil", ["--proxy"])),
};

/**
 * Create the macOS system configuration detector.
 *
 * @param source - Dictionary source (default: `scutil --proxy`)
 */
export function createMacosDetector(source: MacosProxySource = scutilMacosSource): ProxyDetector {
	return {
		name: MACOS_DETECTOR,
		getProxyConfig: () => {
			try {
				return proxyConfigFromDictionary(source.readProxyDictionary());
			} catch (error) {
				if (error instanceof DetectionFailedError) {
					return failed(error);
				}
				return failed(
					new DetectionFailedError(`Failed to read macOS proxy settings: ${getErrorMessage(error)}`, {
						source: MACOS_DETECTOR,
						cause: error,
					}),
				);
			}
		},
	};
}
