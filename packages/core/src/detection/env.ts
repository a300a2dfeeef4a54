/**
 * @title Environment Detector Module
 * @description Proxy configuration from environment variables.
 *
 * @module detection
 *
 * @envvar HTTP_PROXY - Proxy for http URLs (http_proxy also accepted).
 * @envvar HTTPS_PROXY - Proxy for https URLs (https_proxy also accepted).
 * @envvar FTP_PROXY - Proxy for ftp URLs (ftp_proxy also accepted).
 * @envvar ALL_PROXY - Proxy for every scheme, used only when none of the above is set.
 * @envvar NO_PROXY - Comma or semicolon separated bypass list (no_proxy also accepted).
 *
 * The uppercase variants take precedence over lowercase if both are set.
 *
 * @example
 * ```bash
 * export HTTPS_PROXY=proxy.example.com:8080
 * export NO_PROXY=localhost,.internal.corp
 * ```
 */

import { createProxyConfiguration } from "../types/config.js";
import { failed, found, notFound, type DetectionResult, type ProxyDetector } from "../types/detection.js";
import { DetectionFailedError, getErrorMessage } from "../errors.js";
import { splitList } from "./utils.js";

/** Detector name used in reports. */
export const ENV_DETECTOR = "env";

const ENV_SCHEMES = ["http", "https", "ftp"] as const;

/**
 * Options for the environment detector.
 */
export interface EnvDetectorOptions {
	/** Environment to read (default: `process.env`). */
	environment?: NodeJS.ProcessEnv;
}

/**
 * Read a variable by name, ignoring case.
 *
 * The uppercase name is tried first, then the lowercase name, then any other
 * spelling (e.g. "Http_Proxy") in the order the environment lists them.
 *
 * @param env - Environment record
 * @param name - Variable name in any case (e.g. "HTTP_PROXY")
 * @returns First non-empty trimmed value, or undefined
 */
export function readEnvVariable(env: NodeJS.ProcessEnv, name: string): string | undefined {
	const upper = name.toUpperCase();
	const lower = name.toLowerCase();
	const mixed = Object.keys(env).filter(
		(key) => key !== upper && key !== lower && key.toLowerCase() === lower,
	);

	for (const key of [upper, lower, ...mixed]) {
		const value = env[key]?.trim();
		if (value) {
			return value;
		}
	}
	return undefined;
}

/**
 * Parse proxy settings from an environment record.
 *
 * @param env - Environment record
 * @returns Detection result; `not-found` when no proxy variable is set
 */
export function parseEnvProxyConfig(env: NodeJS.ProcessEnv): DetectionResult {
	const proxies: Record<string, string> = {};

	for (const scheme of ENV_SCHEMES) {
		const value = readEnvVariable(env, `${scheme}_proxy`);
		if (value) {
			proxies[scheme] = value;
		}
	}

	if (Object.keys(proxies).length === 0) {
		const generic = readEnvVariable(env, "all_proxy");
		if (generic) {
			proxies["*"] = generic;
		}
	}

	if (Object.keys(proxies).length === 0) {
		return notFound();
	}

	try {
		return found(
			createProxyConfiguration({
				proxies,
				bypass: splitList(readEnvVariable(env, "no_proxy"), /[,;]/),
			}),
		);
	} catch (error) {
		return failed(
			new DetectionFailedError(`Invalid proxy environment: ${getErrorMessage(error)}`, {
				source: ENV_DETECTOR,
				cause: error,
			}),
		);
	}
}

/**
 * Create the environment variable detector.
 */
export function createEnvDetector(options: EnvDetectorOptions = {}): ProxyDetector {
	return {
		name: ENV_DETECTOR,
		getProxyConfig: () => parseEnvProxyConfig(options.environment ?? process.env),
	};
}
