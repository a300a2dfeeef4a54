/**
 * @title Detection Orchestrator Module
 * @description Run detectors in priority order; the first one that finds a
 * configuration wins.
 *
 * "No proxy configured" is the normal outcome on most hosts and is never an
 * error. A source that fails is skipped so the next source can answer; its
 * failure is only visible in the report and on the debug log channel.
 *
 * @module detection
 */

import type { ProxyConfiguration } from "../types/config.js";
import type { DetectionAttempt, DetectionReport, DetectionResult, ProxyDetector } from "../types/detection.js";
import { DetectionFailedError, getErrorMessage } from "../errors.js";
import { logMessage } from "../log.js";

/**
 * Invoke one detector, converting a thrown error into a `failed` result.
 */
function runDetector(detector: ProxyDetector): DetectionResult {
	try {
		return detector.getProxyConfig();
	} catch (error) {
		const detectionError =
			error instanceof DetectionFailedError
				? error
				: new DetectionFailedError(`Detector threw: ${getErrorMessage(error)}`, {
						source: detector.name,
						cause: error,
					});
		return { status: "failed", error: detectionError };
	}
}

/**
 * Scan the registry and report what each detector returned.
 *
 * Detectors run sequentially; once one finds a configuration, none of the
 * following detectors run.
 *
 * @param registry - Detectors in priority order
 * @returns The winning configuration (if any) with per-detector attempts
 */
export function detectWithReport(registry: readonly ProxyDetector[]): DetectionReport {
	const attempts: DetectionAttempt[] = [];

	if (registry.length === 0) {
		logMessage("No proxy detectors available on this platform", "debug");
	}

	for (const detector of registry) {
		const result = runDetector(detector);

		switch (result.status) {
			case "found":
				attempts.push({ detector: detector.name, status: "found" });
				logMessage(`Proxy configuration found by ${detector.name}`, "debug");
				return { config: result.config, source: detector.name, attempts };
			case "not-found":
				attempts.push({ detector: detector.name, status: "not-found" });
				logMessage(`No proxy configured in ${detector.name}`, "debug");
				break;
			case "failed":
				attempts.push({ detector: detector.name, status: "failed", error: result.error });
				logMessage(`Proxy detection via ${detector.name} failed: ${result.error.message}`, "debug");
				break;
		}
	}

	return { attempts };
}

/**
 * Find the effective proxy configuration.
 *
 * Never throws: "nothing configured" and "every source failed" both yield
 * undefined. Use {@link detectWithReport} to tell them apart.
 *
 * @param registry - Detectors in priority order
 * @returns The configuration of the first detector that found one
 */
export function detect(registry: readonly ProxyDetector[]): ProxyConfiguration | undefined {
	return detectWithReport(registry).config;
}
