/**
 * @title Detection Types Module
 * @description Contract shared by every proxy detector and the orchestrator.
 *
 * @module types
 */

import type { DetectionFailedError } from "../errors.js";
import type { ProxyConfiguration } from "./config.js";

/**
 * Outcome of consulting one configuration source.
 *
 * - `found`: the source holds a proxy configuration.
 * - `not-found`: the source was consulted and configures no proxy.
 * - `failed`: the source could not be consulted or its content is malformed.
 */
export type DetectionResult =
	| { status: "found"; config: ProxyConfiguration }
	| { status: "not-found" }
	| { status: "failed"; error: DetectionFailedError };

/**
 * Status values of {@link DetectionResult}.
 */
export type DetectionStatus = DetectionResult["status"];

/**
 * A source-specific probe producing a proxy configuration.
 *
 * Implementations must be local-only, finish in bounded time and leave
 * process-wide state untouched.
 */
export interface ProxyDetector {
	/** Short identifier used in reports and logs (e.g. "env"). */
	readonly name: string;
	/** Consult the source once. */
	getProxyConfig(): DetectionResult;
}

/**
 * Record of one detector run during a scan.
 */
export interface DetectionAttempt {
	/** Detector name. */
	detector: string;
	/** What the detector reported. */
	status: DetectionStatus;
	/** Failure cause, present when status is "failed". */
	error?: DetectionFailedError;
}

/**
 * Result of a full detection scan with diagnostics.
 */
export interface DetectionReport {
	/** Winning configuration, if any detector found one. */
	config?: ProxyConfiguration;
	/** Name of the detector that produced `config`. */
	source?: string;
	/** Detectors that ran, in order. Detectors after the winner never run. */
	attempts: DetectionAttempt[];
}

/**
 * Build a `found` result.
 */
export function found(config: ProxyConfiguration): DetectionResult {
	return { status: "found", config };
}

/**
 * Build a `not-found` result.
 */
export function notFound(): DetectionResult {
	return { status: "not-found" };
}

/**
 * Build a `failed` result.
 */
export function failed(error: DetectionFailedError): DetectionResult {
	return { status: "failed", error };
}
