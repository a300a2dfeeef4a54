/**
 * @title Errors
 * @description Error types for @sysproxy/core.
 *
 * Detection errors never reach callers of `detectProxyConfig()`; they are
 * recorded in detection reports and on the debug log channel.
 *
 * @module errors
 */

/**
 * Options for constructing a SysProxyError.
 */
export interface SysProxyErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all sysproxy errors.
 */
export class SysProxyError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: SysProxyErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "SysProxyError";
		this.code = code;
		this.suggestion = options?.suggestion;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * A configuration source could not be consulted (I/O error, permission
 * denied, missing tool or API).
 */
export class DetectionFailedError extends SysProxyError {
	/** Name of the detector whose source failed. */
	readonly source: string;

	constructor(
		message: string,
		options: { source: string; cause?: unknown; suggestion?: string },
		code = "DETECTION_FAILED",
	) {
		super(message, code, { cause: options.cause, suggestion: options.suggestion });
		this.name = "DetectionFailedError";
		this.source = options.source;
	}
}

/**
 * A configuration source was readable but its content is malformed.
 */
export class ConfigParseError extends DetectionFailedError {
	/** File or command the content came from. */
	readonly sourcePath?: string;
	/** 1-based line number of the offending line, when known. */
	readonly line?: number;

	constructor(
		message: string,
		options: { source: string; sourcePath?: string; line?: number; cause?: unknown },
	) {
		const location = options.sourcePath
			? options.line !== undefined
				? `${options.sourcePath}:${options.line}`
				: options.sourcePath
			: undefined;
		super(
			message,
			{
				source: options.source,
				cause: options.cause,
				suggestion: location ? `Check the proxy settings in ${location}` : undefined,
			},
			"PARSE_ERROR",
		);
		this.name = "ConfigParseError";
		this.sourcePath = options.sourcePath;
		this.line = options.line;
	}
}

/**
 * Input to `createProxyConfiguration` violates an invariant.
 */
export class InvalidProxyConfigError extends SysProxyError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "INVALID_CONFIG", { cause: options?.cause });
		this.name = "InvalidProxyConfigError";
	}
}

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
