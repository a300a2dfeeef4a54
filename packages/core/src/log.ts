/**
 * @title Logging Module
 * @description Diagnostic log channel for proxy detection.
 *
 * Detection never reports failures to its caller, so this channel is the only
 * place a failing source becomes visible. The default logger writes JSON lines
 * to stderr at the level named by `SYSPROXY_LOG_LEVEL` (default "warn").
 *
 * @module log
 *
 * @envvar SYSPROXY_LOG_LEVEL - One of "error", "warn", "info", "debug".
 */

import { pino, type Logger } from "pino";

/**
 * Log levels understood by {@link logMessage}, most severe first.
 */
export type LogLevel = "error" | "warn" | "info" | "debug";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

let activeLogger: Logger | undefined;

function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Read the configured log level from the environment.
 *
 * @param env - Environment to read (defaults to `process.env`)
 * @returns The configured level, or "warn" when unset or unrecognised
 */
export function getConfiguredLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
	const raw = env["SYSPROXY_LOG_LEVEL"]?.trim().toLowerCase() ?? "";
	return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

function createDefaultLogger(): Logger {
	return pino({ name: "sysproxy", level: getConfiguredLogLevel() }, process.stderr);
}

/**
 * Get the logger used for diagnostics, creating the default one on first use.
 */
export function getLogger(): Logger {
	activeLogger ??= createDefaultLogger();
	return activeLogger;
}

/**
 * Replace the diagnostic logger, e.g. with a child of the host's pino logger.
 */
export function setLogger(logger: Logger): void {
	activeLogger = logger;
}

/**
 * Drop the current logger so the next message re-reads `SYSPROXY_LOG_LEVEL`.
 */
export function resetLogger(): void {
	activeLogger = undefined;
}

/**
 * Log a message at the given level.
 *
 * @param message - The message to log
 * @param type - Severity of the message
 */
export function logMessage(message: string, type: LogLevel = "info"): void {
	getLogger()[type](message);
}
