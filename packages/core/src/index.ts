/**
 * @sysproxy/core - System proxy detection and selection.
 *
 * This library provides functionality for:
 * - Proxy detection (environment, /etc/sysconfig/proxy, Windows, macOS)
 * - Proxy selection (bypass rules and per-scheme addresses)
 * - undici dispatchers for the selected proxy
 */

// Type exports
export * from "./types/index.js";

// Error exports
export {
	SysProxyError,
	DetectionFailedError,
	ConfigParseError,
	InvalidProxyConfigError,
	getErrorMessage,
	type SysProxyErrorOptions,
} from "./errors.js";

// Logging exports
export { logMessage, getLogger, setLogger, resetLogger, getConfiguredLogLevel, type LogLevel } from "./log.js";

// Detection exports
export * from "./detection/index.js";

// Proxy exports
export * from "./proxy/index.js";
