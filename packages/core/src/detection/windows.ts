/**
 * @title Windows Detector Module
 * @description Proxy configuration from Internet Settings and WinHTTP.
 *
 * The per-user Internet Settings key is consulted first:
 * HKCU\Software\Microsoft\Windows\CurrentVersion\Internet Settings
 *
 * - `ProxyEnable` (REG_DWORD): 0 disables the proxy.
 * - `ProxyServer` (REG_SZ): `host:port` for every scheme, or `http=host:port;https=host:port`.
 * - `ProxyOverride` (REG_SZ): semicolon separated bypass list, may contain `<local>`.
 *
 * When no per-user proxy is set, the machine-wide WinHTTP proxy
 * (`netsh winhttp show proxy`) is used instead.
 *
 * @module detection
 */

import { createProxyConfiguration, isProxyScheme } from "../types/config.js";
import { failed, found, notFound, type DetectionResult, type ProxyDetector } from "../types/detection.js";
import { ConfigParseError, DetectionFailedError, getErrorMessage } from "../errors.js";
import { logMessage } from "../log.js";
import { runCommand, splitList } from "./utils.js";

/** Detector name used in reports. */
export const WINDOWS_DETECTOR = "windows";

/** Per-user Internet Settings registry key. */
export const INTERNET_SETTINGS_KEY = "HKCU\\Software\\Microsoft\\Windows\\CurrentVersion\\Internet Settings";

/**
 * A registry value as printed by `reg query`.
 */
export interface RegistryValue {
	/** Registry type, e.g. "REG_DWORD" or "REG_SZ". */
	type: string;
	/** Value data as text (DWORDs are hexadecimal, e.g. "0x1"). */
	data: string;
}

/**
 * Machine-wide WinHTTP proxy settings.
 */
export interface WinHttpProxySettings {
	/** Same format as the `ProxyServer` registry value. */
	proxyServer: string;
	/** Same format as the `ProxyOverride` registry value. */
	bypassList: string;
}

/**
 * Access to the Windows proxy settings.
 */
export interface WindowsProxySource {
	/** Values of the per-user Internet Settings key, or undefined if the key does not exist. */
	readInternetSettings(): Map<string, RegistryValue> | undefined;
	/** The WinHTTP proxy, or undefined when WinHTTP uses direct access. */
	readWinHttpProxy(): WinHttpProxySettings | undefined;
}

/**
 * Parse `reg query` output into a value map.
 *
 * @param output - Output of `reg query <key>`
 * @returns Value name to value map
 */
export function parseRegQueryOutput(output: string): Map<string, RegistryValue> {
	const values = new Map<string, RegistryValue>();

	for (const line of output.split(/\r?\n/)) {
		const match = /^\s+(.+?)\s+(REG_[A-Z0-9_]+)(?:\s+(.*))?$/.exec(line);
		if (match?.[1] && match[2]) {
			values.set(match[1], { type: match[2], data: (match[3] ?? "").trim() });
		}
	}

	return values;
}

/**
 * Parse `netsh winhttp show proxy` output.
 *
 * @param output - Command output
 * @returns WinHTTP proxy settings, or undefined for direct access
 */
export function parseWinHttpOutput(output: string): WinHttpProxySettings | undefined {
	const proxyServer = /Proxy Server\(s\)\s*:\s*(.*)$/m.exec(output)?.[1]?.trim();
	if (!proxyServer) {
		return undefined;
	}

	const bypassList = /Bypass List\s*:\s*(.*)$/m.exec(output)?.[1]?.trim() ?? "";
	return { proxyServer, bypassList: bypassList === "(none)" ? "" : bypassList };
}

/**
 * Runs a settings query tool and returns its standard output.
 */
export type CommandRunner = (command: string, args: readonly string[]) => string;

/**
 * `reg query` exits with status 1 when the key does not exist, whatever the
 * display language of its error message.
 */
function isMissingKeyError(error: unknown): boolean {
	return typeof error === "object" && error !== null && "status" in error && error.status === 1;
}

/**
 * Create a source backed by the `reg` and `netsh` command line tools.
 *
 * @param run - Command runner (default: `execFileSync` with a timeout)
 */
export function createCommandLineWindowsSource(run: CommandRunner = runCommand): WindowsProxySource {
	return {
		readInternetSettings() {
			try {
				return parseRegQueryOutput(run("reg", ["query", INTERNET_SETTINGS_KEY]));
			} catch (error) {
				if (isMissingKeyError(error)) {
					return undefined;
				}
				throw error;
			}
		},
		readWinHttpProxy() {
			return parseWinHttpOutput(run("netsh", ["winhttp", "show", "proxy"]));
		},
	};
}

/**
 * Source backed by the `reg` and `netsh` command line tools.
 */
export const commandLineWindowsSource: WindowsProxySource = createCommandLineWindowsSource();

/**
 * Parse a `ProxyServer` value into a scheme to address map.
 *
 * Entries are separated by semicolons. `scheme=address` applies to one
 * scheme; an entry without `=` applies to every scheme ("*"). Schemes other
 * than http, https and ftp (such as socks) are skipped. When a scheme appears
 * twice, the first entry wins.
 *
 * @param value - Raw `ProxyServer` value
 * @param sourcePath - Where the value came from, for error messages
 * @returns Scheme to address map
 * @throws ConfigParseError for an entry with an empty scheme or address
 */
export function parseProxyServer(value: string, sourcePath = INTERNET_SETTINGS_KEY): Record<string, string> {
	const proxies: Record<string, string> = {};

	for (const entry of splitList(value, ";")) {
		const separator = entry.indexOf("=");
		const scheme = separator === -1 ? "*" : entry.slice(0, separator).trim().toLowerCase();
		const address = separator === -1 ? entry : entry.slice(separator + 1).trim();

		if (!scheme || !address) {
			throw new ConfigParseError(`Malformed proxy server entry "${entry}"`, {
				source: WINDOWS_DETECTOR,
				sourcePath,
			});
		}
		if (!isProxyScheme(scheme)) {
			logMessage(`Skipping unsupported proxy scheme "${scheme}" in ${sourcePath}`, "debug");
			continue;
		}
		if (proxies[scheme] !== undefined) {
			logMessage(`Ignoring duplicate proxy entry for "${scheme}" in ${sourcePath}`, "debug");
			continue;
		}
		proxies[scheme] = address;
	}

	return proxies;
}

function parseDword(value: RegistryValue, name: string): number {
	const parsed = value.type === "REG_DWORD" ? Number.parseInt(value.data, 16) : Number.NaN;
	if (Number.isNaN(parsed)) {
		throw new ConfigParseError(`Expected ${name} to be a REG_DWORD but found ${value.type} "${value.data}"`, {
			source: WINDOWS_DETECTOR,
			sourcePath: INTERNET_SETTINGS_KEY,
		});
	}
	return parsed;
}

function buildConfiguration(proxyServer: string, bypassList: string | undefined, sourcePath: string): DetectionResult {
	const proxies = parseProxyServer(proxyServer, sourcePath);
	if (Object.keys(proxies).length === 0) {
		return notFound();
	}
	return found(createProxyConfiguration({ proxies, bypass: splitList(bypassList, ";") }));
}

/**
 * Resolve the Windows proxy configuration from a settings source.
 *
 * @param source - Settings source
 * @returns Detection result
 */
export function resolveWindowsProxy(source: WindowsProxySource): DetectionResult {
	try {
		const settings = source.readInternetSettings();
		const enable = settings?.get("ProxyEnable");

		if (settings && enable) {
			if (parseDword(enable, "ProxyEnable") === 0) {
				return notFound();
			}
			const proxyServer = settings.get("ProxyServer")?.data.trim();
			if (proxyServer) {
				return buildConfiguration(proxyServer, settings.get("ProxyOverride")?.data, INTERNET_SETTINGS_KEY);
			}
		}

		logMessage("No per-user proxy set, falling back to the WinHTTP proxy", "debug");
		const winHttp = source.readWinHttpProxy();
		if (!winHttp) {
			return notFound();
		}
		return buildConfiguration(winHttp.proxyServer, winHttp.bypassList, "WinHTTP");
	} catch (error) {
		if (error instanceof DetectionFailedError) {
			return failed(error);
		}
		return failed(
			new DetectionFailedError(`Failed to read Windows proxy settings: ${getErrorMessage(error)}`, {
				source: WINDOWS_DETECTOR,
				cause: error,
			}),
		);
	}
}

/**
 * Create the Windows registry / WinHTTP detector.
 *
 * @param source - Settings source (default: `reg` and `netsh`)
 */
export function createWindowsDetector(source: WindowsProxySource = commandLineWindowsSource): ProxyDetector {
	return {
		name: WINDOWS_DETECTOR,
		getProxyConfig: () => resolveWindowsProxy(source),
	};
}
