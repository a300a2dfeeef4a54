/**
 * @title Bypass Matching Module
 * @description Decide whether a destination host skips the proxy.
 *
 * @module proxy
 *
 * @pattern example.com - Matches exactly example.com (case-insensitive).
 * @pattern *.example.com - Matches a.example.com and b.a.example.com, not example.com.
 * @pattern .example.com - Same as *.example.com.
 * @pattern <local> - Matches every host name without a dot.
 *
 * @note A lone "*" is not a catch-all; it only matches a host literally named "*".
 * @note CIDR notation and IP wildcards (e.g. 192.168.*.*) are not supported.
 */

import { LOCAL_BYPASS_TOKEN, type ProxyConfiguration } from "../types/config.js";

/**
 * Normalise a host name for matching: lowercase, one trailing dot removed.
 *
 * @param host - Raw host name
 * @returns Normalised host name
 */
export function normaliseHost(host: string): string {
	const lower = host.toLowerCase();
	return lower.endsWith(".") ? lower.slice(0, -1) : lower;
}

/**
 * Check if a host is a "simple" host name, i.e. contains no dot.
 * Bracketed IPv6 literals such as `[::1]` count as simple.
 */
export function isSimpleHostname(host: string): boolean {
	return !host.includes(".");
}

/**
 * Extract the suffix of a `*.suffix` or `.suffix` pattern.
 *
 * @returns The suffix without its leading dot, or undefined for other patterns
 */
function wildcardSuffix(pattern: string): string | undefined {
	if (pattern.startsWith("*.")) {
		return pattern.slice(2);
	}
	if (pattern.startsWith(".")) {
		return pattern.slice(1);
	}
	return undefined;
}

/**
 * Check a normalised host against one exact or suffix pattern.
 *
 * The `<local>` token is not handled here, see {@link isBypassed}.
 *
 * @param host - Normalised host name
 * @param pattern - Bypass pattern (any case)
 * @returns True if the pattern matches the host
 */
export function matchesBypassPattern(host: string, pattern: string): boolean {
	const normalised = pattern.trim().toLowerCase();
	if (normalised.length === 0) {
		return false;
	}

	if (normalised === host) {
		return true;
	}

	const suffix = wildcardSuffix(normalised);
	if (!suffix) {
		return false;
	}
	// Label boundary: "*.example.com" never matches "example.com" itself.
	return host.length > suffix.length && host.endsWith(`.${suffix}`);
}

/**
 * Check if a host bypasses the proxy.
 *
 * Every rule is tested independently; any match bypasses.
 *
 * @param host - Destination host name (any case, trailing dot allowed)
 * @param bypass - Bypass patterns
 * @param excludeSimple - Bypass host names without a dot
 * @returns True if the host should be reached directly
 */
export function isBypassed(host: string, bypass: readonly string[], excludeSimple = false): boolean {
	const normalised = normaliseHost(host);

	const localListed = bypass.some((pattern) => pattern.trim().toLowerCase() === LOCAL_BYPASS_TOKEN);
	if ((excludeSimple || localListed) && isSimpleHostname(normalised)) {
		return true;
	}

	return bypass.some((pattern) => matchesBypassPattern(normalised, pattern));
}

/**
 * Extract the host from a URL, or use the value verbatim if it is not a URL.
 */
function hostOf(address: string): string {
	if (URL.canParse(address)) {
		const { hostname } = new URL(address);
		if (hostname) {
			return hostname;
		}
	}
	return address;
}

/**
 * Check if an address bypasses the proxy under a configuration.
 *
 * @param config - Proxy configuration
 * @param address - A URL or a bare host name
 * @returns True if the address should be reached directly
 */
export function shouldBypass(config: ProxyConfiguration, address: string | URL): boolean {
	const host = typeof address === "string" ? hostOf(address) : address.hostname;
	return isBypassed(host, config.bypass, config.excludeSimple);
}
