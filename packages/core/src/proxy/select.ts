/**
 * @title Proxy Selection Module
 * @description Pick the proxy address for a destination URL.
 *
 * @module proxy
 */

import type { ProxyConfiguration } from "../types/config.js";
import { isProxyScheme } from "../types/config.js";
import { isBypassed } from "./bypass.js";

/**
 * Parse a URL, returning undefined for invalid input.
 */
function parseUrl(url: string | URL): URL | undefined {
	if (url instanceof URL) {
		return url;
	}
	try {
		return new URL(url);
	} catch {
		return undefined;
	}
}

/**
 * Get the proxy address to use for a destination URL.
 *
 * The host is checked against the bypass rules first. Otherwise the
 * scheme-specific address is used, then the "*" address.
 *
 * @param config - Proxy configuration
 * @param url - Destination URL
 * @returns Proxy address exactly as configured, or undefined to connect directly
 *
 * @example
 * ```typescript
 * const config = createProxyConfiguration({
 *   proxies: { https: "proxy.corp:8443", "*": "proxy.corp:3128" },
 *   bypass: ["*.corp"],
 * });
 * select(config, "https://example.com/"); // "proxy.corp:8443"
 * select(config, "ftp://example.com/"); // "proxy.corp:3128"
 * select(config, "https://git.corp/"); // undefined
 * ```
 */
export function select(config: ProxyConfiguration, url: string | URL): string | undefined {
	const parsed = parseUrl(url);
	if (!parsed) {
		return undefined;
	}

	if (isBypassed(parsed.hostname, config.bypass, config.excludeSimple)) {
		return undefined;
	}

	const scheme = parsed.protocol.replace(/:$/, "").toLowerCase();
	if (isProxyScheme(scheme)) {
		const address = config.proxies[scheme];
		if (address !== undefined) {
			return address;
		}
	}

	return config.proxies["*"];
}
