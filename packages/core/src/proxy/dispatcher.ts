/**
 * @title Proxy Dispatcher Module
 * @description undici dispatchers for the proxy a URL resolves to.
 *
 * Pass the result to undici's `fetch` (or any undici request API) as its
 * `dispatcher` option. Creating a dispatcher opens no connection.
 *
 * @module proxy
 *
 * @example
 * ```typescript
 * import { fetch } from "undici";
 *
 * const dispatcher = getProxyDispatcher(config, url);
 * try {
 *   const response = await fetch(url, { dispatcher });
 * } finally {
 *   await dispatcher?.close();
 * }
 * ```
 */

import { ProxyAgent } from "undici";
import type { ProxyConfiguration } from "../types/config.js";
import { select } from "./select.js";

/**
 * Turn a configured proxy address into a proxy URL.
 *
 * Addresses are usually bare `host:port`; those are assumed to speak HTTP.
 *
 * @param address - Proxy address as stored in a configuration
 * @returns Proxy URL with a scheme
 */
export function toProxyUrl(address: string): string {
	return /^[a-z][a-z0-9+.-]*:\/\//i.test(address) ? address : `http://${address}`;
}

/**
 * Get an undici dispatcher for a destination URL.
 *
 * Every call creates a new agent; the caller owns it and should `close()` it
 * once its requests are done.
 *
 * @param config - Proxy configuration
 * @param url - Destination URL
 * @returns A ProxyAgent for the selected proxy, or undefined when the request goes direct
 */
export function getProxyDispatcher(config: ProxyConfiguration, url: string | URL): ProxyAgent | undefined {
	const address = select(config, url);
	if (address === undefined) {
		return undefined;
	}
	return new ProxyAgent(toProxyUrl(address));
}
