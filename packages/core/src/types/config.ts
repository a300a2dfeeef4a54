/**
 * @title Proxy Configuration Types Module
 * @description The resolved proxy configuration produced by a detector.
 *
 * A configuration always comes from exactly one detector and is frozen once
 * built, so it can be shared between callers without copying.
 *
 * @module types
 */

import { InvalidProxyConfigError } from "../errors.js";

/** Scheme tokens a configuration may carry an address for; "*" is the catch-all. */
export const PROXY_SCHEMES = ["http", "https", "ftp", "*"] as const;

/**
 * Scheme token used as a key in {@link ProxyConfiguration.proxies}.
 */
export type ProxyScheme = (typeof PROXY_SCHEMES)[number];

/**
 * Scheme to proxy address (`host[:port]`, optionally with a URL scheme) mapping.
 */
export type ProxyMap = Readonly<Partial<Record<ProxyScheme, string>>>;

/** Bypass token matching every host name without a dot. */
export const LOCAL_BYPASS_TOKEN = "<local>";

/**
 * Resolved proxy configuration.
 */
export interface ProxyConfiguration {
	/** Proxy address per scheme, keys lowercase. */
	readonly proxies: ProxyMap;
	/** Bypass patterns: exact host, `*.suffix`, `.suffix` or `<local>`. */
	readonly bypass: readonly string[];
	/** Bypass every host name without a dot. */
	readonly excludeSimple: boolean;
}

/**
 * Unvalidated input for {@link createProxyConfiguration}.
 */
export interface ProxyConfigurationInput {
	/** Scheme to address mapping; keys are matched case-insensitively. */
	proxies?: Record<string, string>;
	/** Bypass patterns in source order. */
	bypass?: Iterable<string>;
	/** Bypass every host name without a dot (default: false). */
	excludeSimple?: boolean;
}

/**
 * Check if a string is a supported scheme token.
 */
export function isProxyScheme(value: string): value is ProxyScheme {
	return (PROXY_SCHEMES as readonly string[]).includes(value);
}

/**
 * Build a frozen proxy configuration.
 *
 * Scheme keys are lowercased and addresses trimmed. Bypass entries are trimmed,
 * empty entries dropped and duplicates removed (first occurrence kept).
 *
 * @param input - Raw configuration values
 * @returns Frozen configuration
 * @throws InvalidProxyConfigError for unknown schemes, duplicate schemes or empty addresses
 */
export function createProxyConfiguration(input: ProxyConfigurationInput = {}): ProxyConfiguration {
	const proxies: Partial<Record<ProxyScheme, string>> = {};

	for (const [key, value] of Object.entries(input.proxies ?? {})) {
		const scheme = key.trim().toLowerCase();
		if (!isProxyScheme(scheme)) {
			throw new InvalidProxyConfigError(`Unsupported proxy scheme "${key}"`);
		}
		if (proxies[scheme] !== undefined) {
			throw new InvalidProxyConfigError(`Duplicate proxy address for scheme "${scheme}"`);
		}
		const address = value.trim();
		if (address.length === 0) {
			throw new InvalidProxyConfigError(`Empty proxy address for scheme "${scheme}"`);
		}
		proxies[scheme] = address;
	}

	const bypass: string[] = [];
	for (const entry of input.bypass ?? []) {
		const pattern = entry.trim();
		if (pattern.length > 0 && !bypass.includes(pattern)) {
			bypass.push(pattern);
		}
	}

	return Object.freeze({
		proxies: Object.freeze(proxies),
		bypass: Object.freeze(bypass),
		excludeSimple: input.excludeSimple ?? false,
	});
}
