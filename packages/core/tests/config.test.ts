import { describe, it, expect } from "vitest";
import { createProxyConfiguration, isProxyScheme } from "../src/types/config.js";
import { InvalidProxyConfigError } from "../src/errors.js";

describe("createProxyConfiguration", () => {
	it("returns an empty configuration by default", () => {
		const config = createProxyConfiguration();

		expect(config.proxies).toEqual({});
		expect(config.bypass).toEqual([]);
		expect(config.excludeSimple).toBe(false);
	});

	it("lowercases scheme keys and trims addresses", () => {
		const config = createProxyConfiguration({
			proxies: { HTTP: " proxy.local:3128 ", Https: "secure.local:8443", "*": "any.local:80" },
		});

		expect(config.proxies).toEqual({
			http: "proxy.local:3128",
			https: "secure.local:8443",
			"*": "any.local:80",
		});
	});

	it("rejects unsupported schemes", () => {
		expect(() => createProxyConfiguration({ proxies: { socks: "socks.local:1080" } })).toThrow(
			InvalidProxyConfigError,
		);
	});

	it("rejects empty addresses", () => {
		expect(() => createProxyConfiguration({ proxies: { http: "   " } })).toThrow(
			'Empty proxy address for scheme "http"',
		);
	});

	it("rejects the same scheme given twice in different case", () => {
		expect(() => createProxyConfiguration({ proxies: { http: "a:1", HTTP: "b:2" } })).toThrow(
			'Duplicate proxy address for scheme "http"',
		);
	});

	it("trims bypass entries, drops empty ones and removes duplicates in order", () => {
		const config = createProxyConfiguration({
			bypass: [" localhost ", "", ".internal", "localhost", "  "],
		});

		expect(config.bypass).toEqual(["localhost", ".internal"]);
	});

	it("accepts any iterable of bypass entries", () => {
		const config = createProxyConfiguration({ bypass: new Set(["a.example", "b.example"]) });

		expect(config.bypass).toEqual(["a.example", "b.example"]);
	});

	it("freezes the configuration and its members", () => {
		const config = createProxyConfiguration({
			proxies: { http: "proxy.local:3128" },
			bypass: ["localhost"],
			excludeSimple: true,
		});

		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(config.proxies)).toBe(true);
		expect(Object.isFrozen(config.bypass)).toBe(true);
		expect(config.excludeSimple).toBe(true);
	});
});

describe("isProxyScheme", () => {
	it("accepts the supported scheme tokens only", () => {
		expect(isProxyScheme("http")).toBe(true);
		expect(isProxyScheme("https")).toBe(true);
		expect(isProxyScheme("ftp")).toBe(true);
		expect(isProxyScheme("*")).toBe(true);
		expect(isProxyScheme("HTTP")).toBe(false);
		expect(isProxyScheme("socks")).toBe(false);
	});
});
