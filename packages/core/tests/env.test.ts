import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createEnvDetector, parseEnvProxyConfig, readEnvVariable } from "../src/detection/env.js";
import type { DetectionResult } from "../src/types/detection.js";
import type { ProxyConfiguration } from "../src/types/config.js";

function expectFound(result: DetectionResult): ProxyConfiguration {
	if (result.status !== "found") {
		throw new Error(`Expected a configuration but got "${result.status}"`);
	}
	return result.config;
}

describe("readEnvVariable", () => {
	it("prefers the uppercase name over the lowercase one", () => {
		const env = { HTTP_PROXY: "upper.example.com:8080", http_proxy: "lower.example.com:8080" };

		expect(readEnvVariable(env, "HTTP_PROXY")).toBe("upper.example.com:8080");
	});

	it("falls back to the lowercase name", () => {
		expect(readEnvVariable({ http_proxy: "lower.example.com:8080" }, "HTTP_PROXY")).toBe(
			"lower.example.com:8080",
		);
	});

	it("matches names in any case", () => {
		expect(readEnvVariable({ Http_Proxy: "mixed.example.com:8080" }, "HTTP_PROXY")).toBe("mixed.example.com:8080");
		expect(readEnvVariable({ hTTPS_pROXY: "mixed.example.com:8443" }, "https_proxy")).toBe(
			"mixed.example.com:8443",
		);
	});

	it("prefers the uppercase and lowercase names over other spellings", () => {
		const env = { Http_Proxy: "mixed.example.com:8080", http_proxy: "lower.example.com:8080" };

		expect(readEnvVariable(env, "HTTP_PROXY")).toBe("lower.example.com:8080");
		expect(readEnvVariable({ ...env, HTTP_PROXY: "upper.example.com:8080" }, "HTTP_PROXY")).toBe(
			"upper.example.com:8080",
		);
	});

	it("skips empty values", () => {
		const env = { HTTP_PROXY: "  ", http_proxy: "lower.example.com:8080" };

		expect(readEnvVariable(env, "HTTP_PROXY")).toBe("lower.example.com:8080");
		expect(readEnvVariable({ HTTP_PROXY: "" }, "HTTP_PROXY")).toBeUndefined();
	});
});

describe("parseEnvProxyConfig", () => {
	it("returns not-found when no proxy variable is set", () => {
		expect(parseEnvProxyConfig({ NO_PROXY: "localhost" })).toEqual({ status: "not-found" });
	});

	it("reads a proxy per scheme", () => {
		const config = expectFound(
			parseEnvProxyConfig({
				HTTP_PROXY: "127.0.0.1",
				https_proxy: "secure.example.com:8443",
				FTP_PROXY: "http://ftp-proxy.example.com",
			}),
		);

		expect(config.proxies).toEqual({
			http: "127.0.0.1",
			https: "secure.example.com:8443",
			ftp: "http://ftp-proxy.example.com",
		});
		expect(config.excludeSimple).toBe(false);
	});

	it("uses ALL_PROXY as the wildcard when no scheme is set", () => {
		const config = expectFound(parseEnvProxyConfig({ all_proxy: "any.example.com:3128" }));

		expect(config.proxies).toEqual({ "*": "any.example.com:3128" });
	});

	it("ignores ALL_PROXY when a scheme-specific proxy exists", () => {
		const config = expectFound(
			parseEnvProxyConfig({ HTTPS_PROXY: "secure.example.com:8443", ALL_PROXY: "any.example.com:3128" }),
		);

		expect(config.proxies).toEqual({ https: "secure.example.com:8443" });
	});

	it("splits NO_PROXY on commas and semicolons", () => {
		const config = expectFound(
			parseEnvProxyConfig({
				HTTP_PROXY: "proxy.example.com:8080",
				NO_PROXY: "google.com, 192.168.0.1;localhost ;; .internal.corp,",
			}),
		);

		expect(config.bypass).toEqual(["google.com", "192.168.0.1", "localhost", ".internal.corp"]);
	});

	it("reads mixed-case variable names", () => {
		const config = expectFound(
			parseEnvProxyConfig({ Http_Proxy: "proxy.example.com:8080", No_Proxy: "localhost,.internal" }),
		);

		expect(config.proxies).toEqual({ http: "proxy.example.com:8080" });
		expect(config.bypass).toEqual(["localhost", ".internal"]);
	});

	it("reads no_proxy (lowercase)", () => {
		const config = expectFound(
			parseEnvProxyConfig({ HTTP_PROXY: "proxy.example.com:8080", no_proxy: "localhost" }),
		);

		expect(config.bypass).toEqual(["localhost"]);
	});
});

describe("createEnvDetector", () => {
	const originalEnv = process.env;

	beforeEach(() => {
		process.env = { ...originalEnv };
		for (const name of ["HTTP_PROXY", "HTTPS_PROXY", "FTP_PROXY", "ALL_PROXY", "NO_PROXY"]) {
			delete process.env[name];
			delete process.env[name.toLowerCase()];
		}
	});

	afterEach(() => {
		process.env = originalEnv;
	});

	it("reads process.env by default", () => {
		process.env["HTTPS_PROXY"] = "env-proxy.example.com:8443";

		const config = expectFound(createEnvDetector().getProxyConfig());

		expect(config.proxies).toEqual({ https: "env-proxy.example.com:8443" });
	});

	it("reads an injected environment", () => {
		process.env["HTTPS_PROXY"] = "env-proxy.example.com:8443";

		const detector = createEnvDetector({ environment: {} });

		expect(detector.name).toBe("env");
		expect(detector.getProxyConfig()).toEqual({ status: "not-found" });
	});
});
