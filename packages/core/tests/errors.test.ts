import { describe, it, expect } from "vitest";
import {
	SysProxyError,
	DetectionFailedError,
	ConfigParseError,
	InvalidProxyConfigError,
	getErrorMessage,
} from "../src/errors.js";

describe("SysProxyError", () => {
	it("creates error with message and code", () => {
		const error = new SysProxyError("Test message", "TEST_CODE");

		expect(error.message).toBe("Test message");
		expect(error.code).toBe("TEST_CODE");
		expect(error.name).toBe("SysProxyError");
		expect(error.suggestion).toBeUndefined();
	});

	it("formats error without suggestion", () => {
		expect(new SysProxyError("Test message", "CODE").format()).toBe("SysProxyError: Test message");
	});

	it("formats error with suggestion", () => {
		const error = new SysProxyError("Test message", "CODE", { suggestion: "Try this" });

		expect(error.format()).toBe("SysProxyError: Test message\n  Suggestion: Try this");
	});

	it("keeps the cause", () => {
		const cause = new Error("root cause");

		expect(new SysProxyError("Test", "CODE", { cause }).cause).toBe(cause);
	});

	it("is instanceof Error", () => {
		expect(new SysProxyError("Test", "CODE")).toBeInstanceOf(Error);
	});
});

describe("DetectionFailedError", () => {
	it("records the failing detector", () => {
		const error = new DetectionFailedError("Failed to read /etc/sysconfig/proxy", { source: "sysconfig" });

		expect(error.name).toBe("DetectionFailedError");
		expect(error.code).toBe("DETECTION_FAILED");
		expect(error.source).toBe("sysconfig");
		expect(error).toBeInstanceOf(SysProxyError);
	});
});

describe("ConfigParseError", () => {
	it("points the suggestion at the offending line", () => {
		const error = new ConfigParseError("bad line", {
			source: "sysconfig",
			sourcePath: "/etc/sysconfig/proxy",
			line: 3,
		});

		expect(error.name).toBe("ConfigParseError");
		expect(error.code).toBe("PARSE_ERROR");
		expect(error.line).toBe(3);
		expect(error.format()).toBe(
			"ConfigParseError: bad line\n  Suggestion: Check the proxy settings in /etc/sysconfig/proxy:3",
		);
		expect(error).toBeInstanceOf(DetectionFailedError);
	});

	it("omits the line when unknown", () => {
		const error = new ConfigParseError("bad value", { source: "windows", sourcePath: "WinHTTP" });

		expect(error.suggestion).toBe("Check the proxy settings in WinHTTP");
	});

	it("has no suggestion without a location", () => {
		expect(new ConfigParseError("bad value", { source: "macos" }).suggestion).toBeUndefined();
	});
});

describe("InvalidProxyConfigError", () => {
	it("creates error with correct name and code", () => {
		const error = new InvalidProxyConfigError('Unsupported proxy scheme "socks"');

		expect(error.name).toBe("InvalidProxyConfigError");
		expect(error.code).toBe("INVALID_CONFIG");
		expect(error).toBeInstanceOf(SysProxyError);
	});
});

describe("getErrorMessage", () => {
	it("reads messages from errors and stringifies other values", () => {
		expect(getErrorMessage(new Error("Test"))).toBe("Test");
		expect(getErrorMessage("plain")).toBe("plain");
		expect(getErrorMessage(42)).toBe("42");
	});
});
