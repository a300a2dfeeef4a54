/**
 * @title Detector Registry Module
 * @description Assemble the ordered, frozen list of detectors for a platform.
 *
 * Priority: environment, Linux sysconfig, Windows registry/WinHTTP, macOS
 * system configuration. Detectors for other platforms are not part of the
 * registry at all.
 *
 * @module detection
 */

import type { ProxyConfiguration } from "../types/config.js";
import type { ProxyDetector } from "../types/detection.js";
import { createEnvDetector } from "./env.js";
import { createSysconfigDetector } from "./sysconfig.js";
import { createWindowsDetector, type WindowsProxySource } from "./windows.js";
import { createMacosDetector, type MacosProxySource } from "./macos.js";
import { detect } from "./orchestrator.js";

/**
 * Options for building a detector registry.
 */
export interface DetectorRegistryOptions {
	/** Target platform (default: `process.platform`). */
	platform?: NodeJS.Platform;
	/** Include the environment variable detector (default: true). */
	env?: boolean;
	/** Include the sysconfig detector on Linux (default: true). */
	sysconfig?: boolean;
	/** Environment read by the environment detector (default: `process.env`). */
	environment?: NodeJS.ProcessEnv;
	/** Sysconfig file location (default: `/etc/sysconfig/proxy`). */
	sysconfigPath?: string;
	/** Windows settings source (default: `reg` and `netsh`). */
	windowsSource?: WindowsProxySource;
	/** macOS dictionary source (default: `scutil --proxy`). */
	macosSource?: MacosProxySource;
}

/**
 * Build the detector registry for a platform.
 *
 * @param options - Platform, toggles and source overrides
 * @returns Frozen list of detectors in priority order
 */
export function createDetectorRegistry(options: DetectorRegistryOptions = {}): readonly ProxyDetector[] {
	const { platform = process.platform, env = true, sysconfig = true } = options;
	const detectors: ProxyDetector[] = [];

	if (env) {
		detectors.push(createEnvDetector({ environment: options.environment }));
	}
	if (sysconfig && platform === "linux") {
		detectors.push(createSysconfigDetector({ path: options.sysconfigPath }));
	}
	if (platform === "win32") {
		detectors.push(createWindowsDetector(options.windowsSource));
	}
	if (platform === "darwin") {
		detectors.push(createMacosDetector(options.macosSource));
	}

	return Object.freeze(detectors);
}

/**
 * Detect the effective proxy configuration of this process.
 *
 * @param options - Registry options
 * @returns The configuration of the first source that has one, or undefined
 *
 * @example
 * ```typescript
 * const config = detectProxyConfig();
 * const proxy = config ? select(config, "https://example.com/") : undefined;
 * ```
 */
export function detectProxyConfig(options: DetectorRegistryOptions = {}): ProxyConfiguration | undefined {
	return detect(createDetectorRegistry(options));
}
