/**
 * Proxy detectors, registry and orchestrator.
 */

export { detect, detectWithReport } from "./orchestrator.js";
export { createDetectorRegistry, detectProxyConfig, type DetectorRegistryOptions } from "./registry.js";
export {
	ENV_DETECTOR,
	createEnvDetector,
	parseEnvProxyConfig,
	readEnvVariable,
	type EnvDetectorOptions,
} from "./env.js";
export {
	SYSCONFIG_DETECTOR,
	DEFAULT_SYSCONFIG_PATH,
	createSysconfigDetector,
	parseKeyValuePairs,
	parseSysconfigProxy,
	type SysconfigDetectorOptions,
} from "./sysconfig.js";
export {
	WINDOWS_DETECTOR,
	INTERNET_SETTINGS_KEY,
	commandLineWindowsSource,
	createCommandLineWindowsSource,
	createWindowsDetector,
	parseProxyServer,
	parseRegQueryOutput,
	parseWinHttpOutput,
	resolveWindowsProxy,
	type CommandRunner,
	type RegistryValue,
	type WinHttpProxySettings,
	type WindowsProxySource,
} from "./windows.js";
export {
	MACOS_DETECTOR,
	createMacosDetector,
	parseScutilOutput,
	proxyConfigFromDictionary,
	scutilMacosSource,
	type DynamicStoreDictionary,
	type DynamicStoreValue,
	type MacosProxySource,
} from "./macos.js";
