/**
 * Public type exports for @sysproxy/core.
 */

export {
	type ProxyScheme,
	type ProxyMap,
	type ProxyConfiguration,
	type ProxyConfigurationInput,
	PROXY_SCHEMES,
	LOCAL_BYPASS_TOKEN,
	createProxyConfiguration,
	isProxyScheme,
} from "./config.js";

export {
	type DetectionResult,
	type DetectionStatus,
	type ProxyDetector,
	type DetectionAttempt,
	type DetectionReport,
	found,
	notFound,
	failed,
} from "./detection.js";
