/**
 * Proxy selection and dispatcher utilities.
 */

export { select } from "./select.js";
export { isBypassed, isSimpleHostname, matchesBypassPattern, normaliseHost, shouldBypass } from "./bypass.js";
export { getProxyDispatcher, toProxyUrl } from "./dispatcher.js";
