/**
 * Default configuration values for the agent.
 */

import {
	DEFAULT_JITTER_MS,
	DEFAULT_RESULTS_CYCLE_SLEEP_MS,
	DEFAULT_UPDATES_CYCLE_SLEEP_MS,
	ENDPOINT_PATHS,
	HTTP_REQUEST_TIMEOUT_MS,
	LOCAL_FILES,
} from "@timeline-agent/shared";
import type { AgentConfig } from "../types/index.js";
import * as os from "node:os";
import {
	DEFAULT_ENVELOPE_SALT,
	DEFAULT_INSTANCE_DIR,
	DEFAULT_LOG_DIR,
	DEFAULT_SERVER_URL,
} from "../constants.js";

/**
 * Join a server base URL and an endpoint path without doubling the slash.
 */
export function endpointUrl(serverUrl: string, endpointPath: string): string {
	return `${serverUrl.replace(/\/+$/, "")}${endpointPath}`;
}

export function getDefaultConfig(serverUrl: string = DEFAULT_SERVER_URL): AgentConfig {
	return {
		agentName: os.hostname(),
		serverUrl,
		updatesEnabled: true,
		updatesUrl: endpointUrl(serverUrl, ENDPOINT_PATHS.UPDATES),
		updatesCycleSleepMs: DEFAULT_UPDATES_CYCLE_SLEEP_MS,
		resultsEnabled: true,
		resultsUrl: endpointUrl(serverUrl, ENDPOINT_PATHS.RESULTS),
		resultsCycleSleepMs: DEFAULT_RESULTS_CYCLE_SLEEP_MS,
		resultsSecure: false,
		surveyUrl: endpointUrl(serverUrl, ENDPOINT_PATHS.SURVEY),
		surveySecure: false,
		timelineUrl: endpointUrl(serverUrl, ENDPOINT_PATHS.TIMELINE),
		trustAllCertificates: false,
		requestTimeoutMs: HTTP_REQUEST_TIMEOUT_MS,
		jitterMs: DEFAULT_JITTER_MS,
		instanceDir: DEFAULT_INSTANCE_DIR,
		logDir: DEFAULT_LOG_DIR,
		timelinesDir: null,
		excludedLogFiles: [LOCAL_FILES.APP_LOG],
		envelopeSalt: DEFAULT_ENVELOPE_SALT,
		killAfterSeconds: null,
	};
}
