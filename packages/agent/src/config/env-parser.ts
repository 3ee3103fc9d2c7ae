/**
 * Environment variable parsing utilities for agent configuration.
 */

export function parseEnvNumber(key: string): number | undefined {
	const value = process.env[key];
	if (value === undefined) {
		return undefined;
	}
	const parsed = parseInt(value, 10);
	return isNaN(parsed) ? undefined : parsed;
}

/**
 * Accepts true/false, 1/0 and yes/no, case-insensitively; anything else is unset.
 */
export function parseEnvBoolean(key: string): boolean | undefined {
	const value = process.env[key]?.trim().toLowerCase();
	if (value === "true" || value === "1" || value === "yes") {
		return true;
	}
	if (value === "false" || value === "0" || value === "no") {
		return false;
	}
	return undefined;
}

export function parseEnvList(key: string): string[] | undefined {
	const value = process.env[key];
	if (value === undefined) {
		return undefined;
	}
	return value.split(",").map((item) => item.trim()).filter((item) => item.length > 0);
}

export interface ParsedEnv {
	agentName?: string;
	serverUrl?: string;
	updatesEnabled?: boolean;
	updatesUrl?: string;
	updatesCycleSleepMs?: number;
	resultsEnabled?: boolean;
	resultsUrl?: string;
	resultsCycleSleepMs?: number;
	resultsSecure?: boolean;
	surveyUrl?: string;
	surveySecure?: boolean;
	timelineUrl?: string;
	trustAllCertificates?: boolean;
	requestTimeoutMs?: number;
	jitterMs?: number;
	instanceDir?: string;
	logDir?: string;
	timelinesDir?: string;
	excludedLogFiles?: string[];
	envelopeSalt?: string;
}

export function parseEnvVars(): ParsedEnv {
	return {
		agentName: process.env.AGENT_NAME,
		serverUrl: process.env.SERVER_URL,
		updatesEnabled: parseEnvBoolean("UPDATES_ENABLED"),
		updatesUrl: process.env.UPDATES_URL,
		updatesCycleSleepMs: parseEnvNumber("UPDATES_CYCLE_SLEEP_MS"),
		resultsEnabled: parseEnvBoolean("RESULTS_ENABLED"),
		resultsUrl: process.env.RESULTS_URL,
		resultsCycleSleepMs: parseEnvNumber("RESULTS_CYCLE_SLEEP_MS"),
		resultsSecure: parseEnvBoolean("RESULTS_SECURE"),
		surveyUrl: process.env.SURVEY_URL,
		surveySecure: parseEnvBoolean("SURVEY_SECURE"),
		timelineUrl: process.env.TIMELINE_URL,
		trustAllCertificates: parseEnvBoolean("TRUST_ALL_CERTIFICATES"),
		requestTimeoutMs: parseEnvNumber("REQUEST_TIMEOUT_MS"),
		jitterMs: parseEnvNumber("JITTER_MS"),
		instanceDir: process.env.AGENT_INSTANCE_DIR,
		logDir: process.env.AGENT_LOG_DIR,
		timelinesDir: process.env.AGENT_TIMELINES_DIR,
		excludedLogFiles: parseEnvList("EXCLUDED_LOG_FILES"),
		envelopeSalt: process.env.ENVELOPE_SALT,
	};
}
