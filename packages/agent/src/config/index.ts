/**
 * Agent configuration module.
 *
 * Load agent configuration from CLI arguments, environment variables, and defaults.
 * Priority: CLI > Environment > Defaults
 */

import type { AgentConfig } from "../types/index.js";
import { parseCliArgs } from "./cli-parser.js";
import { getDefaultConfig } from "./defaults.js";
import { parseEnvVars } from "./env-parser.js";

export { parseCliArgs, type ParsedArgs } from "./cli-parser.js";
export { endpointUrl, getDefaultConfig } from "./defaults.js";
export { parseEnvBoolean, parseEnvList, parseEnvNumber, parseEnvVars } from "./env-parser.js";
export { resolvePaths, type AgentPaths } from "./paths.js";

/**
 * Load agent configuration from CLI arguments, environment variables, and defaults.
 * Endpoint URLs not set explicitly are derived from the resolved server URL.
 * The result is frozen.
 */
export function loadConfig(args: string[]): AgentConfig {
	const cli = parseCliArgs(args);
	const env = parseEnvVars();
	const serverUrl = cli.serverUrl ?? env.serverUrl;
	const defaults = getDefaultConfig(serverUrl);

	return Object.freeze({
		agentName: cli.agentName ?? env.agentName ?? defaults.agentName,
		serverUrl: defaults.serverUrl,
		updatesEnabled: cli.updatesEnabled ?? env.updatesEnabled ?? defaults.updatesEnabled,
		updatesUrl: cli.updatesUrl ?? env.updatesUrl ?? defaults.updatesUrl,
		updatesCycleSleepMs: cli.updatesCycleSleepMs ?? env.updatesCycleSleepMs ?? defaults.updatesCycleSleepMs,
		resultsEnabled: cli.resultsEnabled ?? env.resultsEnabled ?? defaults.resultsEnabled,
		resultsUrl: cli.resultsUrl ?? env.resultsUrl ?? defaults.resultsUrl,
		resultsCycleSleepMs: cli.resultsCycleSleepMs ?? env.resultsCycleSleepMs ?? defaults.resultsCycleSleepMs,
		resultsSecure: cli.resultsSecure ?? env.resultsSecure ?? defaults.resultsSecure,
		surveyUrl: cli.surveyUrl ?? env.surveyUrl ?? defaults.surveyUrl,
		surveySecure: cli.surveySecure ?? env.surveySecure ?? defaults.surveySecure,
		timelineUrl: cli.timelineUrl ?? env.timelineUrl ?? defaults.timelineUrl,
		trustAllCertificates: cli.trustAllCertificates ?? env.trustAllCertificates ?? defaults.trustAllCertificates,
		requestTimeoutMs: cli.requestTimeoutMs ?? env.requestTimeoutMs ?? defaults.requestTimeoutMs,
		jitterMs: cli.jitterMs ?? env.jitterMs ?? defaults.jitterMs,
		instanceDir: cli.instanceDir ?? env.instanceDir ?? defaults.instanceDir,
		logDir: cli.logDir ?? env.logDir ?? defaults.logDir,
		timelinesDir: cli.timelinesDir ?? env.timelinesDir ?? defaults.timelinesDir,
		excludedLogFiles: Object.freeze(env.excludedLogFiles ?? defaults.excludedLogFiles),
		envelopeSalt: env.envelopeSalt ?? defaults.envelopeSalt,
		killAfterSeconds: cli.killAfterSeconds ?? defaults.killAfterSeconds,
	});
}
