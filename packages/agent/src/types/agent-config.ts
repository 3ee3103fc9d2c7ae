/**
 * Agent configuration used throughout the agent lifecycle.
 * Values are populated from CLI arguments, environment variables, or defaults,
 * and handed to each component as an immutable snapshot.
 */
export interface AgentConfig {
	/** Opaque per-agent identity; sent as a header and used as the envelope key */
	readonly agentName: string;
	readonly serverUrl: string;

	readonly updatesEnabled: boolean;
	readonly updatesUrl: string;
	readonly updatesCycleSleepMs: number;

	readonly resultsEnabled: boolean;
	readonly resultsUrl: string;
	readonly resultsCycleSleepMs: number;
	readonly resultsSecure: boolean;

	readonly surveyUrl: string;
	readonly surveySecure: boolean;

	readonly timelineUrl: string;

	readonly trustAllCertificates: boolean;
	readonly requestTimeoutMs: number;
	/** Spread of the random offset applied to every cycle sleep */
	readonly jitterMs: number;

	/** Holds timeline, health and survey files */
	readonly instanceDir: string;
	/** Holds the primary result file and any overflow logs */
	readonly logDir: string;
	/** Optional directory of additional timeline files */
	readonly timelinesDir: string | null;
	/** Log file names in logDir that are never relayed */
	readonly excludedLogFiles: readonly string[];
	readonly envelopeSalt: string;

	readonly killAfterSeconds: number | null;
}
