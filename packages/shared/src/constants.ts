/**
 * Shared protocol constants for the agent and anything speaking its wire format.
 *
 * Constants are organized into domain-specific groups for easier discovery.
 */

// =============================================================================
// Update Types
// =============================================================================

/**
 * Update type values carried in the `Type` field of a poll response.
 * Use these constants instead of string literals for type safety.
 */
export const UPDATE_TYPE = {
	REQUEST_FOR_TIMELINE: "RequestForTimeline",
	TIMELINE: "Timeline",
	TIMELINE_PARTIAL: "TimelinePartial",
	HEALTH: "Health",
} as const;

// =============================================================================
// Endpoint Paths
// =============================================================================

/**
 * Default endpoint paths, relative to the configured server URL.
 */
export const ENDPOINT_PATHS = {
	/** GET: poll for updates */
	UPDATES: "/api/clientupdates",
	/** POST: activity log batches */
	RESULTS: "/api/clientresults",
	/** POST: survey artifacts */
	SURVEY: "/api/clientsurvey",
	/** POST: local timelines requested by the server */
	TIMELINE: "/api/clienttimeline",
} as const;

// =============================================================================
// HTTP Constraints
// =============================================================================

/** Default timeout for a single request to the command server in milliseconds */
export const HTTP_REQUEST_TIMEOUT_MS = 30_000;
/** Maximum body size kept by the built-in HTTP handler, in characters */
export const HTTP_BODY_MAX_CHARS = 10_240;

// =============================================================================
// Cycle Timing
// =============================================================================

/** Default base sleep between poll cycles in milliseconds */
export const DEFAULT_UPDATES_CYCLE_SLEEP_MS = 60_000;
/** Default base sleep between relay cycles in milliseconds */
export const DEFAULT_RESULTS_CYCLE_SLEEP_MS = 60_000;
/** Default spread of the random offset applied to every cycle sleep */
export const DEFAULT_JITTER_MS = 999;
/** Base sleep before a one-shot survey post */
export const SURVEY_JITTER_BASE_MS = 100;

// =============================================================================
// Local Files
// =============================================================================

/**
 * File names the agent reads and writes, relative to its instance and log directories.
 */
export const LOCAL_FILES = {
	/** Primary result file; producers append, the relay rotates */
	RESULTS_LOG: "clientupdates.log",
	/** The agent's own application log, never relayed */
	APP_LOG: "app.log",
	TIMELINE: "timeline.json",
	HEALTH: "health.json",
	SURVEY: "survey.json",
} as const;

/** Extension given to the private copy taken during a rotation */
export const ROTATION_TEMP_EXTENSION = ".proc";

/** Line prefix for activity records written to the primary result file */
export const TIMELINE_RECORD_PREFIX = "TIMELINE";
