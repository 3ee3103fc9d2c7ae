/**
 * Shared constants for the agent package.
 */

/** Version reported in identity headers */
export const AGENT_VERSION = "0.1.0";

/** Default command server when none is configured */
export const DEFAULT_SERVER_URL = "http://localhost:5000";

/** Default directory for timeline, health and survey files */
export const DEFAULT_INSTANCE_DIR = ".agent-instance";

/** Default directory for result logs */
export const DEFAULT_LOG_DIR = ".agent-logs";

/** Default salt for envelope key derivation */
export const DEFAULT_ENVELOPE_SALT = "timeline-agent-envelope";
