import type { UPDATE_TYPE } from "../constants.js";
import type { ResultHealth } from "./results.js";
import type { Timeline } from "./timeline.js";

/**
 * Update type carried in the `Type` field of a poll response.
 * - RequestForTimeline: server asks for the agent's local timelines
 * - Timeline: replace the local timeline wholesale
 * - TimelinePartial: run the enclosed handlers now, without storing them
 * - Health: latest health snapshot to persist
 */
export type UpdateType = (typeof UPDATE_TYPE)[keyof typeof UPDATE_TYPE];

/**
 * Response body for GET on the updates endpoint, as sent on the wire.
 * The shape of `Update` depends on `Type`.
 */
export interface UpdateEnvelope {
	Type: string;
	Update: unknown;
}

/**
 * Body of a RequestForTimeline update when the server wants one timeline only.
 */
export interface TimelineRequest {
	TimelineId?: string | null;
}

// =============================================================================
// Decoded Updates
// =============================================================================

/**
 * Server asks for local timelines; `timelineId` is null when it wants all of them.
 */
export interface RequestForTimelineUpdate {
	kind: "RequestForTimeline";
	timelineId: string | null;
}

/**
 * Replacement content for the local timeline file, already serialized.
 */
export interface TimelineUpdate {
	kind: "Timeline";
	raw: string;
}

/**
 * Handlers to run immediately.
 */
export interface TimelinePartialUpdate {
	kind: "TimelinePartial";
	timeline: Timeline;
}

/**
 * Health snapshot to persist.
 */
export interface HealthUpdate {
	kind: "Health";
	health: ResultHealth;
}

/**
 * Update whose type this agent has no handler for.
 */
export interface UnknownUpdate {
	kind: "Unknown";
	type: string;
}

/**
 * Decoded poll response. Discriminate on `kind`.
 */
export type ServerUpdate =
	| RequestForTimelineUpdate
	| TimelineUpdate
	| TimelinePartialUpdate
	| HealthUpdate
	| UnknownUpdate;
