import type { Timeline, TimelineHandler } from "@timeline-agent/shared";

/**
 * Runs timeline handlers pushed for immediate execution.
 */
export interface Orchestrator {
	runCommand(timeline: Timeline, handler: TimelineHandler, signal?: AbortSignal): Promise<void>;
}
