import type { Timeline } from "@timeline-agent/shared";

/**
 * Local timeline storage owned by the update poller.
 */
export interface TimelineStore {
	getTimelinePath(): string;
	getLocalTimelines(): Timeline[];
	setLocalTimeline(raw: string): void;
	timelineToString(timeline: Timeline): string;
}
