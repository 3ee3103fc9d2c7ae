// =============================================================================
// Timeline Model
// =============================================================================

/**
 * One instruction within a handler.
 * Fields beyond the ones listed here belong to the automation layer and are
 * carried through untouched.
 */
export interface TimelineEvent {
	/** Instruction for the handler, e.g. a URL or a shell command */
	Command?: string | null;
	/** Arguments for the instruction */
	CommandArgs?: unknown[] | null;
	/** Milliseconds to wait before running the event */
	DelayBefore?: number | null;
	/** Milliseconds to wait after running the event */
	DelayAfter?: number | null;
	/** Identifier the server uses to correlate activity records with this event */
	TrackableId?: string | null;
	[key: string]: unknown;
}

/**
 * One automation channel (a browser driver, a shell, ...) and its ordered events.
 */
export interface TimelineHandler {
	/** Handler kind, used to pick an executor */
	HandlerType: string;
	/** Ordered events for this handler */
	TimeLineEvents: TimelineEvent[];
	[key: string]: unknown;
}

/**
 * A named, identified sequence of handler configurations.
 */
export interface Timeline {
	/** Unique identifier of the timeline; partial timelines pushed for immediate execution may omit it */
	Id?: string;
	/** Ordered handlers */
	TimeLineHandlers: TimelineHandler[];
	[key: string]: unknown;
}

// =============================================================================
// Type Guards
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOptional(value: unknown, check: (v: unknown) => boolean): boolean {
	return value === undefined || value === null || check(value);
}

/**
 * Type guard to check if a value is a TimelineEvent
 */
export function isTimelineEvent(value: unknown): value is TimelineEvent {
	return isRecord(value)
		&& isOptional(value.Command, (v) => typeof v === "string")
		&& isOptional(value.CommandArgs, Array.isArray)
		&& isOptional(value.DelayBefore, (v) => typeof v === "number")
		&& isOptional(value.DelayAfter, (v) => typeof v === "number")
		&& isOptional(value.TrackableId, (v) => typeof v === "string");
}

/**
 * Type guard to check if a value is a TimelineHandler
 */
export function isTimelineHandler(value: unknown): value is TimelineHandler {
	return isRecord(value)
		&& typeof value.HandlerType === "string"
		&& Array.isArray(value.TimeLineEvents)
		&& value.TimeLineEvents.every(isTimelineEvent);
}

/**
 * Type guard to check if a value is a Timeline
 */
export function isTimeline(value: unknown): value is Timeline {
	return isRecord(value)
		&& (value.Id === undefined || typeof value.Id === "string")
		&& Array.isArray(value.TimeLineHandlers)
		&& value.TimeLineHandlers.every(isTimelineHandler);
}
