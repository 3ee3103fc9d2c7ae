import type { TimelineEvent, TimelineHandler } from "@timeline-agent/shared";

/**
 * Context provided to executors while a handler runs.
 */
export interface HandlerExecutorContext {
	/** The handler the event belongs to. */
	handler: TimelineHandler;
	/** Aborted when the agent shuts down. */
	signal?: AbortSignal;
}

/**
 * Interface for handler executors.
 * Each HandlerType has its own executor implementation.
 */
export interface HandlerExecutor {
	/**
	 * Run one event and describe what happened.
	 * @returns A short result recorded in the activity log.
	 */
	execute(event: TimelineEvent, context: HandlerExecutorContext): Promise<string>;
}
