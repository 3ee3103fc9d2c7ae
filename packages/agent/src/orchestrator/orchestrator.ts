import type { Timeline, TimelineEvent, TimelineHandler } from "@timeline-agent/shared";
import type { ActivityLog, HandlerExecutor, Logger, Orchestrator } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatError, sleep } from "../utils/index.js";

/**
 * Map of HandlerType to the executor that runs its events.
 */
export type ExecutorRegistry = Map<string, HandlerExecutor>;

/**
 * Runs a handler's events in order through the executor registered for its type,
 * recording each one in the activity log.
 */
export class OrchestratorImpl implements Orchestrator {
	private readonly logger: Logger;

	constructor(
		private readonly executorRegistry: ExecutorRegistry,
		private readonly activityLog: ActivityLog,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("orchestrator");
	}

	async runCommand(timeline: Timeline, handler: TimelineHandler, signal?: AbortSignal): Promise<void> {
		const executor = this.executorRegistry.get(handler.HandlerType);
		if (!executor) {
			this.logger.warn(`No executor registered for handler type: ${handler.HandlerType}`);
			return;
		}

		this.logger.info(
			`Running ${handler.TimeLineEvents.length} event(s) for ${handler.HandlerType} (timeline=${timeline.Id ?? "partial"})`,
		);

		for (const event of handler.TimeLineEvents) {
			if (signal?.aborted) {
				this.logger.info(`Stopping ${handler.HandlerType}: agent is shutting down`);
				return;
			}

			await sleep(event.DelayBefore ?? 0, signal);
			const result = await this.executeEvent(executor, handler, event, signal);

			this.activityLog.append({
				handler: handler.HandlerType,
				command: event.Command ?? "",
				commandArgs: event.CommandArgs ?? [],
				trackableId: event.TrackableId ?? null,
				result,
			});

			await sleep(event.DelayAfter ?? 0, signal);
		}
	}

	private async executeEvent(
		executor: HandlerExecutor,
		handler: TimelineHandler,
		event: TimelineEvent,
		signal?: AbortSignal,
	): Promise<string> {
		try {
			return await executor.execute(event, { handler, signal });
		} catch (err) {
			this.logger.warn(`${handler.HandlerType} event ${event.TrackableId ?? "(untracked)"} failed: ${formatError(err)}`);
			return `error: ${formatError(err)}`;
		}
	}
}
