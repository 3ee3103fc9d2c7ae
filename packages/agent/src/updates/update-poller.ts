import type { ServerUpdate, Timeline } from "@timeline-agent/shared";
import { UpdateDecodeError, decodeUpdate } from "@timeline-agent/shared";
import type {
	AgentConfig,
	HealthStore,
	HttpTransport,
	Logger,
	Orchestrator,
	ResultMachine,
	TimelineStore,
	TransportBuilder,
	UpdatePoller,
} from "../types/index.js";
import { randomUUID } from "node:crypto";
import { TransportError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatError, jitter, sleep } from "../utils/index.js";

export type UpdatePollerOptions = Pick<
	AgentConfig,
	"updatesEnabled" | "updatesUrl" | "updatesCycleSleepMs" | "timelineUrl" | "jitterMs"
>;

/**
 * Polls the updates endpoint and dispatches what the server sends.
 * No error escapes a cycle; the loop ends only when its signal is aborted.
 */
export class UpdatePollerImpl implements UpdatePoller {
	private readonly logger: Logger;
	private readonly inFlight = new Set<Promise<void>>();

	constructor(
		private readonly options: UpdatePollerOptions,
		private readonly transportBuilder: TransportBuilder,
		private readonly createMachine: () => ResultMachine,
		private readonly timelineStore: TimelineStore,
		private readonly healthStore: HealthStore,
		private readonly orchestrator: Orchestrator,
		logger?: Logger,
		private readonly random: () => number = Math.random,
		private readonly createTrackableId: () => string = randomUUID,
	) {
		this.logger = logger ?? new LoggerImpl("poller");
	}

	async run(signal: AbortSignal): Promise<void> {
		if (!this.options.updatesEnabled) {
			this.logger.info("Update polling disabled");
			return;
		}

		this.logger.info(`Polling ${this.options.updatesUrl} every ~${this.options.updatesCycleSleepMs}ms`);

		while (!signal.aborted) {
			await sleep(jitter(this.options.updatesCycleSleepMs, this.options.jitterMs, this.random), signal);
			if (signal.aborted) {
				break;
			}
			await this.runOneCycle(signal);
		}

		this.logger.info("Update polling stopped");
	}

	async runOneCycle(signal?: AbortSignal): Promise<void> {
		try {
			const transport = this.transportBuilder.build(this.createMachine());
			const body = await this.fetchUpdate(transport, signal);
			if (body === null) {
				return;
			}

			let update: ServerUpdate;
			try {
				update = decodeUpdate(body);
			} catch (err) {
				if (err instanceof UpdateDecodeError) {
					this.logger.error(`Discarding update: ${err.message}`);
					return;
				}
				throw err;
			}

			await this.dispatch(update, transport, signal);
		} catch (err) {
			this.logger.error(`Update cycle failed: ${formatError(err)}`);
		}
	}

	async drain(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all(this.inFlight);
		}
	}

	/**
	 * GET the updates endpoint.
	 * @returns the body, or null when there is nothing to dispatch
	 */
	private async fetchUpdate(transport: HttpTransport, signal?: AbortSignal): Promise<string | null> {
		try {
			const response = await transport.get(this.options.updatesUrl, signal);
			if (response.body.trim() === "") {
				return null;
			}
			return response.body;
		} catch (err) {
			if (!(err instanceof TransportError)) {
				throw err;
			}
			if (err.isNotFound()) {
				this.logger.debug("No update available");
			} else if (err.kind === "connection") {
				this.logger.warn(`Server at ${this.options.updatesUrl} is not responding: ${formatError(err)}`);
			} else if (err.kind === "aborted") {
				this.logger.debug("Update request cancelled");
			} else {
				this.logger.error(`Update request failed: ${err.message}`);
			}
			return null;
		}
	}

	private async dispatch(update: ServerUpdate, transport: HttpTransport, signal?: AbortSignal): Promise<void> {
		switch (update.kind) {
			case "RequestForTimeline":
				await this.sendTimelines(transport, update.timelineId, signal);
				return;

			case "Timeline":
				this.timelineStore.setLocalTimeline(update.raw);
				return;

			case "TimelinePartial":
				this.runPartial(update.timeline, signal);
				return;

			case "Health":
				this.healthStore.save(update.health);
				this.logger.info(`Saved health snapshot to ${this.healthStore.getHealthPath()}`);
				return;

			case "Unknown":
				this.logger.warn(`Ignoring update of unknown type: ${update.type}`);
				return;
		}
	}

	/**
	 * POST local timelines to the timeline endpoint, one request each.
	 * An id that matches nothing falls back to sending every timeline.
	 */
	private async sendTimelines(transport: HttpTransport, timelineId: string | null, signal?: AbortSignal): Promise<void> {
		const local = this.timelineStore.getLocalTimelines();
		let selected = local;

		if (timelineId !== null) {
			const wanted = timelineId.toLowerCase();
			const match = local.filter((timeline) => timeline.Id?.toLowerCase() === wanted);
			if (match.length > 0) {
				selected = match;
			} else {
				this.logger.warn(`No local timeline with id ${timelineId}, sending all ${local.length}`);
			}
		}

		for (const timeline of selected) {
			try {
				const payload = JSON.stringify(this.timelineStore.timelineToString(timeline));
				await transport.postJson(this.options.timelineUrl, payload, signal);
				this.logger.info(`Sent timeline ${timeline.Id ?? "(no id)"}`);
			} catch (err) {
				this.logger.error(`Failed to send timeline ${timeline.Id ?? "(no id)"}: ${formatError(err)}`);
			}
		}
	}

	/**
	 * Start every handler of a partial timeline without waiting for it.
	 * Events without a TrackableId get a fresh one first.
	 */
	private runPartial(timeline: Timeline, signal?: AbortSignal): void {
		for (const handler of timeline.TimeLineHandlers) {
			for (const event of handler.TimeLineEvents) {
				if (!event.TrackableId) {
					event.TrackableId = this.createTrackableId();
				}
			}

			const task = Promise.resolve()
				.then(() => this.orchestrator.runCommand(timeline, handler, signal))
				.catch((err: unknown) => {
					this.logger.error(`Handler ${handler.HandlerType} failed: ${formatError(err)}`);
				})
				.finally(() => {
					this.inFlight.delete(task);
				});
			this.inFlight.add(task);
		}
	}
}
