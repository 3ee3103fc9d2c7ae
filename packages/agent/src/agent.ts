import type {
	Agent,
	AgentConfig,
	Logger,
	ResultRelay,
	SurveyOutcome,
	SurveyReporter,
	TransportBuilder,
	UpdatePoller,
} from "./types/index.js";
import { AgentError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import { formatError } from "./utils/index.js";

/**
 * Runs the update poller and the result relay side by side until stopped.
 */
export class AgentImpl implements Agent {
	private readonly logger: Logger;
	private controller: AbortController | null = null;
	private loops: Promise<void> | null = null;
	private killTimeout: ReturnType<typeof setTimeout> | null = null;

	constructor(
		private readonly config: AgentConfig,
		private readonly poller: UpdatePoller,
		private readonly relay: ResultRelay,
		private readonly surveyReporter: SurveyReporter,
		private readonly transportBuilder: TransportBuilder,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("agent");
	}

	/**
	 * Start both loops and post the survey once.
	 * Resolves after `stop()` once both loops have exited.
	 */
	async start(): Promise<void> {
		if (this.controller) {
			throw new AgentError("Agent is already running", "AGENT_ALREADY_RUNNING");
		}

		const controller = new AbortController();
		this.controller = controller;
		this.logger.info(`Agent ${this.config.agentName} starting against ${this.config.serverUrl}`);

		if (this.config.killAfterSeconds !== null) {
			const seconds = this.config.killAfterSeconds;
			this.killTimeout = setTimeout(() => {
				this.logger.info(`Kill timeout reached after ${seconds} seconds`);
				this.stop().catch((err: unknown) => {
					this.logger.error(`Stop after kill timeout failed: ${formatError(err)}`);
				});
			}, seconds * 1000);
		}

		const loops = Promise.all([
			this.poller.run(controller.signal),
			this.relay.run(controller.signal),
		]).then(() => undefined);
		this.loops = loops;

		const outcome = await this.surveyReporter.reportSurvey(controller.signal);
		this.logger.debug(`Survey: ${outcome}`);

		await loops;
	}

	/**
	 * Abort both loops and wait for them and any running partial timelines to finish.
	 * The agent can be started again afterwards.
	 */
	async stop(): Promise<void> {
		if (this.killTimeout !== null) {
			clearTimeout(this.killTimeout);
			this.killTimeout = null;
		}

		const controller = this.controller;
		if (!controller || controller.signal.aborted) {
			return;
		}

		this.logger.info("Agent stopping");
		controller.abort();

		await this.loops;
		await this.poller.drain();
		await this.transportBuilder.close();
		this.loops = null;
		this.controller = null;
		this.logger.info("Agent stopped");
	}

	/**
	 * Post the survey on demand, outside the start-up trigger.
	 */
	reportSurvey(): Promise<SurveyOutcome> {
		return this.surveyReporter.reportSurvey(this.controller?.signal);
	}
}
