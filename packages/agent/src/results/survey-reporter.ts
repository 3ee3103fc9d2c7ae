import { SURVEY_JITTER_BASE_MS } from "@timeline-agent/shared";
import type {
	AgentConfig,
	Logger,
	ResultMachine,
	SurveyOutcome,
	SurveyReporter,
	TransportBuilder,
} from "../types/index.js";
import * as fs from "node:fs";
import { encodePayload } from "../envelope/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatError, jitter, sleep } from "../utils/index.js";

export type SurveyReporterOptions = Pick<AgentConfig, "surveyUrl" | "surveySecure" | "jitterMs" | "envelopeSalt">;

/**
 * Posts the survey file once and deletes it after the server accepts it.
 */
export class SurveyReporterImpl implements SurveyReporter {
	private readonly logger: Logger;

	constructor(
		private readonly options: SurveyReporterOptions,
		private readonly surveyPath: string,
		private readonly transportBuilder: TransportBuilder,
		private readonly createMachine: () => ResultMachine,
		logger?: Logger,
		private readonly random: () => number = Math.random,
	) {
		this.logger = logger ?? new LoggerImpl("survey");
	}

	async reportSurvey(signal?: AbortSignal): Promise<SurveyOutcome> {
		if (!fs.existsSync(this.surveyPath)) {
			this.logger.debug(`No survey at ${this.surveyPath}`);
			return "absent";
		}

		await sleep(jitter(SURVEY_JITTER_BASE_MS, this.options.jitterMs, this.random), signal);

		try {
			const survey: unknown = JSON.parse(fs.readFileSync(this.surveyPath, "utf-8"));
			const machine = this.createMachine();
			const key = { secret: machine.name, salt: this.options.envelopeSalt };
			const body = encodePayload(survey, key, this.options.surveySecure);
			await this.transportBuilder.build(machine).postJson(this.options.surveyUrl, body, signal);
			fs.rmSync(this.surveyPath, { force: true });
			this.logger.info("Survey posted");
			return "posted";
		} catch (err) {
			this.logger.error(`Survey post failed: ${formatError(err)}`);
			return "failed";
		}
	}
}
