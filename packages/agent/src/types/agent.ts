import type { SurveyOutcome } from "./survey-reporter.js";

/**
 * Agent instance that runs the update poller and result relay.
 */
export interface Agent {
	start(): Promise<void>;
	stop(): Promise<void>;
	reportSurvey(): Promise<SurveyOutcome>;
}
