/**
 * Outcome of one survey post.
 * - absent: no survey file to post
 * - posted: delivered and deleted
 * - failed: left in place for the next trigger
 */
export type SurveyOutcome = "absent" | "posted" | "failed";

/**
 * One-shot survey upload.
 */
export interface SurveyReporter {
	reportSurvey(signal?: AbortSignal): Promise<SurveyOutcome>;
}
