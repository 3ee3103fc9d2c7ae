/**
 * One activity record appended to the primary result file.
 */
export interface ActivityRecord {
	handler: string;
	command: string;
	commandArgs: unknown[];
	trackableId: string | null;
	result: string;
}

/**
 * Producer side of the primary result file.
 */
export interface ActivityLog {
	getLogPath(): string;
	append(record: ActivityRecord): void;
}
