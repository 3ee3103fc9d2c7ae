import { TIMELINE_RECORD_PREFIX } from "@timeline-agent/shared";
import type { ActivityLog, ActivityRecord } from "../types/index.js";
import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Appends activity records to the primary result file, one line each:
 * `TIMELINE|<ISO time>|<json>`.
 * Appends only; the result relay is free to truncate the file between writes.
 */
export class ActivityLogImpl implements ActivityLog {
	constructor(
		private readonly logPath: string,
		private readonly now: () => Date = () => new Date(),
	) {}

	getLogPath(): string {
		return this.logPath;
	}

	append(record: ActivityRecord): void {
		fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
		const line = `${TIMELINE_RECORD_PREFIX}|${this.now().toISOString()}|${JSON.stringify(record)}\n`;
		fs.appendFileSync(this.logPath, line, "utf-8");
	}
}
