import type { Timeline } from "@timeline-agent/shared";
import { isTimeline } from "@timeline-agent/shared";
import type { Logger, TimelineStore } from "../types/index.js";
import * as fs from "node:fs";
import * as path from "node:path";
import { LoggerImpl } from "../logger/index.js";
import { formatError } from "../utils/index.js";
import { writeFileAtomic } from "./atomic-write.js";

/**
 * File-backed timeline store.
 * The primary timeline file is replaced wholesale on Timeline updates; an optional
 * directory of extra timeline files is read alongside it.
 */
export class TimelineStoreImpl implements TimelineStore {
	private readonly logger: Logger;

	constructor(
		private readonly timelinePath: string,
		private readonly timelinesDir: string | null = null,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("timeline-store");
	}

	getTimelinePath(): string {
		return this.timelinePath;
	}

	getLocalTimelines(): Timeline[] {
		const timelines: Timeline[] = [];

		const primary = this.readTimeline(this.timelinePath);
		if (primary) {
			timelines.push(primary);
		}

		const dir = this.timelinesDir;
		if (dir && fs.existsSync(dir)) {
			const files = fs.readdirSync(dir)
				.filter((name) => name.endsWith(".json"))
				.sort()
				.map((name) => path.join(dir, name))
				.filter((file) => path.resolve(file) !== path.resolve(this.timelinePath));

			for (const file of files) {
				const timeline = this.readTimeline(file);
				if (timeline) {
					timelines.push(timeline);
				}
			}
		}

		return timelines;
	}

	setLocalTimeline(raw: string): void {
		writeFileAtomic(this.timelinePath, raw);
		this.logger.info(`Replaced local timeline at ${this.timelinePath}`);
	}

	timelineToString(timeline: Timeline): string {
		return JSON.stringify(timeline, null, 2);
	}

	private readTimeline(file: string): Timeline | null {
		if (!fs.existsSync(file)) {
			return null;
		}
		try {
			const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
			if (!isTimeline(parsed)) {
				this.logger.warn(`Ignoring ${file}: not a timeline`);
				return null;
			}
			return parsed;
		} catch (err) {
			this.logger.error(`Failed to read timeline ${file}: ${formatError(err)}`);
			return null;
		}
	}
}
