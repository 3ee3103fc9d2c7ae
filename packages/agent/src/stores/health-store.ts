import type { ResultHealth } from "@timeline-agent/shared";
import type { HealthStore, Logger } from "../types/index.js";
import * as fs from "node:fs";
import { LoggerImpl } from "../logger/index.js";
import { formatError } from "../utils/index.js";
import { writeFileAtomic } from "./atomic-write.js";

/**
 * Health snapshot persisted as indented JSON, overwritten on each update.
 */
export class HealthStoreImpl implements HealthStore {
	private readonly logger: Logger;

	constructor(
		private readonly healthPath: string,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("health-store");
	}

	getHealthPath(): string {
		return this.healthPath;
	}

	load(): ResultHealth | null {
		try {
			if (!fs.existsSync(this.healthPath)) {
				return null;
			}
			const parsed: unknown = JSON.parse(fs.readFileSync(this.healthPath, "utf-8"));
			if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
				this.logger.warn(`Ignoring ${this.healthPath}: not an object`);
				return null;
			}
			return { ...parsed };
		} catch (err) {
			this.logger.error(`Failed to load health snapshot: ${formatError(err)}`);
			return null;
		}
	}

	save(health: ResultHealth): void {
		writeFileAtomic(this.healthPath, JSON.stringify(health, null, 2));
		this.logger.debug(`Saved health snapshot to ${this.healthPath}`);
	}
}
