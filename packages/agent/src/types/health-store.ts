import type { ResultHealth } from "@timeline-agent/shared";

/**
 * Local health snapshot storage, overwritten on every Health update.
 */
export interface HealthStore {
	getHealthPath(): string;
	load(): ResultHealth | null;
	save(health: ResultHealth): void;
}
