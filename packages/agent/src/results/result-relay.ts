import type { AgentConfig, Logger, LogRotator, ResultRelay } from "../types/index.js";
import * as fs from "node:fs";
import * as path from "node:path";
import { LoggerImpl } from "../logger/index.js";
import { formatError, jitter, sleep } from "../utils/index.js";

export type ResultRelayOptions = Pick<
	AgentConfig,
	"resultsEnabled" | "resultsCycleSleepMs" | "jitterMs" | "excludedLogFiles"
>;

interface ResultFile {
	filePath: string;
	deletable: boolean;
}

/**
 * Periodically drains the primary result file and any overflow `*.log` files
 * beside it to the results endpoint.
 */
export class ResultRelayImpl implements ResultRelay {
	private readonly logger: Logger;

	constructor(
		private readonly options: ResultRelayOptions,
		private readonly resultsPath: string,
		private readonly rotator: LogRotator,
		logger?: Logger,
		private readonly random: () => number = Math.random,
	) {
		this.logger = logger ?? new LoggerImpl("relay");
	}

	async run(signal: AbortSignal): Promise<void> {
		if (!this.options.resultsEnabled) {
			this.logger.info("Result relay disabled");
			return;
		}

		const recovered = this.rotator.recoverOrphans(path.dirname(this.resultsPath));
		if (recovered > 0) {
			this.logger.info(`Recovered ${recovered} interrupted rotation(s)`);
		}

		while (!signal.aborted) {
			await sleep(jitter(this.options.resultsCycleSleepMs, this.options.jitterMs, this.random), signal);
			if (signal.aborted) {
				break;
			}
			await this.runOneCycle(signal);
		}

		this.logger.info("Result relay stopped");
	}

	async runOneCycle(signal?: AbortSignal): Promise<void> {
		for (const { filePath, deletable } of this.collectFiles()) {
			if (signal?.aborted) {
				return;
			}
			if (!this.isPending(filePath, deletable)) {
				continue;
			}

			try {
				const outcome = await this.rotator.rotate(filePath, deletable, signal);
				if (outcome.status === "restored") {
					this.logger.debug(`Will retry ${filePath} next cycle`);
				}
			} catch (err) {
				this.logger.error(`Rotation of ${filePath} failed: ${formatError(err)}`);
			}
		}
	}

	private collectFiles(): ResultFile[] {
		const files: ResultFile[] = [{ filePath: this.resultsPath, deletable: false }];

		const dir = path.dirname(this.resultsPath);
		if (!fs.existsSync(dir)) {
			return files;
		}

		const primary = path.resolve(this.resultsPath);
		const overflow = fs.readdirSync(dir)
			.filter((name) => name.endsWith(".log") && !this.options.excludedLogFiles.includes(name))
			.sort()
			.map((name) => path.join(dir, name))
			.filter((file) => path.resolve(file) !== primary);

		for (const filePath of overflow) {
			files.push({ filePath, deletable: true });
		}
		return files;
	}

	/**
	 * The primary file is pending once it has content. Overflow files are
	 * pending while they exist, so empty ones are still delivered and deleted.
	 */
	private isPending(filePath: string, deletable: boolean): boolean {
		try {
			const { size } = fs.statSync(filePath);
			return deletable || size > 0;
		} catch {
			return false;
		}
	}
}
