import type { TransferLogDump } from "@timeline-agent/shared";
import { ROTATION_TEMP_EXTENSION } from "@timeline-agent/shared";
import type {
	AgentConfig,
	Logger,
	LogRotator,
	ResultMachine,
	RotationOutcome,
	TransportBuilder,
} from "../types/index.js";
import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import { encodePayload } from "../envelope/index.js";
import { RotationRestoreError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatError, toError } from "../utils/index.js";

export type LogRotatorOptions = Pick<AgentConfig, "resultsUrl" | "resultsSecure" | "envelopeSalt">;

/** `<target>.<id>.proc`; the id never contains a dot */
const ORPHAN_PATTERN = /^(.+)\.[^.]+\.proc$/;

/**
 * Moves a result file's content into a temp file, uploads it, and on failure
 * puts it back so no record is lost.
 */
export class LogRotatorImpl implements LogRotator {
	private readonly logger: Logger;

	constructor(
		private readonly options: LogRotatorOptions,
		private readonly transportBuilder: TransportBuilder,
		private readonly createMachine: () => ResultMachine,
		logger?: Logger,
		private readonly createId: () => string = randomUUID,
	) {
		this.logger = logger ?? new LoggerImpl("rotator");
	}

	async rotate(filePath: string, deletable: boolean, signal?: AbortSignal): Promise<RotationOutcome> {
		const tempPath = `${filePath}.${this.createId()}${ROTATION_TEMP_EXTENSION}`;

		try {
			fs.copyFileSync(filePath, tempPath);
			fs.truncateSync(filePath, 0);
		} catch (err) {
			// Target still holds the content, so no copy may outlive this call
			fs.rmSync(tempPath, { force: true });
			throw err;
		}

		let content = "";
		try {
			content = fs.readFileSync(tempPath, "utf-8");
			const machine = this.createMachine();
			const dump: TransferLogDump = { Log: content };
			const key = { secret: machine.name, salt: this.options.envelopeSalt };
			const body = encodePayload(dump, key, this.options.resultsSecure);
			await this.transportBuilder.build(machine).postJson(this.options.resultsUrl, body, signal);
		} catch (err) {
			this.restore(filePath, tempPath);
			this.logger.warn(`Upload of ${filePath} failed, content restored: ${formatError(err)}`);
			return { status: "restored", error: toError(err) };
		}

		fs.rmSync(tempPath, { force: true });
		if (deletable) {
			fs.rmSync(filePath, { force: true });
		}

		const bytes = Buffer.byteLength(content, "utf-8");
		this.logger.info(`Delivered ${bytes} bytes from ${filePath}`);
		return { status: "delivered", bytes };
	}

	recoverOrphans(directory: string): number {
		if (!fs.existsSync(directory)) {
			return 0;
		}

		let recovered = 0;
		for (const name of fs.readdirSync(directory).sort()) {
			const match = ORPHAN_PATTERN.exec(name);
			if (!match) {
				continue;
			}

			const tempPath = path.join(directory, name);
			const filePath = path.join(directory, match[1]);
			try {
				fs.appendFileSync(filePath, fs.readFileSync(tempPath, "utf-8"), "utf-8");
				fs.rmSync(tempPath, { force: true });
				recovered++;
				this.logger.info(`Recovered interrupted rotation ${name} into ${filePath}`);
			} catch (err) {
				this.logger.error(`Could not recover ${tempPath}: ${formatError(err)}`);
			}
		}
		return recovered;
	}

	/**
	 * @throws RotationRestoreError if the content cannot be put back; the temp file is kept.
	 */
	private restore(filePath: string, tempPath: string): void {
		try {
			fs.appendFileSync(filePath, fs.readFileSync(tempPath, "utf-8"), "utf-8");
		} catch (err) {
			throw new RotationRestoreError(filePath, tempPath, err);
		}
		fs.rmSync(tempPath, { force: true });
	}
}
