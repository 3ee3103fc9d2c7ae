import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import type { AgentConfig, Logger } from "../types/index.js";
import { decodePayload } from "../envelope/index.js";
import { RotationRestoreError } from "../errors/index.js";
import { LogRotatorImpl } from "../results/index.js";
import {
	type MockServer,
	captureBodies,
	cleanupTempDir,
	createDefaultAgentConfig,
	createMockLogger,
	createMockServer,
	createTempDir,
	createTestMachine,
	readFile,
	writeFile,
} from "./test-utils.js";

const RESULTS_PATH = "/api/clientresults";

const fsFaults = vi.hoisted(() => {
	const faults: { truncate: Error | null } = { truncate: null };
	return faults;
});

vi.mock("node:fs", async (importOriginal) => {
	const actual = await importOriginal<typeof import("node:fs")>();
	return {
		...actual,
		truncateSync: (...args: Parameters<typeof actual.truncateSync>): void => {
			const fault = fsFaults.truncate;
			if (fault) {
				fsFaults.truncate = null;
				throw fault;
			}
			actual.truncateSync(...args);
		},
	};
});

describe("LogRotatorImpl", () => {
	let tempDir: string;
	let logDir: string;
	let primary: string;
	let config: AgentConfig;
	let server: MockServer;
	let logger: Logger;

	function createRotator(overrides?: Partial<AgentConfig>): LogRotatorImpl {
		return new LogRotatorImpl(
			{ ...config, ...overrides },
			server.transportBuilder,
			() => createTestMachine(),
			logger,
			() => "fixed-id",
		);
	}

	beforeEach(() => {
		tempDir = createTempDir();
		config = createDefaultAgentConfig(tempDir);
		logDir = config.logDir;
		primary = path.join(logDir, "clientupdates.log");
		server = createMockServer();
		logger = createMockLogger();
		writeFile(primary, "line1\nline2\n");
	});

	afterEach(async () => {
		fsFaults.truncate = null;
		await server.mockAgent.close();
		cleanupTempDir(tempDir);
	});

	describe("rotate", () => {
		it("uploads the content and truncates a kept file", async () => {
			const bodies: string[] = [];
			server.pool.intercept({ path: RESULTS_PATH, method: "POST" }).reply(200, captureBodies(bodies));

			const outcome = await createRotator().rotate(primary, false);

			expect(outcome).toEqual({ status: "delivered", bytes: 12 });
			expect(bodies).toEqual(["{\"Log\":\"line1\\nline2\\n\"}"]);
			expect(readFile(primary)).toBe("");
			expect(fs.readdirSync(logDir)).toEqual(["clientupdates.log"]);
		});

		it("deletes a deletable file after upload", async () => {
			const overflow = path.join(logDir, "old-1.log");
			writeFile(overflow, "old\n");
			server.pool.intercept({ path: RESULTS_PATH, method: "POST" }).reply(200, "");

			await createRotator().rotate(overflow, true);

			expect(fs.existsSync(overflow)).toBe(false);
			expect(fs.readdirSync(logDir)).toEqual(["clientupdates.log"]);
		});

		it("restores the content after a failed upload", async () => {
			server.pool.intercept({ path: RESULTS_PATH, method: "POST" }).reply(500, "");

			const outcome = await createRotator().rotate(primary, false);

			expect(outcome.status).toBe("restored");
			expect(readFile(primary)).toBe("line1\nline2\n");
			expect(fs.readdirSync(logDir)).toEqual(["clientupdates.log"]);
		});

		it("keeps lines written during a failed upload", async () => {
			server.pool.intercept({ path: RESULTS_PATH, method: "POST" }).reply(500, () => {
				fs.appendFileSync(primary, "line3\n");
				return "";
			});

			await createRotator().rotate(primary, false);

			expect(readFile(primary)).toBe("line3\nline1\nline2\n");
		});

		it("keeps a deletable file whose upload failed", async () => {
			const overflow = path.join(logDir, "old-1.log");
			writeFile(overflow, "old\n");
			server.pool.intercept({ path: RESULTS_PATH, method: "POST" }).replyWithError(new Error("ECONNRESET"));

			const outcome = await createRotator().rotate(overflow, true);

			expect(outcome.status).toBe("restored");
			expect(readFile(overflow)).toBe("old\n");
		});

		it("encrypts the dump with the agent name when secure", async () => {
			const bodies: string[] = [];
			server.pool.intercept({ path: RESULTS_PATH, method: "POST" }).reply(200, captureBodies(bodies));

			await createRotator({ resultsSecure: true }).rotate(primary, false);

			expect(bodies).toHaveLength(1);
			expect(JSON.parse(bodies[0] ?? "")).toEqual({ Payload: expect.any(String) });
			expect(decodePayload(bodies[0] ?? "", { secret: "test-agent", salt: "test-salt" }))
				.toBe("{\"Log\":\"line1\\nline2\\n\"}");
		});

		it("leaves the file untouched and no temp copy when truncation fails", async () => {
			fsFaults.truncate = new Error("EBUSY: resource busy");
			const rotator = createRotator();

			await expect(rotator.rotate(primary, false)).rejects.toThrow("EBUSY: resource busy");

			expect(readFile(primary)).toBe("line1\nline2\n");
			expect(fs.readdirSync(logDir)).toEqual(["clientupdates.log"]);
			expect(rotator.recoverOrphans(logDir)).toBe(0);
			expect(readFile(primary)).toBe("line1\nline2\n");
		});

		it("throws and keeps the temp file when the content cannot be put back", async () => {
			server.pool.intercept({ path: RESULTS_PATH, method: "POST" }).reply(500, () => {
				fs.rmSync(primary);
				fs.mkdirSync(primary);
				return "";
			});

			const error = await createRotator().rotate(primary, false).catch((err: unknown) => err);

			expect(error).toBeInstanceOf(RotationRestoreError);
			expect(error).toMatchObject({ filePath: primary, tempPath: `${primary}.fixed-id.proc` });
			expect(readFile(`${primary}.fixed-id.proc`)).toBe("line1\nline2\n");
		});
	});

	describe("recoverOrphans", () => {
		it("appends interrupted rotations back to their file", () => {
			writeFile(primary, "new\n");
			writeFile(`${primary}.3f1c.proc`, "orphan\n");
			writeFile(path.join(logDir, "stray.proc"), "untouched");

			const recovered = createRotator().recoverOrphans(logDir);

			expect(recovered).toBe(1);
			expect(readFile(primary)).toBe("new\norphan\n");
			expect(fs.readdirSync(logDir).sort()).toEqual(["clientupdates.log", "stray.proc"]);
		});

		it("recreates a deleted overflow file", () => {
			writeFile(path.join(logDir, "old-1.log.abc.proc"), "old\n");

			createRotator().recoverOrphans(logDir);

			expect(readFile(path.join(logDir, "old-1.log"))).toBe("old\n");
		});

		it("returns 0 for a missing directory", () => {
			expect(createRotator().recoverOrphans(path.join(tempDir, "missing"))).toBe(0);
		});
	});
});
