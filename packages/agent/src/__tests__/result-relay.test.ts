import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import type { AgentConfig, Logger, LogRotator } from "../types/index.js";
import { LogRotatorImpl, ResultRelayImpl } from "../results/index.js";
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

function createMockRotator(): LogRotator {
	return {
		rotate: vi.fn(async () => ({ status: "delivered" as const, bytes: 1 })),
		recoverOrphans: vi.fn(() => 0),
	};
}

describe("ResultRelayImpl", () => {
	let tempDir: string;
	let logDir: string;
	let primary: string;
	let config: AgentConfig;
	let server: MockServer;
	let logger: Logger;

	function createRelay(rotator?: LogRotator, overrides?: Partial<AgentConfig>): ResultRelayImpl {
		return new ResultRelayImpl(
			{ ...config, ...overrides },
			primary,
			rotator ?? new LogRotatorImpl(config, server.transportBuilder, () => createTestMachine(), logger),
			logger,
			() => 0.5,
		);
	}

	beforeEach(() => {
		tempDir = createTempDir();
		config = createDefaultAgentConfig(tempDir);
		logDir = config.logDir;
		primary = path.join(logDir, "clientupdates.log");
		server = createMockServer();
		logger = createMockLogger();
	});

	afterEach(async () => {
		await server.mockAgent.close();
		cleanupTempDir(tempDir);
	});

	describe("runOneCycle", () => {
		it("uploads the primary file first, then overflow logs by name", async () => {
			const bodies: string[] = [];
			writeFile(primary, "primary\n");
			writeFile(path.join(logDir, "b.log"), "b\n");
			writeFile(path.join(logDir, "a.log"), "a\n");
			server.pool.intercept({ path: RESULTS_PATH, method: "POST" }).reply(200, captureBodies(bodies)).times(3);

			await createRelay().runOneCycle();

			expect(bodies).toEqual([
				"{\"Log\":\"primary\\n\"}",
				"{\"Log\":\"a\\n\"}",
				"{\"Log\":\"b\\n\"}",
			]);
			expect(readFile(primary)).toBe("");
			expect(fs.readdirSync(logDir)).toEqual(["clientupdates.log"]);
		});

		it("never touches excluded logs or other files", async () => {
			writeFile(primary, "");
			writeFile(path.join(logDir, "app.log"), "app\n");
			writeFile(path.join(logDir, "notes.txt"), "notes\n");
			const rotator = createMockRotator();

			await createRelay(rotator).runOneCycle();

			expect(rotator.rotate).not.toHaveBeenCalled();
			expect(readFile(path.join(logDir, "app.log"))).toBe("app\n");
		});

		it("honours a configured exclusion list", async () => {
			writeFile(path.join(logDir, "debug.log"), "d\n");
			writeFile(path.join(logDir, "app.log"), "a\n");
			const rotator = createMockRotator();

			await createRelay(rotator, { excludedLogFiles: ["debug.log"] }).runOneCycle();

			expect(rotator.rotate).toHaveBeenCalledTimes(1);
			expect(rotator.rotate).toHaveBeenCalledWith(path.join(logDir, "app.log"), true, undefined);
		});

		it("skips an empty or missing primary file", async () => {
			const rotator = createMockRotator();

			await createRelay(rotator).runOneCycle();
			writeFile(primary, "");
			await createRelay(rotator).runOneCycle();

			expect(rotator.rotate).not.toHaveBeenCalled();
		});

		it("delivers and deletes an empty overflow file", async () => {
			const bodies: string[] = [];
			writeFile(path.join(logDir, "old.log"), "");
			server.pool.intercept({ path: RESULTS_PATH, method: "POST" }).reply(200, captureBodies(bodies));

			await createRelay().runOneCycle();

			expect(bodies).toEqual(["{\"Log\":\"\"}"]);
			expect(fs.existsSync(path.join(logDir, "old.log"))).toBe(false);
		});

		it("keeps an overflow file whose upload failed", async () => {
			writeFile(path.join(logDir, "old.log"), "old\n");
			server.pool.intercept({ path: RESULTS_PATH, method: "POST" }).reply(503, "");

			await createRelay().runOneCycle();

			expect(readFile(path.join(logDir, "old.log"))).toBe("old\n");
		});

		it("moves on to the next file when a rotation throws", async () => {
			writeFile(primary, "p\n");
			writeFile(path.join(logDir, "old.log"), "old\n");
			const rotator = createMockRotator();
			vi.mocked(rotator.rotate).mockRejectedValueOnce(new Error("disk full"));

			await createRelay(rotator).runOneCycle();

			expect(rotator.rotate).toHaveBeenCalledTimes(2);
			expect(logger.error).toHaveBeenCalledWith(`Rotation of ${primary} failed: disk full`);
		});

		it("stops before the next file once aborted", async () => {
			writeFile(primary, "p\n");
			const rotator = createMockRotator();
			const controller = new AbortController();
			controller.abort();

			await createRelay(rotator).runOneCycle(controller.signal);

			expect(rotator.rotate).not.toHaveBeenCalled();
		});
	});

	describe("run", () => {
		it("returns at once when disabled", async () => {
			const rotator = createMockRotator();

			await createRelay(rotator, { resultsEnabled: false }).run(new AbortController().signal);

			expect(rotator.recoverOrphans).not.toHaveBeenCalled();
			expect(logger.info).toHaveBeenCalledWith("Result relay disabled");
		});

		it("recovers orphans first and cycles until aborted", async () => {
			writeFile(primary, "p\n");
			const rotator = createMockRotator();
			const controller = new AbortController();

			const running = createRelay(rotator).run(controller.signal);
			await new Promise((resolve) => setTimeout(resolve, 60));
			controller.abort();
			await running;

			expect(rotator.recoverOrphans).toHaveBeenCalledWith(logDir);
			expect(rotator.rotate).toHaveBeenCalledWith(primary, false, controller.signal);
			expect(logger.info).toHaveBeenLastCalledWith("Result relay stopped");
		});
	});
});
