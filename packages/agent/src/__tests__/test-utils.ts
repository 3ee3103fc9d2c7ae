/**
 * Shared test utilities for agent tests
 *
 * Provides:
 * - Temp directory management
 * - A default AgentConfig pointing at an in-process mock server
 * - Mock Logger and identity helpers
 * - undici MockAgent setup for simulating the command server
 */

import { vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { MockAgent } from "undici";
import type { AgentConfig, Logger, ResultMachine } from "../types/index.js";
import { TransportBuilderImpl } from "../transport/index.js";

// =============================================================================
// Temp Directory Management
// =============================================================================

/**
 * Creates a temporary directory for test isolation.
 *
 * @param prefix - Optional prefix for the temp directory name (default: "agent-test-")
 * @returns The absolute path to the created temp directory
 */
export function createTempDir(prefix = "agent-test-"): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Cleans up a temporary directory created during tests.
 */
export function cleanupTempDir(dirPath: string): void {
	fs.rmSync(dirPath, { recursive: true, force: true });
}

// =============================================================================
// Config and Identity
// =============================================================================

/** Origin of the in-process mock command server */
export const TEST_ORIGIN = "http://command.test";

export const TEST_AGENT_NAME = "test-agent";

/**
 * Creates a default AgentConfig with sensible test defaults.
 * Files live under tempDir, sleeps are short and jitter is off.
 */
export function createDefaultAgentConfig(
	tempDir: string,
	overrides?: Partial<AgentConfig>,
): AgentConfig {
	return {
		agentName: TEST_AGENT_NAME,
		serverUrl: TEST_ORIGIN,
		updatesEnabled: true,
		updatesUrl: `${TEST_ORIGIN}/api/clientupdates`,
		updatesCycleSleepMs: 10,
		resultsEnabled: true,
		resultsUrl: `${TEST_ORIGIN}/api/clientresults`,
		resultsCycleSleepMs: 10,
		resultsSecure: false,
		surveyUrl: `${TEST_ORIGIN}/api/clientsurvey`,
		surveySecure: false,
		timelineUrl: `${TEST_ORIGIN}/api/clienttimeline`,
		trustAllCertificates: false,
		requestTimeoutMs: 2000,
		jitterMs: 0,
		instanceDir: path.join(tempDir, "instance"),
		logDir: path.join(tempDir, "logs"),
		timelinesDir: null,
		excludedLogFiles: ["app.log"],
		envelopeSalt: "test-salt",
		killAfterSeconds: null,
		...overrides,
	};
}

export function createTestMachine(overrides?: Partial<ResultMachine>): ResultMachine {
	return {
		name: TEST_AGENT_NAME,
		fqdn: "host.test",
		host: "host",
		ipAddress: "10.0.0.5",
		currentUsername: "tester",
		version: "0.1.0",
		...overrides,
	};
}

/**
 * Creates a mock Logger for testing.
 * All methods are no-op Vitest mocks that can be inspected.
 */
export function createMockLogger(): Logger {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}

// =============================================================================
// Mock Server
// =============================================================================

/**
 * Creates an undici MockAgent with real network access disabled, the
 * interceptable pool for TEST_ORIGIN, and a TransportBuilder that sends through it.
 * Unmatched requests fail like a refused connection.
 */
export function createMockServer(config?: Pick<AgentConfig, "trustAllCertificates" | "requestTimeoutMs">) {
	const mockAgent = new MockAgent();
	mockAgent.disableNetConnect();
	const pool = mockAgent.get(TEST_ORIGIN);
	const transportBuilder = new TransportBuilderImpl(
		config ?? { trustAllCertificates: false, requestTimeoutMs: 2000 },
		createMockLogger(),
		mockAgent,
	);
	return { mockAgent, pool, transportBuilder };
}

export type MockServer = ReturnType<typeof createMockServer>;

/**
 * Reply handler that records each request body and answers with an empty 200.
 */
export function captureBodies(bodies: string[]) {
	return (opts: { body?: unknown }): string => {
		bodies.push(typeof opts.body === "string" ? opts.body : String(opts.body));
		return "";
	};
}

// =============================================================================
// Files
// =============================================================================

export function writeFile(filePath: string, content: string): void {
	fs.mkdirSync(path.dirname(filePath), { recursive: true });
	fs.writeFileSync(filePath, content, "utf-8");
}

export function readFile(filePath: string): string {
	return fs.readFileSync(filePath, "utf-8");
}

// =============================================================================
// DI Test Helpers
// =============================================================================

/** Counter for generating unique token names */
let tokenCounter = 0;

/**
 * Creates a unique token name by appending an incrementing counter.
 * Each test needs isolated tokens to avoid sharing through Symbol.for.
 */
export function createUniqueTokenName(baseName: string): string {
	tokenCounter++;
	return `${baseName}-${tokenCounter}`;
}
