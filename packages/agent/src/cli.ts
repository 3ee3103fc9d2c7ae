/**
 * CLI entry point for the agent.
 * This module handles command-line execution of the agent.
 */

import { loadConfig, parseCliArgs } from "./config/index.js";
import { createAgent } from "./di/index.js";
import { LoggerImpl, getCurrentLevel, parseLogLevel, setLogLevel } from "./logger/index.js";
import { formatError } from "./utils/index.js";

/**
 * Check if this module is being run directly (as CLI entry point).
 */
function isMainModule(): boolean {
	const scriptPath = process.argv[1];
	if (!scriptPath) {
		return false;
	}
	return scriptPath.includes("packages/agent") && (
		scriptPath.endsWith("cli.js") ||
		scriptPath.endsWith("cli.ts")
	);
}

if (isMainModule()) {
	const args = process.argv.slice(2);
	const { logLevel } = parseCliArgs(args);
	if (logLevel !== undefined) {
		setLogLevel(parseLogLevel(logLevel, getCurrentLevel()));
	}

	const logger = new LoggerImpl("cli");
	const agent = createAgent(loadConfig(args));

	const shutdown = (signal: NodeJS.Signals): void => {
		logger.info(`Received ${signal}, shutting down`);
		agent.stop().catch((err: unknown) => {
			logger.error(`Shutdown failed: ${formatError(err)}`);
			process.exit(1);
		});
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	agent.start().catch((err: unknown) => {
		logger.error(`Agent failed: ${formatError(err)}`);
		process.exit(1);
	});
}
