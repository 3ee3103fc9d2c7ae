/**
 * Dependency Injection module exports.
 */

// Re-export reflect-metadata to ensure it's loaded
import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
	ACTIVITY_LOG,
	AGENT,
	CONFIG,
	EXECUTOR_REGISTRY,
	HEALTH_STORE,
	LOGGER,
	LOGGER_FACTORY,
	LOG_ROTATOR,
	MACHINE_FACTORY,
	ORCHESTRATOR,
	PATHS,
	RESULT_RELAY,
	SURVEY_REPORTER,
	TIMELINE_STORE,
	TOKENS,
	TRANSPORT_BUILDER,
	UPDATE_POLLER,
	createToken,
	type LoggerFactory,
	type MachineFactory,
	type Token,
} from "./tokens.js";
export {
	configureContainer,
	createAgent,
	createAgentContainer,
	type ContainerOverrides,
} from "./composition-root.js";
