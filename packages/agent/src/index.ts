/**
 * Agent package public API
 *
 * This module exports the agent factory, its building blocks and configuration types.
 */

// Agent
export { AgentImpl } from "./agent.js";
export type { Agent } from "./types/agent.js";

// Configuration
export { loadConfig, resolvePaths, type AgentPaths } from "./config/index.js";
export type { AgentConfig } from "./types/agent-config.js";

// Class implementations
export { LoggerImpl } from "./logger/index.js";
export { UpdatePollerImpl } from "./updates/index.js";
export { LogRotatorImpl, ResultRelayImpl, SurveyReporterImpl } from "./results/index.js";
export { ActivityLogImpl, OrchestratorImpl, type ExecutorRegistry } from "./orchestrator/index.js";
export { HealthStoreImpl, TimelineStoreImpl } from "./stores/index.js";
export { TransportBuilderImpl, buildResultMachine } from "./transport/index.js";
export { HTTP_HANDLER_TYPE, HttpExecutor } from "./executors/index.js";
export { decodePayload, encodePayload, type EnvelopeKey } from "./envelope/index.js";
export { AgentError, RotationRestoreError, TransportError } from "./errors/index.js";

// Interface types
export type * from "./types/index.js";

// Dependency Injection
export {
	ContainerImpl,
	createContainer,
	createToken,
	createAgent,
	createAgentContainer,
	configureContainer,
	TOKENS,
} from "./di/index.js";
export type { Container, ContainerOverrides, Factory, LoggerFactory, MachineFactory, Token } from "./di/index.js";
