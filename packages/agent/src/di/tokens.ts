/**
 * Injection tokens (identifiers) for all dependencies in the agent package.
 * Uses inversify-style Symbol identifiers for type-safe dependency injection.
 */

import type {
	ActivityLog,
	Agent,
	AgentConfig,
	HealthStore,
	Logger,
	LogRotator,
	Orchestrator,
	ResultMachine,
	ResultRelay,
	SurveyReporter,
	TimelineStore,
	TransportBuilder,
	UpdatePoller,
} from "../types/index.js";
import type { AgentPaths } from "../config/index.js";
import type { ExecutorRegistry } from "../orchestrator/index.js";

/**
 * Token type for identifying dependencies in the container.
 * Using symbols ensures type safety and avoids string collision.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration
// ============================================================================

export const CONFIG = createToken<AgentConfig>("AgentConfig");

/** Local file locations derived from the config */
export const PATHS = createToken<AgentPaths>("AgentPaths");

// ============================================================================
// Core Services
// ============================================================================

export const LOGGER = createToken<Logger>("Logger");

/**
 * Token for a logger factory that creates prefixed loggers.
 */
export type LoggerFactory = (prefix: string) => Logger;
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

export const TRANSPORT_BUILDER = createToken<TransportBuilder>("TransportBuilder");

/** Builds the agent identity; called once per cycle */
export type MachineFactory = () => ResultMachine;
export const MACHINE_FACTORY = createToken<MachineFactory>("MachineFactory");

// ============================================================================
// Local State
// ============================================================================

export const TIMELINE_STORE = createToken<TimelineStore>("TimelineStore");
export const HEALTH_STORE = createToken<HealthStore>("HealthStore");
export const ACTIVITY_LOG = createToken<ActivityLog>("ActivityLog");

// ============================================================================
// Execution
// ============================================================================

/**
 * Token for the executor registry (map of handler type to executor).
 */
export const EXECUTOR_REGISTRY = createToken<ExecutorRegistry>("ExecutorRegistry");
export const ORCHESTRATOR = createToken<Orchestrator>("Orchestrator");

// ============================================================================
// Loops
// ============================================================================

export const UPDATE_POLLER = createToken<UpdatePoller>("UpdatePoller");
export const LOG_ROTATOR = createToken<LogRotator>("LogRotator");
export const RESULT_RELAY = createToken<ResultRelay>("ResultRelay");
export const SURVEY_REPORTER = createToken<SurveyReporter>("SurveyReporter");

// ============================================================================
// Agent
// ============================================================================

export const AGENT = createToken<Agent>("Agent");

// ============================================================================
// Token groups for documentation
// ============================================================================

export const TOKENS = {
	CONFIG,
	PATHS,
	LOGGER,
	LOGGER_FACTORY,
	TRANSPORT_BUILDER,
	MACHINE_FACTORY,
	TIMELINE_STORE,
	HEALTH_STORE,
	ACTIVITY_LOG,
	EXECUTOR_REGISTRY,
	ORCHESTRATOR,
	UPDATE_POLLER,
	LOG_ROTATOR,
	RESULT_RELAY,
	SURVEY_REPORTER,
	AGENT,
} as const;
