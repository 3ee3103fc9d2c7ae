/**
 * Composition root for the agent package.
 * Wires all dependencies together using the inversify-based DI container.
 */

import "reflect-metadata";
import type { Dispatcher } from "undici";
import type { Agent, AgentConfig } from "../types/index.js";
import { AgentImpl } from "../agent.js";
import { resolvePaths } from "../config/index.js";
import { HTTP_HANDLER_TYPE, HttpExecutor } from "../executors/index.js";
import { LoggerImpl } from "../logger/index.js";
import { ActivityLogImpl, type ExecutorRegistry, OrchestratorImpl } from "../orchestrator/index.js";
import { LogRotatorImpl, ResultRelayImpl, SurveyReporterImpl } from "../results/index.js";
import { HealthStoreImpl, TimelineStoreImpl } from "../stores/index.js";
import { TransportBuilderImpl, buildResultMachine } from "../transport/index.js";
import { UpdatePollerImpl } from "../updates/index.js";
import { type Container, createContainer } from "./container.js";
import {
	ACTIVITY_LOG,
	AGENT,
	CONFIG,
	EXECUTOR_REGISTRY,
	HEALTH_STORE,
	LOGGER,
	LOGGER_FACTORY,
	LOG_ROTATOR,
	type LoggerFactory,
	MACHINE_FACTORY,
	type MachineFactory,
	ORCHESTRATOR,
	PATHS,
	RESULT_RELAY,
	SURVEY_REPORTER,
	TIMELINE_STORE,
	TRANSPORT_BUILDER,
	UPDATE_POLLER,
} from "./tokens.js";

/**
 * Replacements for collaborators that reach outside the process.
 */
export interface ContainerOverrides {
	/** Dispatcher for every outbound request (tests pass an undici MockAgent) */
	dispatcher?: Dispatcher;
	loggerFactory?: LoggerFactory;
}

/**
 * Configure all dependencies in the container.
 * This is the single place where all wiring happens.
 */
export function configureContainer(container: Container, config: AgentConfig, overrides: ContainerOverrides = {}): void {
	container.instance(CONFIG, config);
	container.instance(PATHS, resolvePaths(config));

	container.singleton<LoggerFactory>(LOGGER_FACTORY, () => {
		return overrides.loggerFactory ?? ((prefix: string) => new LoggerImpl(prefix));
	});

	container.singleton(LOGGER, (c: Container) => c.resolve(LOGGER_FACTORY)("agent"));

	container.singleton(TRANSPORT_BUILDER, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		return new TransportBuilderImpl(cfg, c.resolve(LOGGER_FACTORY)("transport"), overrides.dispatcher);
	});

	container.singleton<MachineFactory>(MACHINE_FACTORY, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		return () => buildResultMachine(cfg.agentName);
	});

	container.singleton(TIMELINE_STORE, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		const paths = c.resolve(PATHS);
		return new TimelineStoreImpl(paths.timelineFile, cfg.timelinesDir, c.resolve(LOGGER_FACTORY)("timeline-store"));
	});

	container.singleton(HEALTH_STORE, (c: Container) => {
		return new HealthStoreImpl(c.resolve(PATHS).healthFile, c.resolve(LOGGER_FACTORY)("health-store"));
	});

	container.singleton(ACTIVITY_LOG, (c: Container) => new ActivityLogImpl(c.resolve(PATHS).resultsFile));

	container.singleton<ExecutorRegistry>(EXECUTOR_REGISTRY, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		const registry: ExecutorRegistry = new Map();
		registry.set(HTTP_HANDLER_TYPE, new HttpExecutor(c.resolve(LOGGER_FACTORY)("http"), cfg.requestTimeoutMs));
		return registry;
	});

	container.singleton(ORCHESTRATOR, (c: Container) => {
		return new OrchestratorImpl(
			c.resolve(EXECUTOR_REGISTRY),
			c.resolve(ACTIVITY_LOG),
			c.resolve(LOGGER_FACTORY)("orchestrator"),
		);
	});

	container.singleton(UPDATE_POLLER, (c: Container) => {
		return new UpdatePollerImpl(
			c.resolve(CONFIG),
			c.resolve(TRANSPORT_BUILDER),
			c.resolve(MACHINE_FACTORY),
			c.resolve(TIMELINE_STORE),
			c.resolve(HEALTH_STORE),
			c.resolve(ORCHESTRATOR),
			c.resolve(LOGGER_FACTORY)("poller"),
		);
	});

	container.singleton(LOG_ROTATOR, (c: Container) => {
		return new LogRotatorImpl(
			c.resolve(CONFIG),
			c.resolve(TRANSPORT_BUILDER),
			c.resolve(MACHINE_FACTORY),
			c.resolve(LOGGER_FACTORY)("rotator"),
		);
	});

	container.singleton(RESULT_RELAY, (c: Container) => {
		return new ResultRelayImpl(
			c.resolve(CONFIG),
			c.resolve(PATHS).resultsFile,
			c.resolve(LOG_ROTATOR),
			c.resolve(LOGGER_FACTORY)("relay"),
		);
	});

	container.singleton(SURVEY_REPORTER, (c: Container) => {
		return new SurveyReporterImpl(
			c.resolve(CONFIG),
			c.resolve(PATHS).surveyFile,
			c.resolve(TRANSPORT_BUILDER),
			c.resolve(MACHINE_FACTORY),
			c.resolve(LOGGER_FACTORY)("survey"),
		);
	});

	container.singleton(AGENT, (c: Container) => {
		return new AgentImpl(
			c.resolve(CONFIG),
			c.resolve(UPDATE_POLLER),
			c.resolve(RESULT_RELAY),
			c.resolve(SURVEY_REPORTER),
			c.resolve(TRANSPORT_BUILDER),
			c.resolve(LOGGER),
		);
	});
}

/**
 * Create and configure a container with all dependencies for the given config.
 */
export function createAgentContainer(config: AgentConfig, overrides?: ContainerOverrides): Container {
	const container = createContainer();
	configureContainer(container, config, overrides);
	return container;
}

/**
 * Create and return the agent from a fully configured container.
 */
export function createAgent(config: AgentConfig, overrides?: ContainerOverrides): Agent {
	return createAgentContainer(config, overrides).resolve(AGENT);
}
