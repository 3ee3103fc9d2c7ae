/**
 * Type definitions for the agent package.
 */
export type { ActivityLog, ActivityRecord } from "./activity-log.js";
export type { Agent } from "./agent.js";
export type { AgentConfig } from "./agent-config.js";
export type { HandlerExecutor, HandlerExecutorContext } from "./handler-executor.js";
export type { HealthStore } from "./health-store.js";
export type { Logger } from "./logger.js";
export type { Orchestrator } from "./orchestrator.js";
export type { LogRotator, ResultRelay, RotationOutcome } from "./result-relay.js";
export type { SurveyOutcome, SurveyReporter } from "./survey-reporter.js";
export type { TimelineStore } from "./timeline-store.js";
export type { HttpTransport, ResultMachine, TransportBuilder, TransportResponse } from "./transport.js";
export type { UpdatePoller } from "./update-poller.js";
