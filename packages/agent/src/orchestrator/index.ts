export { ActivityLogImpl } from "./activity-log.js";
export { OrchestratorImpl, type ExecutorRegistry } from "./orchestrator.js";
