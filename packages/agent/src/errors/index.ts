export { AgentError } from "./agent-error.js";
export { RotationRestoreError } from "./rotation-restore-error.js";
export { TransportError, type TransportFailureKind } from "./transport-error.js";
