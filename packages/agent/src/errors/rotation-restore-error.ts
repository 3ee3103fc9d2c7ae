import { AgentError } from "./agent-error.js";

/**
 * Thrown when a failed upload could not be undone locally.
 * The captured bytes remain in `tempPath`; orphan recovery picks them up on restart.
 */
export class RotationRestoreError extends AgentError {
	readonly filePath: string;
	readonly tempPath: string;

	constructor(filePath: string, tempPath: string, cause: unknown) {
		super(`Could not restore ${filePath} from ${tempPath}`, "ROTATION_RESTORE_FAILED", { cause });
		this.filePath = filePath;
		this.tempPath = tempPath;
	}
}
