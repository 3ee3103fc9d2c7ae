/**
 * Inbound loop: polls the command server and dispatches updates.
 */
export interface UpdatePoller {
	run(signal: AbortSignal): Promise<void>;
	runOneCycle(signal?: AbortSignal): Promise<void>;
	/** Wait for partial-timeline dispatches still running. */
	drain(): Promise<void>;
}
