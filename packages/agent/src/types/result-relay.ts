/**
 * Outcome of one rotation attempt.
 * - delivered: the captured bytes reached the server and the local copy was cleared
 * - restored: the upload failed and the captured bytes were appended back
 */
export type RotationOutcome =
	| { status: "delivered"; bytes: number }
	| { status: "restored"; error: Error };

/**
 * Copies, truncates, uploads and either clears or restores one result file.
 */
export interface LogRotator {
	rotate(filePath: string, deletable: boolean, signal?: AbortSignal): Promise<RotationOutcome>;
	/** Put back the content of temp files left by a crash mid-rotation. */
	recoverOrphans(directory: string): number;
}

/**
 * Outbound loop: drains result files to the command server.
 */
export interface ResultRelay {
	run(signal: AbortSignal): Promise<void>;
	runOneCycle(signal?: AbortSignal): Promise<void>;
}
