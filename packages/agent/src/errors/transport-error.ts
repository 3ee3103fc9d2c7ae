import { AgentError } from "./agent-error.js";

/**
 * Why a request to the command server did not produce a 2xx response.
 * - connection: no response at all
 * - status: the server answered with a non-2xx status
 * - timeout: the per-request timeout elapsed
 * - aborted: the agent is shutting down
 */
export type TransportFailureKind = "connection" | "status" | "timeout" | "aborted";

/**
 * Error thrown by HttpTransport for every failed request.
 */
export class TransportError extends AgentError {
	readonly kind: TransportFailureKind;
	readonly status: number | null;
	readonly url: string;

	constructor(
		kind: TransportFailureKind,
		url: string,
		message: string,
		options?: { status?: number; cause?: unknown },
	) {
		super(message, `TRANSPORT_${kind.toUpperCase()}`, { cause: options?.cause });
		this.kind = kind;
		this.url = url;
		this.status = options?.status ?? null;
	}

	isNotFound(): boolean {
		return this.kind === "status" && this.status === 404;
	}
}
