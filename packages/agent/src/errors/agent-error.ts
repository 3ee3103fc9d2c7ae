/**
 * Base class for agent errors
 *
 * Carries a stable `code` so log lines can be grouped without parsing messages.
 */
export class AgentError extends Error {
	readonly code: string;

	constructor(message: string, code: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = this.constructor.name;
		this.code = code;
	}
}
