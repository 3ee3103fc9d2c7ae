import type { TimelineEvent } from "@timeline-agent/shared";
import { HTTP_BODY_MAX_CHARS } from "@timeline-agent/shared";
import type { HandlerExecutor, HandlerExecutorContext, Logger } from "../types/index.js";
import { formatError } from "../utils/index.js";

/** HandlerType served by HttpExecutor */
export const HTTP_HANDLER_TYPE = "Http";

function isAbortError(err: unknown): boolean {
	return typeof err === "object" && err !== null && "name" in err && err.name === "AbortError";
}

/**
 * Executor for Http handlers.
 * Issues a GET to the event's Command URL (or its first argument) and reports the outcome.
 * Redirects are not followed.
 */
export class HttpExecutor implements HandlerExecutor {
	constructor(
		private readonly logger: Logger,
		private readonly timeoutMs: number,
	) {}

	async execute(event: TimelineEvent, context: HandlerExecutorContext): Promise<string> {
		const url = this.resolveUrl(event);
		if (!url) {
			throw new Error("Http event has no URL");
		}

		this.logger.info(`HTTP: fetching ${url}`);

		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
		const onAbort = (): void => controller.abort();
		context.signal?.addEventListener("abort", onAbort, { once: true });

		try {
			const response = await fetch(url, {
				method: "GET",
				signal: controller.signal,
				redirect: "manual",
			});

			if (response.status >= 300 && response.status < 400) {
				return `status=${response.status} redirect not followed`;
			}

			const bodyText = await response.text();
			const truncated = bodyText.length > HTTP_BODY_MAX_CHARS;
			const bytesReturned = truncated ? HTTP_BODY_MAX_CHARS : bodyText.length;

			this.logger.info(`HTTP: status=${response.status}, bytesReturned=${bytesReturned}`);
			return `status=${response.status} bytes=${bytesReturned}${truncated ? " truncated" : ""}`;
		} catch (err) {
			if (isAbortError(err)) {
				throw new Error(context.signal?.aborted ? "Request cancelled" : "Request timeout");
			}
			throw new Error(formatError(err));
		} finally {
			clearTimeout(timeoutId);
			context.signal?.removeEventListener("abort", onAbort);
		}
	}

	private resolveUrl(event: TimelineEvent): string | null {
		if (event.Command) {
			return event.Command;
		}
		const first = event.CommandArgs?.[0];
		return typeof first === "string" && first.length > 0 ? first : null;
	}
}
