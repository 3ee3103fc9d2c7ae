import { type Dispatcher, request } from "undici";
import type { HttpTransport, TransportResponse } from "../types/index.js";
import { TransportError } from "../errors/index.js";
import { formatError } from "../utils/index.js";

type Method = "GET" | "POST";

/**
 * HttpTransport over undici's `request`.
 * Each call gets its own timeout and follows the caller's cancellation signal.
 */
export class UndiciHttpTransport implements HttpTransport {
	constructor(
		private readonly dispatcher: Dispatcher,
		private readonly headers: Record<string, string>,
		private readonly timeoutMs: number,
	) {}

	get(url: string, signal?: AbortSignal): Promise<TransportResponse> {
		return this.send("GET", url, undefined, signal);
	}

	postJson(url: string, body: string, signal?: AbortSignal): Promise<TransportResponse> {
		return this.send("POST", url, body, signal);
	}

	private async send(method: Method, url: string, body: string | undefined, signal?: AbortSignal): Promise<TransportResponse> {
		if (signal?.aborted) {
			throw new TransportError("aborted", url, `${method} ${url} cancelled before sending`);
		}

		const controller = new AbortController();
		let timedOut = false;
		const timeoutId = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, this.timeoutMs);
		const onAbort = (): void => controller.abort();
		signal?.addEventListener("abort", onAbort, { once: true });

		const headers = body === undefined
			? this.headers
			: { ...this.headers, "content-type": "application/json" };

		try {
			const response = await request(url, {
				method,
				headers,
				body,
				dispatcher: this.dispatcher,
				signal: controller.signal,
			});
			const text = await response.body.text();

			if (response.statusCode < 200 || response.statusCode >= 300) {
				throw new TransportError("status", url, `${method} ${url} returned ${response.statusCode}`, {
					status: response.statusCode,
				});
			}

			return { status: response.statusCode, body: text };
		} catch (err) {
			if (err instanceof TransportError) {
				throw err;
			}
			if (timedOut) {
				throw new TransportError("timeout", url, `${method} ${url} timed out after ${this.timeoutMs}ms`, { cause: err });
			}
			if (signal?.aborted) {
				throw new TransportError("aborted", url, `${method} ${url} cancelled`, { cause: err });
			}
			throw new TransportError("connection", url, `${method} ${url} failed: ${formatError(err)}`, { cause: err });
		} finally {
			clearTimeout(timeoutId);
			signal?.removeEventListener("abort", onAbort);
		}
	}
}
