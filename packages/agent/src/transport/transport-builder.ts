import { Agent, type Dispatcher } from "undici";
import type { AgentConfig, HttpTransport, Logger, ResultMachine, TransportBuilder } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { UndiciHttpTransport } from "./http-transport.js";
import { buildIdentityHeaders } from "./result-machine.js";

export type TransportOptions = Pick<AgentConfig, "trustAllCertificates" | "requestTimeoutMs">;

/**
 * Builds identity-bound transports over one shared connection pool.
 * Certificate validation is controlled by `trustAllCertificates` only.
 */
export class TransportBuilderImpl implements TransportBuilder {
	private ownedAgent: Agent | null = null;
	private readonly logger: Logger;

	/**
	 * @param dispatcher - Optional dispatcher to use instead of an owned undici Agent (tests pass a MockAgent).
	 */
	constructor(
		private readonly options: TransportOptions,
		logger?: Logger,
		private readonly dispatcher?: Dispatcher,
	) {
		this.logger = logger ?? new LoggerImpl("transport");

		if (options.trustAllCertificates) {
			this.logger.warn("Server certificate validation is disabled");
		}
	}

	build(machine: ResultMachine): HttpTransport {
		return new UndiciHttpTransport(this.getDispatcher(), buildIdentityHeaders(machine), this.options.requestTimeoutMs);
	}

	/**
	 * Close the owned pool. The next `build` opens a fresh one.
	 */
	async close(): Promise<void> {
		const agent = this.ownedAgent;
		if (agent) {
			this.ownedAgent = null;
			await agent.close();
		}
	}

	private getDispatcher(): Dispatcher {
		if (this.dispatcher) {
			return this.dispatcher;
		}
		if (!this.ownedAgent) {
			this.ownedAgent = new Agent({
				connect: { rejectUnauthorized: !this.options.trustAllCertificates },
			});
		}
		return this.ownedAgent;
	}
}
