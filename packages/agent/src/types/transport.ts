/**
 * Identity of this agent as seen by the command server.
 * `name` doubles as the key for encrypted envelopes.
 */
export interface ResultMachine {
	name: string;
	fqdn: string;
	host: string;
	ipAddress: string;
	currentUsername: string;
	version: string;
}

/**
 * Successful (2xx) response from the command server.
 */
export interface TransportResponse {
	status: number;
	body: string;
}

/**
 * HTTP client bound to one agent identity.
 * Every call rejects with a TransportError on failure or a non-2xx status.
 */
export interface HttpTransport {
	get(url: string, signal?: AbortSignal): Promise<TransportResponse>;
	postJson(url: string, body: string, signal?: AbortSignal): Promise<TransportResponse>;
}

/**
 * Builds transports for an identity.
 */
export interface TransportBuilder {
	build(machine: ResultMachine): HttpTransport;
	close(): Promise<void>;
}
