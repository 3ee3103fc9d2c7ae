import * as os from "node:os";
import type { ResultMachine } from "../types/index.js";
import { AGENT_VERSION } from "../constants.js";

function firstExternalIpv4(): string {
	for (const entries of Object.values(os.networkInterfaces())) {
		for (const entry of entries ?? []) {
			if (entry.family === "IPv4" && !entry.internal) {
				return entry.address;
			}
		}
	}
	return "127.0.0.1";
}

function currentUsername(): string {
	try {
		return os.userInfo().username;
	} catch {
		// userInfo throws when the uid has no passwd entry (common in containers)
		return process.env.USER ?? "unknown";
	}
}

/**
 * Build the identity sent with every request. Cheap enough to call per cycle.
 */
export function buildResultMachine(agentName: string): ResultMachine {
	const host = os.hostname();
	return {
		name: agentName,
		fqdn: host,
		host,
		ipAddress: firstExternalIpv4(),
		currentUsername: currentUsername(),
		version: AGENT_VERSION,
	};
}

/**
 * Headers that tie a request to an agent identity.
 */
export function buildIdentityHeaders(machine: ResultMachine): Record<string, string> {
	return {
		"user-agent": `timeline-agent/${machine.version}`,
		"x-agent-name": machine.name,
		"x-agent-fqdn": machine.fqdn,
		"x-agent-host": machine.host,
		"x-agent-ip": machine.ipAddress,
		"x-agent-user": machine.currentUsername,
		"x-agent-version": machine.version,
	};
}
