import { UPDATE_TYPE } from "./constants.js";
import { isTimeline } from "./types/timeline.js";
import type { ServerUpdate, UpdateEnvelope } from "./types/update.js";

/** Identifier the server sends when a request is not scoped to one timeline */
const EMPTY_TIMELINE_ID = "00000000-0000-0000-0000-000000000000";

/**
 * Error thrown when a poll response body cannot be decoded into an update.
 */
export class UpdateDecodeError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UpdateDecodeError";
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Servers may send a nested document either inline or as a JSON string.
 */
function unwrapJson(value: unknown): unknown {
	if (typeof value !== "string") {
		return value;
	}
	try {
		return JSON.parse(value);
	} catch {
		return value;
	}
}

/**
 * Parse a poll response body into its wire envelope.
 * @throws UpdateDecodeError if the body is not JSON or has no string `Type`.
 */
export function parseUpdateEnvelope(body: string): UpdateEnvelope {
	let parsed: unknown;
	try {
		parsed = JSON.parse(body);
	} catch (err) {
		throw new UpdateDecodeError(`Update body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
	}

	if (!isRecord(parsed) || typeof parsed.Type !== "string") {
		throw new UpdateDecodeError("Update body has no Type field");
	}

	return { Type: parsed.Type, Update: parsed.Update };
}

function decodeTimelineId(update: unknown): string | null {
	const value = unwrapJson(update);
	if (!isRecord(value)) {
		return null;
	}
	const id = value.TimelineId;
	if (typeof id !== "string" || id === "" || id === EMPTY_TIMELINE_ID) {
		return null;
	}
	return id;
}

/**
 * Decode a wire envelope into a ServerUpdate by its tag.
 * Unrecognized types decode to an Unknown update rather than failing.
 * @throws UpdateDecodeError if the payload does not match the shape its type requires.
 */
export function decodeEnvelope(envelope: UpdateEnvelope): ServerUpdate {
	switch (envelope.Type) {
		case UPDATE_TYPE.REQUEST_FOR_TIMELINE:
			return { kind: "RequestForTimeline", timelineId: decodeTimelineId(envelope.Update) };

		case UPDATE_TYPE.TIMELINE: {
			const { Update } = envelope;
			if (Update === undefined || Update === null) {
				throw new UpdateDecodeError("Timeline update has no payload");
			}
			const raw = typeof Update === "string" ? Update : JSON.stringify(Update, null, 2);
			return { kind: "Timeline", raw };
		}

		case UPDATE_TYPE.TIMELINE_PARTIAL: {
			const timeline = unwrapJson(envelope.Update);
			if (!isTimeline(timeline)) {
				throw new UpdateDecodeError("TimelinePartial update is not a timeline");
			}
			return { kind: "TimelinePartial", timeline };
		}

		case UPDATE_TYPE.HEALTH: {
			const health = unwrapJson(envelope.Update);
			if (!isRecord(health)) {
				throw new UpdateDecodeError("Health update is not an object");
			}
			return { kind: "Health", health };
		}

		default:
			return { kind: "Unknown", type: envelope.Type };
	}
}

/**
 * Decode a poll response body into a ServerUpdate.
 * @throws UpdateDecodeError if the body or its payload is malformed.
 */
export function decodeUpdate(body: string): ServerUpdate {
	return decodeEnvelope(parseUpdateEnvelope(body));
}
