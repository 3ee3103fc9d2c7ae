// =============================================================================
// Outbound Payloads
// =============================================================================

/**
 * Body for POST to the results endpoint in plaintext mode.
 * One batch of raw activity log text captured during a rotation.
 */
export interface TransferLogDump {
	/** Raw log text, exactly as read from the rotated file */
	Log: string;
}

/**
 * Envelope around an encrypted JSON document.
 * `Payload` holds base64 of the cipher output for the serialized inner document.
 */
export interface EncryptedPayload {
	Payload: string;
}

// =============================================================================
// Opaque Documents
// =============================================================================

/**
 * Latest health snapshot pushed by the server.
 * Persisted verbatim; the agent does not interpret its fields.
 */
export type ResultHealth = Record<string, unknown>;

/**
 * Survey artifact produced by an external collector and posted once.
 */
export type Survey = Record<string, unknown>;

/**
 * Type guard to check if a value is an EncryptedPayload
 */
export function isEncryptedPayload(value: unknown): value is EncryptedPayload {
	return typeof value === "object"
		&& value !== null
		&& "Payload" in value
		&& typeof value.Payload === "string";
}

/**
 * Type guard to check if a value is a TransferLogDump
 */
export function isTransferLogDump(value: unknown): value is TransferLogDump {
	return typeof value === "object"
		&& value !== null
		&& "Log" in value
		&& typeof value.Log === "string";
}
