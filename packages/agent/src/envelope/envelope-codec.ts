import type { EncryptedPayload } from "@timeline-agent/shared";
import { isEncryptedPayload } from "@timeline-agent/shared";
import { decryptString, encryptString } from "./aes.js";

/**
 * Key material for the optional confidentiality layer.
 */
export interface EnvelopeKey {
	/** The agent identity (`ResultMachine.name`) */
	secret: string;
	salt: string;
}

/**
 * Serialize an outbound payload.
 * - not secure: JSON(payload)
 * - secure: JSON({ Payload: base64(encrypt(JSON(payload))) })
 */
export function encodePayload(payload: unknown, key: EnvelopeKey, secure: boolean): string {
	const json = JSON.stringify(payload);
	if (!secure) {
		return json;
	}

	const encrypted = encryptString(json, key.secret, key.salt);
	const envelope: EncryptedPayload = {
		Payload: Buffer.from(encrypted, "utf8").toString("base64"),
	};
	return JSON.stringify(envelope);
}

/**
 * Recover the inner JSON document from an encoded body.
 * Plain bodies are returned as-is; enveloped bodies are unwrapped and decrypted.
 */
export function decodePayload(body: string, key: EnvelopeKey): string {
	const parsed: unknown = JSON.parse(body);
	if (!isEncryptedPayload(parsed)) {
		return body;
	}
	const encrypted = Buffer.from(parsed.Payload, "base64").toString("utf8");
	return decryptString(encrypted, key.secret, key.salt);
}
