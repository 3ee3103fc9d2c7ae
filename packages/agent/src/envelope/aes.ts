import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from "node:crypto";

const ALGORITHM = "aes-256-cbc";
const KEY_BYTES = 32;
const IV_BYTES = 16;
const PBKDF2_ITERATIONS = 1000;
const IV_LENGTH_PREFIX_BYTES = 4;

function deriveKey(secret: string, salt: string): Buffer {
	if (secret.length === 0) {
		throw new Error("Encryption secret must not be empty");
	}
	return pbkdf2Sync(secret, salt, PBKDF2_ITERATIONS, KEY_BYTES, "sha1");
}

/**
 * Encrypt text with a key derived from `secret`.
 * Output is base64 of: IV length (int32 LE) | IV | ciphertext.
 */
export function encryptString(plaintext: string, secret: string, salt: string): string {
	const key = deriveKey(secret, salt);
	const iv = randomBytes(IV_BYTES);
	const cipher = createCipheriv(ALGORITHM, key, iv);
	const encrypted = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);

	const prefix = Buffer.alloc(IV_LENGTH_PREFIX_BYTES);
	prefix.writeInt32LE(iv.length);

	return Buffer.concat([prefix, iv, encrypted]).toString("base64");
}

/**
 * Inverse of encryptString.
 */
export function decryptString(ciphertext: string, secret: string, salt: string): string {
	const raw = Buffer.from(ciphertext, "base64");
	if (raw.length < IV_LENGTH_PREFIX_BYTES) {
		throw new Error("Corrupted ciphertext payload");
	}

	const ivLength = raw.readInt32LE(0);
	if (ivLength !== IV_BYTES || raw.length < IV_LENGTH_PREFIX_BYTES + ivLength) {
		throw new Error("Corrupted ciphertext payload");
	}

	const iv = raw.subarray(IV_LENGTH_PREFIX_BYTES, IV_LENGTH_PREFIX_BYTES + ivLength);
	const encrypted = raw.subarray(IV_LENGTH_PREFIX_BYTES + ivLength);
	const decipher = createDecipheriv(ALGORITHM, deriveKey(secret, salt), iv);
	return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString("utf8");
}
