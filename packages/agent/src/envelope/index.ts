export { decryptString, encryptString } from "./aes.js";
export { decodePayload, encodePayload, type EnvelopeKey } from "./envelope-codec.js";
