/**
 * Shared package public API: wire types, constants and update decoding.
 */

export * from "./constants.js";
export * from "./types/timeline.js";
export * from "./types/results.js";
export type * from "./types/update.js";
export { UpdateDecodeError, decodeEnvelope, decodeUpdate, parseUpdateEnvelope } from "./update-decoder.js";
