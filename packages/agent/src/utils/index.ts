export { formatError, toError } from "./format-error.js";
export { jitter } from "./jitter.js";
export { sleep } from "./sleep.js";
