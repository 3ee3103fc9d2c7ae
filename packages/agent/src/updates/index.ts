export { UpdatePollerImpl, type UpdatePollerOptions } from "./update-poller.js";
