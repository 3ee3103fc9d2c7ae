export { UndiciHttpTransport } from "./http-transport.js";
export { buildIdentityHeaders, buildResultMachine } from "./result-machine.js";
export { TransportBuilderImpl, type TransportOptions } from "./transport-builder.js";
