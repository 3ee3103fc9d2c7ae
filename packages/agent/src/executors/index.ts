export { HTTP_HANDLER_TYPE, HttpExecutor } from "./http.js";
