export { LoggerImpl, type LogSink } from "./logger-impl.js";
export { LOG_LEVELS, type LogLevel, getCurrentLevel, isLogLevel, parseLogLevel, setLogLevel } from "./log-level.js";
