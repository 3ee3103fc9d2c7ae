export { LogRotatorImpl, type LogRotatorOptions } from "./log-rotator.js";
export { ResultRelayImpl, type ResultRelayOptions } from "./result-relay.js";
export { SurveyReporterImpl, type SurveyReporterOptions } from "./survey-reporter.js";
