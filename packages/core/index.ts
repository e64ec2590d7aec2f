export * from "./types";
export * from "./config";
export * from "./errors";
export * from "./strategies";
export * from "./resolve";
export * from "./heal";
export * from "./resolve-telemetry";
export {
  consoleLogger,
  createConsoleLogger,
  isLevelEnabled,
  type LocatorLogger,
  type LogContext,
  type LogLevel,
  type LogSink
} from "./debug";
export { describeAnchor, maskText, sanitizeText, MASK_PLACEHOLDER } from "./utils/sanitize";
