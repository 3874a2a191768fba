export type { Logger, LogLevel } from "./types.js";
export { LOG_LEVELS } from "./types.js";
export { createScopedLogger, createNoOpLogger, formatLogLine } from "./scoped.js";
export type { LogEntry, MockLogger } from "./testing.js";
export { createMockLogger } from "./testing.js";
