export { Journal } from "./journal.js";
export type { JournalOptions, JournalListener } from "./journal.js";
export { redactPayload, REDACTED } from "./redact.js";
export { ConsoleLogger, createLogger, resolveLogLevel, silentLogger } from "./logger.js";
