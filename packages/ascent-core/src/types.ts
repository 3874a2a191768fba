/**
 * Structured payload of a log line or of an error's context.
 */
export type UnknownRecord = Record<string, unknown>;
