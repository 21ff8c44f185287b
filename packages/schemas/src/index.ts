export * from "./types.js";
export { RunRecordSchema, TurnRecordSchema } from "./run-record.schema.js";
export { validateRunRecordData, validateTurnRecordData, isRunRecord } from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { TimeoutError, withTimeout } from "./timeout.js";
