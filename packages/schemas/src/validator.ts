import Ajv, { type ErrorObject } from "ajv";
import addFormats from "ajv-formats";
import { RunRecordSchema, TurnRecordSchema } from "./run-record.schema.js";
import type { RunRecord, TurnRecord } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats has a nested .default in ESM due to CJS interop; take whichever export holds the plugin.
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const validateRunRecord = ajv.compile<RunRecord>(RunRecordSchema);
const validateTurnRecord = ajv.compile<TurnRecord>(TurnRecordSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateRunRecordData(data: unknown): ValidationResult {
  const valid = validateRunRecord(data);
  return toResult(valid, validateRunRecord.errors);
}

export function validateTurnRecordData(data: unknown): ValidationResult {
  const valid = validateTurnRecord(data);
  return toResult(valid, validateTurnRecord.errors);
}

/** Type guard over the same schema; use when the caller needs the narrowed value. */
export function isRunRecord(data: unknown): data is RunRecord {
  return validateRunRecord(data);
}
