import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { JournalEventSchema } from "./journal-event.schema.js";
import { CharacterSchema, WorldSnapshotSchema } from "./world.schema.js";
import { GoalTemplatesFileSchema, SubGoalRequestSchema } from "./goal.schema.js";
import type { Character, GoalTemplatesFile, SubGoalRequest, WorldSnapshot } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats exposes its plugin on a nested .default under ESM-CJS interop
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const MAX_SCHEMA_CACHE = 200;
const schemaCache = new Map<string, ValidateFunction>();

function getOrCompile(schema: Record<string, unknown>): ValidateFunction {
  const key = JSON.stringify(schema);
  let validate = schemaCache.get(key);
  if (!validate) {
    if (schemaCache.size >= MAX_SCHEMA_CACHE) {
      const oldest = schemaCache.keys().next().value;
      if (oldest !== undefined) schemaCache.delete(oldest);
    }
    validate = ajv.compile(schema);
    schemaCache.set(key, validate);
  }
  return validate;
}

export function clearSchemaCache(): void {
  schemaCache.clear();
}

const validateJournalEvent = ajv.compile(JournalEventSchema);
const validateWorldSnapshot = ajv.compile<WorldSnapshot>(WorldSnapshotSchema);
const validateCharacter = ajv.compile<Character>(CharacterSchema);
const validateGoalTemplates = ajv.compile<GoalTemplatesFile>(GoalTemplatesFileSchema);
const validateSubGoalRequest = ajv.compile<SubGoalRequest>(SubGoalRequestSchema);

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

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}

export function validateWorldSnapshotData(data: unknown): ValidationResult {
  const valid = validateWorldSnapshot(data);
  return toResult(valid, validateWorldSnapshot.errors);
}

export function validateCharacterData(data: unknown): ValidationResult {
  const valid = validateCharacter(data);
  return toResult(valid, validateCharacter.errors);
}

export function validateGoalTemplatesData(data: unknown): ValidationResult {
  const valid = validateGoalTemplates(data);
  return toResult(valid, validateGoalTemplates.errors);
}

export function validateSubGoalRequestData(data: unknown): ValidationResult {
  const valid = validateSubGoalRequest(data);
  return toResult(valid, validateSubGoalRequest.errors);
}

export function validateWithSchema(data: unknown, schema: Record<string, unknown>): ValidationResult {
  const validate = getOrCompile(schema);
  const valid = validate(data);
  return toResult(valid, validate.errors);
}

// ─── Typed parsing ──────────────────────────────────────────────────

export function parseWorldSnapshot(data: unknown): WorldSnapshot {
  if (validateWorldSnapshot(data)) return data;
  const { errors } = toResult(false, validateWorldSnapshot.errors);
  throw new Error(`Invalid world snapshot: ${errors.join(", ")}`);
}

export function parseCharacter(data: unknown): Character {
  if (validateCharacter(data)) return data;
  const { errors } = toResult(false, validateCharacter.errors);
  throw new Error(`Invalid character: ${errors.join(", ")}`);
}

export function parseGoalTemplatesFile(data: unknown): GoalTemplatesFile {
  if (validateGoalTemplates(data)) return data;
  const { errors } = toResult(false, validateGoalTemplates.errors);
  throw new Error(`Invalid goal templates: ${errors.join(", ")}`);
}
