export {
  GameState,
  isStateKey,
  allStateKeys,
  GATHERING_SKILLS,
  CRAFTING_SKILLS,
  SKILLS,
  isSkill,
  skillLevelKey,
  skillXpKey,
  EQUIPMENT_SLOTS,
  isEquipmentSlot,
  slotEquippedKey,
  MONOTONIC_LEVEL_KEYS,
  EQUIPMENT_KEYS,
  EVENT_FLAG_KEYS,
} from "./state-keys.js";
export type { StateKey, StateKeyName, Skill, GatheringSkill, EquipmentSlot } from "./state-keys.js";
export {
  isStateValue,
  validateStateDict,
  stateEntries,
  stateMatches,
  unsatisfiedEntries,
  applyStateChanges,
  stateFrom,
  withoutKeys,
  worldStatesEqual,
  canonicalStateKey,
  formatState,
} from "./world-state.js";
export type { StateValue, WorldState } from "./world-state.js";
export {
  HP_CRITICAL_RATIO,
  SAFE_TO_FIGHT_RATIO,
  hpRatio,
  inventoryUsed,
  inventoryQuantity,
  findTile,
  locationFlags,
  characterToStateDict,
  characterToWorldState,
  readInteger,
  readBoolean,
  readString,
} from "./character.js";
export {
  StateValidationError,
  StateConsistencyError,
  ActionDefinitionError,
  DuplicateActionError,
  NoValidGoalError,
  UnknownGoalTypeError,
  GoalFactoryError,
  NoPlanFoundError,
  MaxDepthExceededError,
  errorMessage,
} from "./errors.js";
export * from "./types.js";
export { JOURNAL_EVENT_TYPES, JournalEventSchema } from "./journal-event.schema.js";
export { WorldSnapshotSchema, CharacterSchema } from "./world.schema.js";
export {
  SubGoalParameterSchemas,
  SubGoalRequestSchema,
  GoalTemplateParameterSchemas,
  GoalTemplatesFileSchema,
} from "./goal.schema.js";
export {
  validateJournalEventData,
  validateWorldSnapshotData,
  validateCharacterData,
  validateGoalTemplatesData,
  validateSubGoalRequestData,
  validateWithSchema,
  clearSchemaCache,
  parseWorldSnapshot,
  parseCharacter,
  parseGoalTemplatesFile,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { TimeoutError, withTimeout, deadlinePassed } from "./timeout.js";
