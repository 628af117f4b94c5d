export type {
  GameApiClient,
  GameApiMethod,
  ActionResponse,
  FightResponse,
  SkillResponse,
  RestResponse,
  EquipResponse,
  DepositResponse,
} from "./client.js";
export {
  STATUS_MESSAGES,
  statusMessage,
  GameApiError,
  CooldownActiveError,
  InventoryFullError,
  AlreadyAtDestinationError,
  ContentNotFoundError,
  MissingItemsError,
  SkillLevelTooLowError,
  InsufficientHpError,
  CharacterNotFoundError,
  RateLimitedError,
  TransportError,
  errorFromStatus,
} from "./errors.js";
export { GameClientStateSource } from "./state-source.js";
export type { StateSource } from "./state-source.js";
export { InMemoryGameClient } from "./in-memory-client.js";
export type { InMemoryGameClientOptions, CooldownTable, RecordedCall } from "./in-memory-client.js";
export { ManualClock } from "./clock.js";
export { sampleWorld, sampleCharacter } from "./fixtures.js";
