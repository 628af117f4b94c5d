export { GameAction, validateAction, ACTION_KINDS } from "./game-action.js";
export type { ActionKind, ActionContext } from "./game-action.js";
export { actionSuccess, actionFailure, subGoalRequest, requestFingerprint } from "./results.js";
export { translateApiError, PRIORITY } from "./translate.js";
export type { FailureContext } from "./translate.js";
export {
  MoveAction,
  moveActionName,
  FightAction,
  GatherAction,
  RestAction,
  CraftAction,
  EquipAction,
  DepositAction,
  WaitAction,
} from "./kinds/index.js";
export {
  ParameterizedActionFactory,
  MovementActionFactory,
  CombatActionFactory,
  GatheringActionFactory,
  CraftingActionFactory,
  EquipmentActionFactory,
  RestActionFactory,
  BankActionFactory,
  WaitActionFactory,
} from "./factories.js";
export type { ActionFactory, MovementFactoryOptions } from "./factories.js";
export { ActionRegistry, createDefaultRegistry } from "./action-registry.js";
export type { DefaultRegistryOptions } from "./action-registry.js";
export { positionOf, nearestContentTile, contentTiles } from "./world-queries.js";
