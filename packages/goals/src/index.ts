export {
  StateGoal,
  MovementGoal,
  WorkshopMovementGoal,
  RestGoal,
  ObtainItemGoal,
  EquipmentGoal,
  CraftGoal,
  FreeInventoryGoal,
  WaitForCooldownGoal,
  LevelGoal,
  SkillLevelGoal,
  isGoal,
} from "./goals.js";
export type { GoalOptions } from "./goals.js";
export { GoalManager, selectGoal } from "./goal-manager.js";
export type { GoalInput, GoalManagerOptions, PlanOutcome } from "./goal-manager.js";
export { builtinSubGoals } from "./sub-goals.js";
export type { SubGoalDefinition, SubGoalFactory, SubGoalParameters } from "./sub-goals.js";
export { BUNDLED_TEMPLATES_PATH, loadGoalTemplates, goalFromTemplate } from "./templates.js";
