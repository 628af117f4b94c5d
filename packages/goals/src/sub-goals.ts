import { GoalFactoryError, SubGoalParameterSchemas, isEquipmentSlot } from "@goapbot/schemas";
import type { Goal, GoalFactoryContext, SubGoalParameter, SubGoalRequest } from "@goapbot/schemas";
import {
  CraftGoal,
  EquipmentGoal,
  FreeInventoryGoal,
  MovementGoal,
  ObtainItemGoal,
  RestGoal,
  WaitForCooldownGoal,
  WorkshopMovementGoal,
} from "./goals.js";

export type SubGoalParameters = Readonly<Record<string, SubGoalParameter>>;

/** Builds a goal for one sub-goal type from already-validated parameters. */
export type SubGoalFactory = (params: SubGoalParameters, request: SubGoalRequest, context: GoalFactoryContext) => Goal;

export interface SubGoalDefinition {
  factory: SubGoalFactory;
  /** JSON schema for the parameters, checked with ajv before the factory runs. */
  schema?: Record<string, unknown>;
}

function int(params: SubGoalParameters, type: string, key: string): number {
  const value = params[key];
  if (typeof value !== "number") throw new GoalFactoryError(type, [`"${key}" must be a number`]);
  return value;
}

function optionalNumber(params: SubGoalParameters, key: string): number | undefined {
  const value = params[key];
  return typeof value === "number" ? value : undefined;
}

function str(params: SubGoalParameters, type: string, key: string): string {
  const value = params[key];
  if (typeof value !== "string") throw new GoalFactoryError(type, [`"${key}" must be a string`]);
  return value;
}

function optionalString(params: SubGoalParameters, key: string): string | undefined {
  const value = params[key];
  return typeof value === "string" ? value : undefined;
}

const BUILTIN_FACTORIES: Record<string, SubGoalFactory> = {
  move_to_location: (p, r) =>
    new MovementGoal(int(p, r.goal_type, "target_x"), int(p, r.goal_type, "target_y"), { priority: r.priority }),
  reach_hp_threshold: (p, r) => new RestGoal(optionalNumber(p, "min_hp_percentage"), { priority: r.priority }),
  obtain_item: (p, r) =>
    new ObtainItemGoal(str(p, r.goal_type, "item_code"), optionalNumber(p, "quantity"), { priority: r.priority }),
  gather_material: (p, r) =>
    new ObtainItemGoal(str(p, r.goal_type, "material_code"), optionalNumber(p, "quantity"), { priority: r.priority }),
  equip_item_type: (p, r) => {
    const slot = str(p, r.goal_type, "item_type");
    if (!isEquipmentSlot(slot)) throw new GoalFactoryError(r.goal_type, [`unknown equipment slot "${slot}"`]);
    return new EquipmentGoal(slot, { priority: r.priority });
  },
  move_to_workshop: (p, r) =>
    new WorkshopMovementGoal(
      int(p, r.goal_type, "workshop_x"),
      int(p, r.goal_type, "workshop_y"),
      optionalString(p, "workshop_type"),
      { priority: r.priority },
    ),
  execute_craft: (p, r) =>
    new CraftGoal(str(p, r.goal_type, "recipe_code"), optionalString(p, "workshop_type"), { priority: r.priority }),
  free_inventory_space: (_p, r) => new FreeInventoryGoal({ priority: r.priority }),
  wait_for_cooldown: (_p, r) => new WaitForCooldownGoal({ priority: r.priority }),
};

export function builtinSubGoals(): Map<string, SubGoalDefinition> {
  const definitions = new Map<string, SubGoalDefinition>();
  for (const [type, factory] of Object.entries(BUILTIN_FACTORIES)) {
    const schema = SubGoalParameterSchemas[type];
    definitions.set(type, schema ? { factory, schema } : { factory });
  }
  return definitions;
}
