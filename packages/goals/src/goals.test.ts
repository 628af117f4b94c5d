import { describe, it, expect } from "vitest";
import { StateValidationError } from "@goapbot/schemas";
import {
  CraftGoal,
  EquipmentGoal,
  FreeInventoryGoal,
  LevelGoal,
  MovementGoal,
  ObtainItemGoal,
  RestGoal,
  SkillLevelGoal,
  StateGoal,
  WaitForCooldownGoal,
  WorkshopMovementGoal,
  isGoal,
} from "./goals.js";

describe("StateGoal", () => {
  it("keeps a validated literal target", () => {
    const goal = new StateGoal({ weapon_equipped: true, current_x: 3 });
    expect(goal.name).toBe("state { weapon_equipped: true, current_x: 3 }");
    expect(goal.getTargetState()).toEqual({ weapon_equipped: true, current_x: 3 });
    expect(goal.isSatisfied({ weapon_equipped: true, current_x: 3, current_y: 0 })).toBe(true);
    expect(goal.isSatisfied({ weapon_equipped: true })).toBe(false);
    expect(goal.priority).toBe(0);
    expect(goal.timeoutSeconds).toBeUndefined();
  });

  it("rejects keys outside the vocabulary", () => {
    expect(() => new StateGoal({ flying: true })).toThrow(StateValidationError);
  });

  it("takes name, priority and timeout from options", () => {
    const goal = new StateGoal({ hp_low: false }, { name: "healthy", priority: 4, timeoutSeconds: 30 });
    expect([goal.name, goal.priority, goal.timeoutSeconds]).toEqual(["healthy", 4, 30]);
  });
});

describe("movement goals", () => {
  it("targets the coordinates", () => {
    const goal = new MovementGoal(4, 1);
    expect(goal.name).toBe("move_to_4_1");
    expect(goal.getTargetState()).toEqual({ current_x: 4, current_y: 1 });
    expect(goal.describe()).toBe("Move to (4, 1)");
  });

  it("also requires standing in a workshop", () => {
    const goal = new WorkshopMovementGoal(1, 2, "weaponcrafting");
    expect(goal.name).toBe("move_to_workshop_1_2");
    expect(goal.getTargetState()).toEqual({ current_x: 1, current_y: 2, at_workshop_location: true });
    expect(goal.describe()).toBe("Move to the weaponcrafting workshop at (1, 2)");
    expect(new WorkshopMovementGoal(1, 2).describe()).toBe("Move to the workshop at (1, 2)");
  });
});

describe("RestGoal", () => {
  it("is satisfied by the HP ratio", () => {
    const goal = new RestGoal(0.5);
    expect(goal.isSatisfied({ hp_current: 60, hp_max: 100, hp_low: true })).toBe(true);
    expect(goal.isSatisfied({ hp_current: 40, hp_max: 100, hp_low: false, safe_to_fight: true })).toBe(false);
    expect(goal.getTargetState()).toEqual({ hp_low: false, safe_to_fight: true });
  });

  it("asks for full HP while below the threshold", () => {
    const goal = new RestGoal(0.8);
    const wounded = { hp_current: 55, hp_max: 100, hp_low: false, safe_to_fight: true };
    expect(goal.isSatisfied(wounded)).toBe(false);
    expect(goal.getTargetState(wounded)).toEqual({ hp_low: false, safe_to_fight: true, hp_current: 100 });
    expect(goal.getTargetState({ hp_current: 80, hp_max: 100 })).toEqual({ hp_low: false, safe_to_fight: true });
  });

  it("falls back to the target when HP is unknown", () => {
    const goal = new RestGoal();
    expect(goal.minHpPercentage).toBe(0.5);
    expect(goal.isSatisfied({ hp_low: false, safe_to_fight: true })).toBe(true);
    expect(goal.isSatisfied({})).toBe(false);
    expect(goal.describe()).toBe("Rest until HP is at least 50%");
  });
});

describe("progress goals", () => {
  it("plans for XP until the level is reached", () => {
    const goal = new LevelGoal(2);
    expect(goal.getTargetState({ character_level: 1 })).toEqual({ gained_xp: true });
    expect(goal.isSatisfied({ character_level: 1, gained_xp: true })).toBe(false);
    expect(goal.isSatisfied({ character_level: 2 })).toBe(true);
    expect(goal.getTargetState({ character_level: 3 })).toEqual({});
  });

  it("plans for skill XP until the skill level is reached", () => {
    const goal = new SkillLevelGoal("mining", 3);
    expect(goal.name).toBe("mining_3");
    expect(goal.getTargetState({ mining_level: 2 })).toEqual({ gained_skill_xp: "mining" });
    expect(goal.isSatisfied({ mining_level: 3 })).toBe(true);
    expect(goal.describe()).toBe("Reach mining level 3");
  });
});

describe("item and slot goals", () => {
  it("targets the obtained item", () => {
    expect(new ObtainItemGoal("copper_ore", 2).getTargetState()).toEqual({ item_obtained: "copper_ore" });
    expect(new ObtainItemGoal("copper_ore", 2).describe()).toBe("Obtain copper_ore x2");
    expect(new CraftGoal("copper_dagger", "weaponcrafting").getTargetState()).toEqual({ item_obtained: "copper_dagger" });
  });

  it("holds only once the observed count reaches the quantity", () => {
    const goal = new ObtainItemGoal("copper_ore", 2);
    expect(goal.isSatisfied({ item_obtained: "copper_ore", item_quantity: 1 })).toBe(false);
    expect(goal.isSatisfied({ item_obtained: "copper_ore", item_quantity: 2 })).toBe(true);
    expect(goal.isSatisfied({ item_obtained: "ash_wood", item_quantity: 5 })).toBe(false);
    expect(goal.isSatisfied({})).toBe(false);
    expect(new ObtainItemGoal("copper_ore").isSatisfied({ item_obtained: "copper_ore" })).toBe(true);
  });

  it("targets the slot flag", () => {
    const goal = new EquipmentGoal("weapon");
    expect(goal.getTargetState()).toEqual({ weapon_equipped: true });
    expect(goal.describe()).toBe("Equip a weapon");
  });

  it("targets inventory space and cooldown", () => {
    expect(new FreeInventoryGoal().getTargetState()).toEqual({ inventory_full: false, inventory_space_available: true });
    expect(new WaitForCooldownGoal().describe()).toBe("Wait for cooldown");
    expect(new WaitForCooldownGoal().isSatisfied({ cooldown_ready: true })).toBe(true);
  });
});

describe("isGoal", () => {
  it("recognises goal objects", () => {
    expect(isGoal(new FreeInventoryGoal())).toBe(true);
    expect(isGoal({ current_x: 1 })).toBe(false);
    expect(isGoal(null)).toBe(false);
  });
});
