import { describe, it, expect } from "vitest";
import { StateConsistencyError } from "@goapbot/schemas";
import { ObtainItemGoal, RestGoal } from "@goapbot/goals";
import { assertStateConsistency, assertSubGoalReached } from "./consistency.js";

function violationsOf(fn: () => void): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof StateConsistencyError) return err.violations;
    throw err;
  }
  return [];
}

describe("assertStateConsistency", () => {
  it("accepts progress and unrelated changes", () => {
    expect(() =>
      assertStateConsistency(
        { character_level: 2, mining_level: 1, weapon_equipped: true, current_x: 0 },
        { character_level: 3, mining_level: 1, weapon_equipped: true, current_x: 4 },
        { current_x: 4 },
      ),
    ).not.toThrow();
  });

  it("flags a level that went down", () => {
    expect(violationsOf(() => assertStateConsistency({ mining_level: 3 }, { mining_level: 2 }))).toEqual([
      "mining_level decreased from 3 to 2",
    ]);
  });

  it("flags an emptied equipment slot", () => {
    expect(violationsOf(() => assertStateConsistency({ weapon_equipped: true }, { weapon_equipped: false }))).toEqual([
      "weapon_equipped was lost",
    ]);
  });

  it("ignores slots and levels missing on either side", () => {
    expect(() => assertStateConsistency({ weapon_equipped: true, character_level: 4 }, {})).not.toThrow();
  });

  it("flags an unreached target", () => {
    expect(
      violationsOf(() =>
        assertStateConsistency({}, { current_x: 1 }, { current_x: 4, item_obtained: "copper_ore" }),
      ),
    ).toEqual(['target current_x=4 not reached (is 1)', 'target item_obtained="copper_ore" not reached (is unknown)']);
  });

  it("reports every violation in one error", () => {
    expect(() =>
      assertStateConsistency(
        { character_level: 2, helmet_equipped: true },
        { character_level: 1, helmet_equipped: false },
      ),
    ).toThrow("State consistency violated: character_level decreased from 2 to 1; helmet_equipped was lost");
  });
});

describe("assertSubGoalReached", () => {
  it("accepts a goal that holds afterwards", () => {
    expect(() =>
      assertSubGoalReached({}, { item_obtained: "copper_ore", item_quantity: 2 }, new ObtainItemGoal("copper_ore", 2)),
    ).not.toThrow();
  });

  it("flags a goal whose target holds but whose own test does not", () => {
    expect(
      violationsOf(() =>
        assertSubGoalReached({}, { item_obtained: "copper_ore", item_quantity: 1 }, new ObtainItemGoal("copper_ore", 2)),
      ),
    ).toEqual(["goal obtain_copper_ore is not satisfied"]);
  });

  it("judges the target from the state before the sub-goal", () => {
    const goal = new RestGoal(0.8);
    expect(
      violationsOf(() =>
        assertSubGoalReached(
          { hp_current: 55, hp_max: 100, hp_low: false, safe_to_fight: true },
          { hp_current: 70, hp_max: 100, hp_low: false, safe_to_fight: true },
          goal,
        ),
      ),
    ).toEqual(["target hp_current=100 not reached (is 70)"]);
  });
});
