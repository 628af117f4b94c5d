import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { GoalFactoryError } from "@goapbot/schemas";
import { BUNDLED_TEMPLATES_PATH, goalFromTemplate, loadGoalTemplates } from "./templates.js";
import { FreeInventoryGoal, LevelGoal, MovementGoal, SkillLevelGoal, StateGoal } from "./goals.js";

const TEST_DIR = resolve(fileURLToPath(new URL(".", import.meta.url)), "../../.test-data/goals");

describe("loadGoalTemplates", () => {
  beforeEach(async () => {
    await mkdir(TEST_DIR, { recursive: true });
  });

  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  it("loads the bundled templates", async () => {
    const templates = await loadGoalTemplates();
    expect(BUNDLED_TEMPLATES_PATH.endsWith("goal-templates.yaml")).toBe(true);
    expect(templates.reach_level_2).toEqual({
      type: "level",
      description: "Fight until the character reaches level 2",
      priority: 5,
      params: { level: 2 },
    });
    for (const [name, template] of Object.entries(templates)) {
      expect(() => goalFromTemplate(name, template)).not.toThrow();
    }
  });

  it("reads a custom file", async () => {
    const file = resolve(TEST_DIR, "custom.yaml");
    await writeFile(file, "goal_templates:\n  bank_run:\n    type: move\n    params: { x: 0, y: 0 }\n", "utf-8");
    const templates = await loadGoalTemplates(file);
    expect(Object.keys(templates)).toEqual(["bank_run"]);
  });

  it("rejects an invalid file", async () => {
    const file = resolve(TEST_DIR, "bad.yaml");
    await writeFile(file, "goal_templates:\n  BadName:\n    type: level\n", "utf-8");
    await expect(loadGoalTemplates(file)).rejects.toThrow(`Invalid goal templates at "${file}"`);
  });

  it("rejects a missing file", async () => {
    const file = resolve(TEST_DIR, "missing.yaml");
    await expect(loadGoalTemplates(file)).rejects.toThrow(`Goal templates not found: ${file}`);
  });
});

describe("goalFromTemplate", () => {
  it("builds each template type", () => {
    expect(goalFromTemplate("lvl", { type: "level", params: { level: 3 } })).toBeInstanceOf(LevelGoal);
    expect(goalFromTemplate("mine", { type: "skill_level", params: { skill: "mining", level: 2 } })).toBeInstanceOf(
      SkillLevelGoal,
    );
    expect(goalFromTemplate("armed", { type: "state", params: { target_state: { weapon_equipped: true } } })).toBeInstanceOf(
      StateGoal,
    );
    expect(goalFromTemplate("bank", { type: "move", params: { x: 0, y: 0 } })).toBeInstanceOf(MovementGoal);
    expect(goalFromTemplate("empty", { type: "free_inventory" })).toBeInstanceOf(FreeInventoryGoal);
  });

  it("carries name, priority and timeout", () => {
    const goal = goalFromTemplate("grind", { type: "level", priority: 3, timeout_seconds: 60, params: { level: 4 } });
    expect([goal.name, goal.priority, goal.timeoutSeconds]).toEqual(["grind", 3, 60]);
  });

  it("validates parameters per type", () => {
    expect(() => goalFromTemplate("bad", { type: "skill_level", params: { skill: "dancing", level: 2 } })).toThrow(
      GoalFactoryError,
    );
    expect(() => goalFromTemplate("bad", { type: "level", params: {} })).toThrow(GoalFactoryError);
  });
});
