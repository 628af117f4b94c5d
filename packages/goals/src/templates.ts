import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import {
  GoalFactoryError,
  GoalTemplateParameterSchemas,
  isSkill,
  parseGoalTemplatesFile,
  validateWithSchema,
} from "@goapbot/schemas";
import type { Goal, GoalTemplate } from "@goapbot/schemas";
import {
  FreeInventoryGoal,
  LevelGoal,
  MovementGoal,
  RestGoal,
  SkillLevelGoal,
  StateGoal,
} from "./goals.js";
import type { GoalOptions } from "./goals.js";

export const BUNDLED_TEMPLATES_PATH = fileURLToPath(new URL("../config/goal-templates.yaml", import.meta.url));

/** Reads and validates a goal templates file. Defaults to the bundled one. */
export async function loadGoalTemplates(filePath: string = BUNDLED_TEMPLATES_PATH): Promise<Record<string, GoalTemplate>> {
  if (!existsSync(filePath)) throw new Error(`Goal templates not found: ${filePath}`);
  const content = await readFile(filePath, "utf-8");
  const data: unknown = yaml.load(content);
  try {
    return parseGoalTemplatesFile(data).goal_templates;
  } catch (err) {
    throw new Error(`Invalid goal templates at "${filePath}": ${err instanceof Error ? err.message : String(err)}`);
  }
}

function numberParam(params: Record<string, unknown>, key: string): number | undefined {
  const value = params[key];
  return typeof value === "number" ? value : undefined;
}

function required<T>(value: T | undefined, type: string, key: string): T {
  if (value === undefined) throw new GoalFactoryError(type, [`missing "${key}"`]);
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Builds the goal a template describes. Parameters are checked against the type's schema first. */
export function goalFromTemplate(name: string, template: GoalTemplate): Goal {
  const params = template.params ?? {};
  const schema = GoalTemplateParameterSchemas[template.type];
  if (schema) {
    const validation = validateWithSchema(params, schema);
    if (!validation.valid) throw new GoalFactoryError(template.type, validation.errors);
  }

  const options: GoalOptions = { name };
  if (template.priority !== undefined) options.priority = template.priority;
  if (template.timeout_seconds !== undefined) options.timeoutSeconds = template.timeout_seconds;
  const { type } = template;

  switch (type) {
    case "level":
      return new LevelGoal(required(numberParam(params, "level"), type, "level"), options);
    case "skill_level": {
      const skill = params.skill;
      if (typeof skill !== "string" || !isSkill(skill)) throw new GoalFactoryError(type, [`unknown skill "${String(skill)}"`]);
      return new SkillLevelGoal(skill, required(numberParam(params, "level"), type, "level"), options);
    }
    case "state": {
      const target = params.target_state;
      if (!isRecord(target)) throw new GoalFactoryError(type, ['"target_state" must be an object']);
      return new StateGoal(target, options);
    }
    case "rest":
      return new RestGoal(numberParam(params, "min_hp_percentage"), options);
    case "move":
      return new MovementGoal(
        required(numberParam(params, "x"), type, "x"),
        required(numberParam(params, "y"), type, "y"),
        options,
      );
    case "free_inventory":
      return new FreeInventoryGoal(options);
  }
}
