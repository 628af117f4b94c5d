const integer = { type: "integer" } as const;
const positiveInteger = { type: "integer", minimum: 1 } as const;
const code = { type: "string", minLength: 1 } as const;
const ratio = { type: "number", exclusiveMinimum: 0, maximum: 1 } as const;

const skillNames = [
  "mining", "woodcutting", "fishing",
  "weaponcrafting", "gearcrafting", "jewelrycrafting", "cooking", "alchemy",
] as const;

const slotNames = [
  "weapon", "helmet", "body_armor", "leg_armor", "boots", "ring", "amulet", "shield",
] as const;

function params(properties: Record<string, unknown>, required: string[] = []) {
  return { type: "object", properties, required, additionalProperties: false };
}

/** Parameter shape accepted for each built-in sub-goal type. */
export const SubGoalParameterSchemas: Record<string, Record<string, unknown>> = {
  move_to_location: params({ target_x: integer, target_y: integer }, ["target_x", "target_y"]),
  reach_hp_threshold: params({ min_hp_percentage: ratio }),
  obtain_item: params({ item_code: code, quantity: positiveInteger }, ["item_code"]),
  gather_material: params({ material_code: code, quantity: positiveInteger }, ["material_code"]),
  equip_item_type: params({ item_type: { enum: slotNames } }, ["item_type"]),
  move_to_workshop: params(
    { workshop_x: integer, workshop_y: integer, workshop_type: code },
    ["workshop_x", "workshop_y"],
  ),
  execute_craft: params(
    { recipe_code: code, workshop_type: code, quantity: positiveInteger },
    ["recipe_code"],
  ),
  free_inventory_space: params({}),
  wait_for_cooldown: params({}),
};

export const SubGoalRequestSchema = {
  type: "object",
  required: ["goal_type", "parameters", "priority", "requester", "reason"],
  properties: {
    goal_type: code,
    parameters: {
      type: "object",
      additionalProperties: { type: ["string", "number", "boolean"] },
    },
    priority: integer,
    requester: { type: "string" },
    reason: { type: "string" },
  },
  additionalProperties: false,
} as const;

/** Parameter shape for each goal template type. */
export const GoalTemplateParameterSchemas: Record<string, Record<string, unknown>> = {
  level: params({ level: positiveInteger }, ["level"]),
  skill_level: params({ skill: { enum: skillNames }, level: positiveInteger }, ["skill", "level"]),
  state: params(
    {
      target_state: {
        type: "object",
        minProperties: 1,
        additionalProperties: { type: ["string", "integer", "boolean"] },
      },
    },
    ["target_state"],
  ),
  rest: params({ min_hp_percentage: ratio }),
  move: params({ x: integer, y: integer }, ["x", "y"]),
  free_inventory: params({}),
};

export const GoalTemplatesFileSchema = {
  type: "object",
  required: ["goal_templates"],
  properties: {
    goal_templates: {
      type: "object",
      propertyNames: { pattern: "^[a-z][a-z0-9_]*$" },
      additionalProperties: {
        type: "object",
        required: ["type"],
        properties: {
          type: { enum: Object.keys(GoalTemplateParameterSchemas) },
          description: { type: "string" },
          priority: integer,
          timeout_seconds: positiveInteger,
          params: { type: "object" },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
} as const;
