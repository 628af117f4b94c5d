const slotSchema = {
  type: "object",
  required: ["code", "quantity"],
  properties: {
    code: { type: "string", minLength: 1 },
    quantity: { type: "integer", minimum: 1 },
  },
  additionalProperties: false,
} as const;

const skillNames = [
  "mining", "woodcutting", "fishing",
  "weaponcrafting", "gearcrafting", "jewelrycrafting", "cooking", "alchemy",
] as const;

const slotNames = [
  "weapon", "helmet", "body_armor", "leg_armor", "boots", "ring", "amulet", "shield",
] as const;

export const WorldSnapshotSchema = {
  type: "object",
  required: ["maps", "monsters", "resources", "items"],
  properties: {
    maps: {
      type: "array",
      items: {
        type: "object",
        required: ["x", "y"],
        properties: {
          x: { type: "integer" },
          y: { type: "integer" },
          walkable: { type: "boolean" },
          content: {
            type: "object",
            required: ["type", "code"],
            properties: {
              type: { type: "string", enum: ["monster", "resource", "workshop", "bank"] },
              code: { type: "string", minLength: 1 },
            },
            additionalProperties: false,
          },
        },
        additionalProperties: false,
      },
    },
    monsters: {
      type: "array",
      items: {
        type: "object",
        required: ["code", "level", "hp"],
        properties: {
          code: { type: "string", minLength: 1 },
          name: { type: "string" },
          level: { type: "integer", minimum: 1 },
          hp: { type: "integer", minimum: 1 },
          drops: {
            type: "array",
            items: {
              type: "object",
              required: ["code", "rate"],
              properties: { code: { type: "string" }, rate: { type: "number", minimum: 0 } },
              additionalProperties: false,
            },
          },
        },
        additionalProperties: false,
      },
    },
    resources: {
      type: "array",
      items: {
        type: "object",
        required: ["code", "skill", "level", "drop"],
        properties: {
          code: { type: "string", minLength: 1 },
          skill: { type: "string", enum: ["mining", "woodcutting", "fishing"] },
          level: { type: "integer", minimum: 1 },
          drop: { type: "string", minLength: 1 },
        },
        additionalProperties: false,
      },
    },
    items: {
      type: "array",
      items: {
        type: "object",
        required: ["code", "type", "level"],
        properties: {
          code: { type: "string", minLength: 1 },
          type: { type: "string", minLength: 1 },
          level: { type: "integer", minimum: 1 },
          craft: {
            type: "object",
            required: ["skill", "level", "items"],
            properties: {
              skill: { type: "string", enum: skillNames },
              level: { type: "integer", minimum: 1 },
              quantity: { type: "integer", minimum: 1 },
              items: { type: "array", items: slotSchema, minItems: 1 },
            },
            additionalProperties: false,
          },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
} as const;

export const CharacterSchema = {
  type: "object",
  required: [
    "name", "level", "xp", "max_xp", "gold", "hp", "max_hp", "x", "y",
    "cooldown", "skills", "equipment", "inventory", "inventory_max_items",
  ],
  properties: {
    name: { type: "string", minLength: 1 },
    level: { type: "integer", minimum: 1 },
    xp: { type: "integer", minimum: 0 },
    max_xp: { type: "integer", minimum: 1 },
    gold: { type: "integer", minimum: 0 },
    hp: { type: "integer", minimum: 0 },
    max_hp: { type: "integer", minimum: 1 },
    x: { type: "integer" },
    y: { type: "integer" },
    cooldown: { type: "integer", minimum: 0 },
    skills: {
      type: "object",
      propertyNames: { enum: skillNames },
      additionalProperties: {
        type: "object",
        required: ["level", "xp"],
        properties: { level: { type: "integer", minimum: 1 }, xp: { type: "integer", minimum: 0 } },
        additionalProperties: false,
      },
    },
    equipment: {
      type: "object",
      propertyNames: { enum: slotNames },
      additionalProperties: { type: "string" },
    },
    inventory: { type: "array", items: slotSchema },
    inventory_max_items: { type: "integer", minimum: 1 },
  },
  additionalProperties: false,
} as const;
