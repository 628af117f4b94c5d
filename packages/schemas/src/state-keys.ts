/**
 * The closed vocabulary of facts the planner can reason about.
 *
 * Every precondition, effect, goal target and live-state dictionary is keyed
 * by one of these values. Nothing outside this table is a valid state key.
 */
export const GameState = {
  // ─── Character progression ──────────────────────────────────────────
  CHARACTER_LEVEL: "character_level",
  CHARACTER_XP: "character_xp",
  CHARACTER_GOLD: "character_gold",
  HP_CURRENT: "hp_current",
  HP_MAX: "hp_max",
  HP_LOW: "hp_low",
  HP_CRITICAL: "hp_critical",
  SAFE_TO_FIGHT: "safe_to_fight",

  // ─── Position ───────────────────────────────────────────────────────
  CURRENT_X: "current_x",
  CURRENT_Y: "current_y",
  AT_BANK_LOCATION: "at_bank_location",
  AT_MONSTER_LOCATION: "at_monster_location",
  AT_RESOURCE_LOCATION: "at_resource_location",
  AT_WORKSHOP_LOCATION: "at_workshop_location",
  AT_SAFE_LOCATION: "at_safe_location",
  AT_TARGET_LOCATION: "at_target_location",

  // ─── Skills ─────────────────────────────────────────────────────────
  MINING_LEVEL: "mining_level",
  MINING_XP: "mining_xp",
  WOODCUTTING_LEVEL: "woodcutting_level",
  WOODCUTTING_XP: "woodcutting_xp",
  FISHING_LEVEL: "fishing_level",
  FISHING_XP: "fishing_xp",
  WEAPONCRAFTING_LEVEL: "weaponcrafting_level",
  WEAPONCRAFTING_XP: "weaponcrafting_xp",
  GEARCRAFTING_LEVEL: "gearcrafting_level",
  GEARCRAFTING_XP: "gearcrafting_xp",
  JEWELRYCRAFTING_LEVEL: "jewelrycrafting_level",
  JEWELRYCRAFTING_XP: "jewelrycrafting_xp",
  COOKING_LEVEL: "cooking_level",
  COOKING_XP: "cooking_xp",
  ALCHEMY_LEVEL: "alchemy_level",
  ALCHEMY_XP: "alchemy_xp",

  // ─── Equipment ──────────────────────────────────────────────────────
  WEAPON_EQUIPPED: "weapon_equipped",
  HELMET_EQUIPPED: "helmet_equipped",
  BODY_ARMOR_EQUIPPED: "body_armor_equipped",
  LEG_ARMOR_EQUIPPED: "leg_armor_equipped",
  BOOTS_EQUIPPED: "boots_equipped",
  RING_EQUIPPED: "ring_equipped",
  AMULET_EQUIPPED: "amulet_equipped",
  SHIELD_EQUIPPED: "shield_equipped",

  // ─── Inventory ──────────────────────────────────────────────────────
  INVENTORY_SPACE_AVAILABLE: "inventory_space_available",
  INVENTORY_SPACE_USED: "inventory_space_used",
  INVENTORY_FULL: "inventory_full",
  ITEM_OBTAINED: "item_obtained",
  ITEM_QUANTITY: "item_quantity",
  HAS_CRAFTING_MATERIALS: "has_crafting_materials",

  // ─── Progress ───────────────────────────────────────────────────────
  GAINED_XP: "gained_xp",
  GAINED_SKILL_XP: "gained_skill_xp",
  COMBAT_WON: "combat_won",

  // ─── Capabilities ───────────────────────────────────────────────────
  COOLDOWN_READY: "cooldown_ready",
  CAN_MOVE: "can_move",
  CAN_FIGHT: "can_fight",
  CAN_GATHER: "can_gather",
  CAN_CRAFT: "can_craft",
  CAN_REST: "can_rest",
  CAN_BANK: "can_bank",
  CAN_EQUIP: "can_equip",
} as const;

export type StateKeyName = keyof typeof GameState;
export type StateKey = (typeof GameState)[StateKeyName];

const STATE_KEYS: ReadonlySet<string> = new Set<string>(Object.values(GameState));

export function isStateKey(value: string): value is StateKey {
  return STATE_KEYS.has(value);
}

export function allStateKeys(): StateKey[] {
  return Object.values(GameState);
}

// ─── Skill and slot families ──────────────────────────────────────────

export const GATHERING_SKILLS = ["mining", "woodcutting", "fishing"] as const;
export const CRAFTING_SKILLS = [
  "weaponcrafting",
  "gearcrafting",
  "jewelrycrafting",
  "cooking",
  "alchemy",
] as const;
export const SKILLS = [...GATHERING_SKILLS, ...CRAFTING_SKILLS] as const;

export type GatheringSkill = (typeof GATHERING_SKILLS)[number];
export type Skill = (typeof SKILLS)[number];

export function isSkill(value: string): value is Skill {
  return SKILLS.some((s) => s === value);
}

const SKILL_LEVEL_KEYS: Record<Skill, StateKey> = {
  mining: GameState.MINING_LEVEL,
  woodcutting: GameState.WOODCUTTING_LEVEL,
  fishing: GameState.FISHING_LEVEL,
  weaponcrafting: GameState.WEAPONCRAFTING_LEVEL,
  gearcrafting: GameState.GEARCRAFTING_LEVEL,
  jewelrycrafting: GameState.JEWELRYCRAFTING_LEVEL,
  cooking: GameState.COOKING_LEVEL,
  alchemy: GameState.ALCHEMY_LEVEL,
};

const SKILL_XP_KEYS: Record<Skill, StateKey> = {
  mining: GameState.MINING_XP,
  woodcutting: GameState.WOODCUTTING_XP,
  fishing: GameState.FISHING_XP,
  weaponcrafting: GameState.WEAPONCRAFTING_XP,
  gearcrafting: GameState.GEARCRAFTING_XP,
  jewelrycrafting: GameState.JEWELRYCRAFTING_XP,
  cooking: GameState.COOKING_XP,
  alchemy: GameState.ALCHEMY_XP,
};

export function skillLevelKey(skill: Skill): StateKey {
  return SKILL_LEVEL_KEYS[skill];
}

export function skillXpKey(skill: Skill): StateKey {
  return SKILL_XP_KEYS[skill];
}

export const EQUIPMENT_SLOTS = [
  "weapon",
  "helmet",
  "body_armor",
  "leg_armor",
  "boots",
  "ring",
  "amulet",
  "shield",
] as const;

export type EquipmentSlot = (typeof EQUIPMENT_SLOTS)[number];

export function isEquipmentSlot(value: string): value is EquipmentSlot {
  return EQUIPMENT_SLOTS.some((s) => s === value);
}

const SLOT_KEYS: Record<EquipmentSlot, StateKey> = {
  weapon: GameState.WEAPON_EQUIPPED,
  helmet: GameState.HELMET_EQUIPPED,
  body_armor: GameState.BODY_ARMOR_EQUIPPED,
  leg_armor: GameState.LEG_ARMOR_EQUIPPED,
  boots: GameState.BOOTS_EQUIPPED,
  ring: GameState.RING_EQUIPPED,
  amulet: GameState.AMULET_EQUIPPED,
  shield: GameState.SHIELD_EQUIPPED,
};

export function slotEquippedKey(slot: EquipmentSlot): StateKey {
  return SLOT_KEYS[slot];
}

/** Keys whose value must never decrease across a sub-goal boundary. */
export const MONOTONIC_LEVEL_KEYS: readonly StateKey[] = [
  GameState.CHARACTER_LEVEL,
  ...SKILLS.map((s) => SKILL_LEVEL_KEYS[s]),
];

export const EQUIPMENT_KEYS: readonly StateKey[] = EQUIPMENT_SLOTS.map((s) => SLOT_KEYS[s]);

/**
 * Keys that report what the last action did rather than what the character
 * is. Live reads never produce them.
 */
export const EVENT_FLAG_KEYS: readonly StateKey[] = [
  GameState.ITEM_OBTAINED,
  GameState.ITEM_QUANTITY,
  GameState.GAINED_XP,
  GameState.GAINED_SKILL_XP,
  GameState.COMBAT_WON,
];
