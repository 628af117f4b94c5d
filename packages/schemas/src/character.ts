import {
  EQUIPMENT_SLOTS,
  GameState,
  SKILLS,
  skillLevelKey,
  skillXpKey,
  slotEquippedKey,
} from "./state-keys.js";
import type { StateKey } from "./state-keys.js";
import { validateStateDict } from "./world-state.js";
import type { StateValue, WorldState } from "./world-state.js";
import type { Character, MapTile, WorldSnapshot } from "./types.js";

export const HP_CRITICAL_RATIO = 0.2;
export const SAFE_TO_FIGHT_RATIO = 0.5;

export function hpRatio(hp: number, maxHp: number): number {
  return maxHp > 0 ? hp / maxHp : 0;
}

export function inventoryUsed(character: Pick<Character, "inventory">): number {
  return character.inventory.reduce((sum, slot) => sum + slot.quantity, 0);
}

export function inventoryQuantity(character: Pick<Character, "inventory">, code: string): number {
  return character.inventory
    .filter((slot) => slot.code === code)
    .reduce((sum, slot) => sum + slot.quantity, 0);
}

export function findTile(snapshot: WorldSnapshot, x: number, y: number): MapTile | undefined {
  return snapshot.maps.find((t) => t.x === x && t.y === y);
}

/** Location-context flags for a tile. An unknown tile yields all-false flags. */
export function locationFlags(tile: MapTile | undefined): WorldState {
  const type = tile?.content?.type;
  return {
    [GameState.AT_BANK_LOCATION]: type === "bank",
    [GameState.AT_MONSTER_LOCATION]: type === "monster",
    [GameState.AT_RESOURCE_LOCATION]: type === "resource",
    [GameState.AT_WORKSHOP_LOCATION]: type === "workshop",
    [GameState.AT_SAFE_LOCATION]: tile !== undefined && type !== "monster",
  };
}

/**
 * Maps a live character payload onto the state vocabulary. The result is a
 * raw dictionary; pass it through `validateStateDict` before planning.
 */
export function characterToStateDict(
  character: Character,
  snapshot?: WorldSnapshot,
): Record<string, StateValue> {
  const ratio = hpRatio(character.hp, character.max_hp);
  const alive = character.hp > 0;
  const safe = ratio >= SAFE_TO_FIGHT_RATIO;
  const used = inventoryUsed(character);
  const full = used >= character.inventory_max_items;

  const dict: Record<string, StateValue> = {
    [GameState.CHARACTER_LEVEL]: character.level,
    [GameState.CHARACTER_XP]: character.xp,
    [GameState.CHARACTER_GOLD]: character.gold,
    [GameState.HP_CURRENT]: character.hp,
    [GameState.HP_MAX]: character.max_hp,
    [GameState.HP_LOW]: ratio < SAFE_TO_FIGHT_RATIO,
    [GameState.HP_CRITICAL]: ratio <= HP_CRITICAL_RATIO,
    [GameState.SAFE_TO_FIGHT]: safe,
    [GameState.CURRENT_X]: character.x,
    [GameState.CURRENT_Y]: character.y,
    [GameState.INVENTORY_SPACE_USED]: used,
    [GameState.INVENTORY_FULL]: full,
    [GameState.INVENTORY_SPACE_AVAILABLE]: !full,
    [GameState.COOLDOWN_READY]: character.cooldown <= 0,
    [GameState.CAN_MOVE]: alive,
    [GameState.CAN_REST]: alive,
    [GameState.CAN_FIGHT]: alive && safe,
    [GameState.CAN_GATHER]: alive && !full,
    [GameState.CAN_CRAFT]: alive && !full,
    [GameState.CAN_BANK]: alive,
    [GameState.CAN_EQUIP]: alive,
  };

  for (const skill of SKILLS) {
    const progress = character.skills[skill];
    dict[skillLevelKey(skill)] = progress?.level ?? 1;
    dict[skillXpKey(skill)] = progress?.xp ?? 0;
  }

  for (const slot of EQUIPMENT_SLOTS) {
    const code = character.equipment[slot];
    dict[slotEquippedKey(slot)] = code !== undefined && code !== "";
  }

  if (snapshot) {
    Object.assign(dict, locationFlags(findTile(snapshot, character.x, character.y)));
  }

  return dict;
}

export function characterToWorldState(character: Character, snapshot?: WorldSnapshot): WorldState {
  return validateStateDict(characterToStateDict(character, snapshot));
}

export function readInteger(state: WorldState, key: StateKey): number | undefined {
  const value = state[key];
  return typeof value === "number" ? value : undefined;
}

export function readBoolean(state: WorldState, key: StateKey): boolean | undefined {
  const value = state[key];
  return typeof value === "boolean" ? value : undefined;
}

export function readString(state: WorldState, key: StateKey): string | undefined {
  const value = state[key];
  return typeof value === "string" ? value : undefined;
}
