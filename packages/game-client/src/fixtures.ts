import type { Character, MapContent, MapTile, WorldSnapshot } from "@goapbot/schemas";

const CONTENT: Record<string, MapContent> = {
  "0,0": { type: "bank", code: "bank" },
  "2,0": { type: "resource", code: "copper_rocks" },
  "3,3": { type: "resource", code: "ash_tree" },
  "1,2": { type: "workshop", code: "weaponcrafting" },
  "4,1": { type: "monster", code: "chicken" },
  "5,5": { type: "monster", code: "goblin" },
};

/**
 * A 6x6 world with a bank, two resources, a weaponcrafting workshop and two
 * monsters. Tests across packages plan against it.
 */
export function sampleWorld(options: { blocked?: Array<[number, number]> } = {}): WorldSnapshot {
  const blocked = new Set((options.blocked ?? []).map(([x, y]) => `${x},${y}`));
  const maps: MapTile[] = [];
  for (let y = 0; y <= 5; y++) {
    for (let x = 0; x <= 5; x++) {
      const tile: MapTile = { x, y };
      const content = CONTENT[`${x},${y}`];
      if (content) tile.content = content;
      if (blocked.has(`${x},${y}`)) tile.walkable = false;
      maps.push(tile);
    }
  }
  return {
    maps,
    monsters: [
      { code: "chicken", level: 1, hp: 60, drops: [{ code: "feather", rate: 1 }] },
      { code: "goblin", level: 2, hp: 90 },
    ],
    resources: [
      { code: "copper_rocks", skill: "mining", level: 1, drop: "copper_ore" },
      { code: "ash_tree", skill: "woodcutting", level: 1, drop: "ash_wood" },
    ],
    items: [
      { code: "copper_ore", type: "resource", level: 1 },
      { code: "ash_wood", type: "resource", level: 1 },
      { code: "feather", type: "resource", level: 1 },
      {
        code: "copper_dagger",
        type: "weapon",
        level: 1,
        craft: { skill: "weaponcrafting", level: 1, items: [{ code: "copper_ore", quantity: 2 }] },
      },
      {
        code: "copper_helmet",
        type: "helmet",
        level: 1,
        craft: { skill: "gearcrafting", level: 1, items: [{ code: "copper_ore", quantity: 3 }] },
      },
    ],
  };
}

export function sampleCharacter(overrides: Partial<Character> = {}): Character {
  return {
    name: "tester",
    level: 1,
    xp: 0,
    max_xp: 150,
    gold: 0,
    hp: 100,
    max_hp: 100,
    x: 0,
    y: 0,
    cooldown: 0,
    skills: { mining: { level: 1, xp: 0 }, weaponcrafting: { level: 1, xp: 0 } },
    equipment: {},
    inventory: [],
    inventory_max_items: 20,
    ...overrides,
  };
}
