import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { loadCharacter, loadWorld } from "./world-loader.js";

const TEST_DIR = resolve(fileURLToPath(new URL(".", import.meta.url)), "../../.test-data/world-loader");

describe("world loader", () => {
  beforeEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    await mkdir(TEST_DIR, { recursive: true });
  });

  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  it("loads the bundled example world", async () => {
    const world = await loadWorld();
    expect(world.maps).toHaveLength(36);
    expect(world.monsters.map((m) => m.code)).toEqual(["chicken", "goblin", "wolf"]);
    expect(world.maps.find((t) => t.x === 3 && t.y === 1)?.walkable).toBe(false);
    expect(world.items.find((i) => i.code === "copper_dagger")?.craft?.items).toEqual([
      { code: "copper_ore", quantity: 2 },
    ]);
  });

  it("loads the bundled example character", async () => {
    const character = await loadCharacter();
    expect(character.name).toBe("ranger");
    expect(character).toMatchObject({ level: 1, hp: 100, max_hp: 100, x: 0, y: 0 });
    expect(character.inventory).toEqual([{ code: "copper_ore", quantity: 1 }]);
  });

  it("reads JSON files too", async () => {
    const path = resolve(TEST_DIR, "character.json");
    await writeFile(path, JSON.stringify({
      name: "scout",
      level: 3,
      xp: 10,
      max_xp: 450,
      gold: 0,
      hp: 80,
      max_hp: 110,
      x: 2,
      y: 4,
      cooldown: 0,
      skills: {},
      equipment: {},
      inventory: [],
      inventory_max_items: 20,
    }));
    expect(await loadCharacter(path)).toMatchObject({ name: "scout", level: 3, x: 2, y: 4 });
  });

  it("names a missing file", async () => {
    const path = resolve(TEST_DIR, "nope.yaml");
    await expect(loadWorld(path)).rejects.toThrow(`World file not found: ${path}`);
  });

  it("wraps parser errors", async () => {
    const path = resolve(TEST_DIR, "broken.yaml");
    await writeFile(path, "maps: [\n");
    await expect(loadWorld(path)).rejects.toThrow(`Cannot parse world file "${path}": `);
  });

  it("rejects a document that is not a world", async () => {
    const path = resolve(TEST_DIR, "empty.yaml");
    await writeFile(path, "maps: 3\n");
    await expect(loadWorld(path)).rejects.toThrow(/^Invalid world snapshot: /);
  });
});
