import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryGameClient } from "./in-memory-client.js";
import { ManualClock } from "./clock.js";
import { GameClientStateSource } from "./state-source.js";
import { sampleCharacter, sampleWorld } from "./fixtures.js";
import {
  AlreadyAtDestinationError,
  ContentNotFoundError,
  CooldownActiveError,
  GameApiError,
  InventoryFullError,
  MissingItemsError,
  TransportError,
} from "./errors.js";

describe("InMemoryGameClient", () => {
  let clock: ManualClock;
  let client: InMemoryGameClient;

  beforeEach(() => {
    clock = new ManualClock();
    client = new InMemoryGameClient(sampleWorld(), [sampleCharacter()], { now: clock.now });
  });

  it("moves and charges a cooldown per tile", async () => {
    const response = await client.move("tester", 2, 0);
    expect(response.cooldown_seconds).toBe(10);
    expect(response.character).toMatchObject({ x: 2, y: 0, cooldown: 10 });
  });

  it("refuses actions while on cooldown and reports the remaining seconds", async () => {
    await client.move("tester", 1, 0);
    clock.advance(2000);
    const err = await client.move("tester", 2, 0).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CooldownActiveError);
    expect(err).toMatchObject({ code: 499, remainingSeconds: 3 });
    clock.advance(3000);
    await expect(client.move("tester", 2, 0)).resolves.toMatchObject({ character: { x: 2 } });
  });

  it("rejects a move to the current tile or off the map", async () => {
    await expect(client.move("tester", 0, 0)).rejects.toBeInstanceOf(AlreadyAtDestinationError);
    await expect(client.move("tester", 9, 9)).rejects.toMatchObject({ code: 597 });
  });

  it("rejects fighting where there is no monster", async () => {
    await expect(client.fight("tester")).rejects.toBeInstanceOf(ContentNotFoundError);
  });

  it("fights a monster on its tile", async () => {
    client.updateCharacter("tester", { x: 4, y: 1 });
    const response = await client.fight("tester");
    expect(response.fight).toEqual({
      result: "win", monster: "chicken", xp: 30, gold: 2, drops: [{ code: "feather", quantity: 1 }],
    });
    expect(response.character).toMatchObject({ hp: 92, xp: 30, gold: 2, inventory: [{ code: "feather", quantity: 1 }] });
  });

  it("levels up when xp passes the threshold", async () => {
    client.updateCharacter("tester", { x: 4, y: 1, xp: 140 });
    const { character } = await client.fight("tester");
    expect(character).toMatchObject({ level: 2, xp: 20, max_xp: 300, max_hp: 105 });
  });

  it("loses against a stronger monster without a weapon", async () => {
    client.updateCharacter("tester", { x: 5, y: 5 });
    const response = await client.fight("tester");
    expect(response.fight.result).toBe("loss");
    expect(response.character.hp).toBe(1);
  });

  it("gathers into the inventory and refuses when full", async () => {
    client.updateCharacter("tester", { x: 2, y: 0 });
    const response = await client.gather("tester");
    expect(response.details).toEqual({ xp: 10, items: [{ code: "copper_ore", quantity: 1 }] });
    expect(response.character.skills.mining).toEqual({ level: 1, xp: 10 });

    clock.advance(5000);
    client.updateCharacter("tester", { inventory_max_items: 1 });
    await expect(client.gather("tester")).rejects.toBeInstanceOf(InventoryFullError);
  });

  it("crafts at the right workshop from inventory materials", async () => {
    client.updateCharacter("tester", { x: 1, y: 2, inventory: [{ code: "copper_ore", quantity: 3 }] });
    const response = await client.craft("tester", "copper_dagger", 1);
    expect(response.details.items).toEqual([{ code: "copper_dagger", quantity: 1 }]);
    expect(response.character.inventory).toEqual([
      { code: "copper_ore", quantity: 1 },
      { code: "copper_dagger", quantity: 1 },
    ]);
  });

  it("refuses to craft without materials", async () => {
    client.updateCharacter("tester", { x: 1, y: 2, inventory: [{ code: "copper_ore", quantity: 1 }] });
    await expect(client.craft("tester", "copper_dagger", 1)).rejects.toBeInstanceOf(MissingItemsError);
  });

  it("equips from the inventory and returns the old item", async () => {
    client.updateCharacter("tester", {
      inventory: [{ code: "copper_dagger", quantity: 1 }],
      equipment: { weapon: "wooden_stick" },
    });
    const response = await client.equip("tester", "copper_dagger", "weapon");
    expect(response.character.equipment.weapon).toBe("copper_dagger");
    expect(response.character.inventory).toEqual([{ code: "wooden_stick", quantity: 1 }]);
  });

  it("rejects an item in the wrong slot", async () => {
    client.updateCharacter("tester", { inventory: [{ code: "copper_dagger", quantity: 1 }] });
    await expect(client.equip("tester", "copper_dagger", "helmet")).rejects.toMatchObject({ code: 491 });
  });

  it("deposits everything at the bank", async () => {
    client.updateCharacter("tester", { inventory: [{ code: "feather", quantity: 4 }] });
    const response = await client.depositAll("tester");
    expect(response.deposited).toEqual([{ code: "feather", quantity: 4 }]);
    expect(response.character.inventory).toEqual([]);
    expect(client.bankContents("tester")).toEqual([{ code: "feather", quantity: 4 }]);
  });

  it("rests to full HP", async () => {
    client.updateCharacter("tester", { hp: 40 });
    const response = await client.rest("tester");
    expect(response.hp_restored).toBe(60);
    expect(response.cooldown_seconds).toBe(12);
    expect(response.character.hp).toBe(100);
  });

  it("replays injected failures once", async () => {
    client.failNext("move", new TransportError("connection reset"));
    await expect(client.move("tester", 1, 0)).rejects.toThrow("connection reset");
    await expect(client.move("tester", 1, 0)).resolves.toMatchObject({ character: { x: 1 } });
    expect(client.calls.map((c) => c.method)).toEqual(["move", "move"]);
  });

  it("reports an unknown character", async () => {
    await expect(client.getCharacter("nobody")).rejects.toMatchObject({ code: 498 });
  });

  it("does not leak internal state through responses", async () => {
    const character = await client.getCharacter("tester");
    character.inventory.push({ code: "gold_bar", quantity: 1 });
    expect((await client.getCharacter("tester")).inventory).toEqual([]);
  });
});

describe("GameClientStateSource", () => {
  it("fetches validated state with location flags", async () => {
    const clock = new ManualClock();
    const client = new InMemoryGameClient(sampleWorld(), [sampleCharacter({ cooldown: 4 })], { now: clock.now });
    const source = new GameClientStateSource(client, sampleWorld());
    const state = await source.fetchState("tester");
    expect(state).toMatchObject({
      current_x: 0,
      current_y: 0,
      at_bank_location: true,
      cooldown_ready: false,
      weapon_equipped: false,
    });
    clock.advance(4000);
    expect((await source.fetchState("tester")).cooldown_ready).toBe(true);
  });

  it("propagates client errors", async () => {
    const client = new InMemoryGameClient(sampleWorld(), []);
    await expect(new GameClientStateSource(client).fetchState("ghost")).rejects.toBeInstanceOf(GameApiError);
  });
});
