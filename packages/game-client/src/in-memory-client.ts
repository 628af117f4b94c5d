import { findTile, inventoryQuantity, inventoryUsed } from "@goapbot/schemas";
import type { Character, EquipmentSlot, InventorySlot, MapContentType, MapTile, Skill, WorldSnapshot } from "@goapbot/schemas";
import type {
  ActionResponse,
  DepositResponse,
  EquipResponse,
  FightResponse,
  GameApiClient,
  GameApiMethod,
  RestResponse,
  SkillResponse,
} from "./client.js";
import {
  AlreadyAtDestinationError,
  CharacterNotFoundError,
  ContentNotFoundError,
  CooldownActiveError,
  GameApiError,
  InventoryFullError,
  MissingItemsError,
  SkillLevelTooLowError,
} from "./errors.js";

export interface CooldownTable {
  movePerTile: number;
  fight: number;
  gather: number;
  craft: number;
  equip: number;
  deposit: number;
  restMinimum: number;
}

export interface InMemoryGameClientOptions {
  /** Millisecond clock used for cooldown expiry. Default: Date.now */
  now?: () => number;
  cooldowns?: Partial<CooldownTable>;
}

export interface RecordedCall {
  method: GameApiMethod;
  character: string;
  args: unknown[];
}

const DEFAULT_COOLDOWNS: CooldownTable = {
  movePerTile: 5,
  fight: 10,
  gather: 5,
  craft: 5,
  equip: 1,
  deposit: 3,
  restMinimum: 3,
};

interface CharacterRecord {
  character: Character;
  cooldownUntil: number;
  bank: InventorySlot[];
}

/**
 * A deterministic stand-in for the game server. It keeps one world and a
 * set of characters in memory and applies the same refusals the real API
 * makes (cooldown, wrong tile, full inventory, missing materials).
 */
export class InMemoryGameClient implements GameApiClient {
  readonly calls: RecordedCall[] = [];
  private world: WorldSnapshot;
  private records = new Map<string, CharacterRecord>();
  private now: () => number;
  private cooldowns: CooldownTable;
  private injected = new Map<GameApiMethod, Error[]>();

  constructor(world: WorldSnapshot, characters: Character[], options?: InMemoryGameClientOptions) {
    this.world = world;
    this.now = options?.now ?? Date.now;
    this.cooldowns = { ...DEFAULT_COOLDOWNS, ...options?.cooldowns };
    for (const character of characters) {
      this.records.set(character.name, {
        character: structuredClone(character),
        cooldownUntil: this.now() + character.cooldown * 1000,
        bank: [],
      });
    }
  }

  /** Makes the next call of `method` reject with `error`, before any game rule runs. */
  failNext(method: GameApiMethod, error: Error): void {
    const queue = this.injected.get(method) ?? [];
    queue.push(error);
    this.injected.set(method, queue);
  }

  /** Direct write access for test setup. */
  updateCharacter(name: string, patch: Partial<Character>): void {
    const record = this.record(name);
    Object.assign(record.character, structuredClone(patch));
    if (patch.cooldown !== undefined) record.cooldownUntil = this.now() + patch.cooldown * 1000;
  }

  bankContents(name: string): InventorySlot[] {
    return structuredClone(this.record(name).bank);
  }

  async getCharacter(name: string): Promise<Character> {
    this.enter("getCharacter", name, []);
    return this.view(this.record(name));
  }

  async move(name: string, x: number, y: number): Promise<ActionResponse> {
    const record = this.act("move", name, [x, y]);
    const { character } = record;
    const tile = findTile(this.world, x, y);
    if (!tile || tile.walkable === false) throw new GameApiError(597);
    if (character.x === x && character.y === y) throw new AlreadyAtDestinationError();
    const distance = Math.abs(character.x - x) + Math.abs(character.y - y);
    character.x = x;
    character.y = y;
    return this.respond(record, distance * this.cooldowns.movePerTile);
  }

  async fight(name: string): Promise<FightResponse> {
    const record = this.act("fight", name, []);
    const { character } = record;
    const tile = this.contentTile(character, "monster");
    const monster = this.world.monsters.find((m) => m.code === tile.content?.code);
    if (!monster) throw new ContentNotFoundError(`Monster "${tile.content?.code ?? ""}" not found`);

    const weaponBonus = character.equipment.weapon ? 2 : 0;
    const damage = monster.level * 8;
    const win = character.level + weaponBonus >= monster.level && damage < character.hp;
    if (!win) {
      character.hp = 1;
      return {
        ...this.respond(record, this.cooldowns.fight),
        fight: { result: "loss", monster: monster.code, xp: 0, gold: 0, drops: [] },
      };
    }

    character.hp -= damage;
    const xp = monster.level * 30;
    const gold = monster.level * 2;
    const drops = (monster.drops ?? []).filter((d) => d.rate >= 1).map((d) => ({ code: d.code, quantity: 1 }));
    this.gainCharacterXp(character, xp);
    character.gold += gold;
    for (const drop of drops) this.addItem(character, drop.code, drop.quantity);
    return {
      ...this.respond(record, this.cooldowns.fight),
      fight: { result: "win", monster: monster.code, xp, gold, drops },
    };
  }

  async gather(name: string): Promise<SkillResponse> {
    const record = this.act("gather", name, []);
    const { character } = record;
    const tile = this.contentTile(character, "resource");
    const resource = this.world.resources.find((r) => r.code === tile.content?.code);
    if (!resource) throw new ContentNotFoundError(`Resource "${tile.content?.code ?? ""}" not found`);
    if (this.skillLevel(character, resource.skill) < resource.level) throw new SkillLevelTooLowError();
    if (inventoryUsed(character) >= character.inventory_max_items) throw new InventoryFullError();

    const xp = resource.level * 10;
    this.gainSkillXp(character, resource.skill, xp);
    this.addItem(character, resource.drop, 1);
    return {
      ...this.respond(record, this.cooldowns.gather),
      details: { xp, items: [{ code: resource.drop, quantity: 1 }] },
    };
  }

  async rest(name: string): Promise<RestResponse> {
    const record = this.act("rest", name, []);
    const { character } = record;
    const restored = character.max_hp - character.hp;
    character.hp = character.max_hp;
    const seconds = Math.max(this.cooldowns.restMinimum, Math.ceil(restored / 5));
    return { ...this.respond(record, seconds), hp_restored: restored };
  }

  async craft(name: string, code: string, quantity: number): Promise<SkillResponse> {
    const record = this.act("craft", name, [code, quantity]);
    const { character } = record;
    const recipe = this.world.items.find((i) => i.code === code)?.craft;
    if (!recipe) throw new GameApiError(404, `Item "${code}" cannot be crafted`);
    const tile = this.contentTile(character, "workshop");
    if (tile.content?.code !== recipe.skill) {
      throw new ContentNotFoundError(`This is not a ${recipe.skill} workshop`);
    }
    if (this.skillLevel(character, recipe.skill) < recipe.level) throw new SkillLevelTooLowError();
    for (const material of recipe.items) {
      if (inventoryQuantity(character, material.code) < material.quantity * quantity) {
        throw new MissingItemsError(`Missing ${material.code} x${material.quantity * quantity}`);
      }
    }

    for (const material of recipe.items) this.removeItem(character, material.code, material.quantity * quantity);
    const produced = (recipe.quantity ?? 1) * quantity;
    this.addItem(character, code, produced);
    const xp = recipe.level * 15 * quantity;
    this.gainSkillXp(character, recipe.skill, xp);
    return {
      ...this.respond(record, this.cooldowns.craft * quantity),
      details: { xp, items: [{ code, quantity: produced }] },
    };
  }

  async equip(name: string, code: string, slot: EquipmentSlot): Promise<EquipResponse> {
    const record = this.act("equip", name, [code, slot]);
    const { character } = record;
    const item = this.world.items.find((i) => i.code === code);
    if (!item || item.type !== slot) throw new GameApiError(491);
    if (item.level > character.level) throw new GameApiError(496);
    if (inventoryQuantity(character, code) < 1) throw new MissingItemsError(`Missing ${code}`);

    this.removeItem(character, code, 1);
    const previous = character.equipment[slot];
    if (previous) this.addItem(character, previous, 1);
    character.equipment[slot] = code;
    return { ...this.respond(record, this.cooldowns.equip), item: code, slot };
  }

  async depositAll(name: string): Promise<DepositResponse> {
    const record = this.act("depositAll", name, []);
    const { character } = record;
    this.contentTile(character, "bank");
    const deposited = character.inventory;
    for (const slot of deposited) {
      const existing = record.bank.find((b) => b.code === slot.code);
      if (existing) existing.quantity += slot.quantity;
      else record.bank.push({ ...slot });
    }
    character.inventory = [];
    return { ...this.respond(record, this.cooldowns.deposit), deposited };
  }

  // ─── Internals ────────────────────────────────────────────────────

  private record(name: string): CharacterRecord {
    const record = this.records.get(name);
    if (!record) throw new CharacterNotFoundError(`Character "${name}" not found`);
    return record;
  }

  private enter(method: GameApiMethod, name: string, args: unknown[]): void {
    this.calls.push({ method, character: name, args });
    const injected = this.injected.get(method)?.shift();
    if (injected) throw injected;
  }

  /** Common gate for every cooldown-consuming call. */
  private act(method: GameApiMethod, name: string, args: unknown[]): CharacterRecord {
    this.enter(method, name, args);
    const record = this.record(name);
    const remaining = this.remainingCooldown(record);
    if (remaining > 0) throw new CooldownActiveError(remaining);
    return record;
  }

  private remainingCooldown(record: CharacterRecord): number {
    return Math.max(0, Math.ceil((record.cooldownUntil - this.now()) / 1000));
  }

  private respond(record: CharacterRecord, cooldownSeconds: number): ActionResponse {
    record.cooldownUntil = this.now() + cooldownSeconds * 1000;
    return { cooldown_seconds: cooldownSeconds, character: this.view(record) };
  }

  private view(record: CharacterRecord): Character {
    return { ...structuredClone(record.character), cooldown: this.remainingCooldown(record) };
  }

  private contentTile(character: Character, type: MapContentType): MapTile {
    const tile = findTile(this.world, character.x, character.y);
    if (!tile?.content || tile.content.type !== type) {
      throw new ContentNotFoundError();
    }
    return tile;
  }

  private skillLevel(character: Character, skill: Skill): number {
    return character.skills[skill]?.level ?? 1;
  }

  private gainCharacterXp(character: Character, xp: number): void {
    character.xp += xp;
    while (character.xp >= character.max_xp) {
      character.xp -= character.max_xp;
      character.level += 1;
      character.max_xp = character.level * 150;
      character.max_hp += 5;
    }
  }

  private gainSkillXp(character: Character, skill: Skill, xp: number): void {
    const progress = character.skills[skill] ?? { level: 1, xp: 0 };
    progress.xp += xp;
    while (progress.xp >= progress.level * 100) {
      progress.xp -= progress.level * 100;
      progress.level += 1;
    }
    character.skills[skill] = progress;
  }

  private addItem(character: Character, code: string, quantity: number): void {
    const slot = character.inventory.find((s) => s.code === code);
    if (slot) slot.quantity += quantity;
    else character.inventory.push({ code, quantity });
  }

  private removeItem(character: Character, code: string, quantity: number): void {
    let left = quantity;
    for (const slot of character.inventory) {
      if (slot.code !== code || left === 0) continue;
      const taken = Math.min(slot.quantity, left);
      slot.quantity -= taken;
      left -= taken;
    }
    character.inventory = character.inventory.filter((s) => s.quantity > 0);
  }
}
