import type { Character, EquipmentSlot, InventorySlot } from "@goapbot/schemas";

export interface ActionResponse {
  cooldown_seconds: number;
  character: Character;
}

export interface FightResponse extends ActionResponse {
  fight: {
    result: "win" | "loss";
    monster: string;
    xp: number;
    gold: number;
    drops: InventorySlot[];
  };
}

export interface SkillResponse extends ActionResponse {
  details: {
    xp: number;
    items: InventorySlot[];
  };
}

export interface RestResponse extends ActionResponse {
  hp_restored: number;
}

export interface EquipResponse extends ActionResponse {
  item: string;
  slot: EquipmentSlot;
}

export interface DepositResponse extends ActionResponse {
  deposited: InventorySlot[];
}

/**
 * Per-character remote calls. Game-level refusals reject with a
 * `GameApiError` subclass; a failed transport rejects with `TransportError`.
 */
export interface GameApiClient {
  getCharacter(name: string): Promise<Character>;
  move(name: string, x: number, y: number): Promise<ActionResponse>;
  fight(name: string): Promise<FightResponse>;
  gather(name: string): Promise<SkillResponse>;
  rest(name: string): Promise<RestResponse>;
  craft(name: string, code: string, quantity: number): Promise<SkillResponse>;
  equip(name: string, code: string, slot: EquipmentSlot): Promise<EquipResponse>;
  depositAll(name: string): Promise<DepositResponse>;
}

export type GameApiMethod = keyof GameApiClient;
