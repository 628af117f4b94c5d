import { describe, it, expect } from "vitest";
import {
  ContentNotFoundError,
  CooldownActiveError,
  GameApiError,
  InventoryFullError,
  MissingItemsError,
  TransportError,
} from "@goapbot/game-client";
import { translateApiError } from "./translate.js";

describe("translateApiError", () => {
  it("turns a cooldown into a wait request", () => {
    const result = translateApiError(new CooldownActiveError(6), { requester: "fight_chicken" });
    expect(result.success).toBe(false);
    expect(result.cooldown_seconds).toBe(6);
    expect(result.sub_goal_requests).toEqual([
      {
        goal_type: "wait_for_cooldown",
        parameters: {},
        priority: 10,
        requester: "fight_chicken",
        reason: "Character is on cooldown for 6s",
      },
    ]);
  });

  it("turns a full inventory into a free-space request", () => {
    const result = translateApiError(new InventoryFullError(), { requester: "gather_ash_tree" });
    expect(result.message).toBe("Character inventory is full");
    expect(result.sub_goal_requests.map((r) => [r.goal_type, r.priority])).toEqual([["free_inventory_space", 8]]);
  });

  it("asks to move when the action knows its tile", () => {
    const result = translateApiError(new ContentNotFoundError(), { requester: "gather_ash_tree", target: { x: 3, y: 3 } });
    expect(result.sub_goal_requests[0]).toMatchObject({
      goal_type: "move_to_location",
      parameters: { target_x: 3, target_y: 3 },
      priority: 7,
    });
  });

  it("asks for every material when items are missing", () => {
    const result = translateApiError(new MissingItemsError(), {
      requester: "craft_copper_dagger",
      materials: [{ code: "copper_ore", quantity: 2 }, { code: "ash_wood", quantity: 1 }],
    });
    expect(result.sub_goal_requests.map((r) => r.parameters)).toEqual([
      { item_code: "copper_ore", quantity: 2 },
      { item_code: "ash_wood", quantity: 1 },
    ]);
  });

  it("returns a terminal failure for other game errors", () => {
    const result = translateApiError(new GameApiError(486), { requester: "rest", target: { x: 0, y: 0 } });
    expect(result).toMatchObject({ success: false, message: "Character is locked", sub_goal_requests: [] });
    expect(translateApiError(new ContentNotFoundError("gone"), { requester: "rest" }).sub_goal_requests).toEqual([]);
  });

  it("re-throws anything that is not a game refusal", () => {
    const err = new TransportError("socket hang up");
    expect(() => translateApiError(err, { requester: "rest" })).toThrow(err);
    expect(() => translateApiError("boom", { requester: "rest" })).toThrow("boom");
  });
});
