import { describe, it, expect } from "vitest";
import { EVENT_FLAG_KEYS, GameState, isStateKey, allStateKeys, skillLevelKey, slotEquippedKey } from "./state-keys.js";
import {
  validateStateDict,
  stateMatches,
  unsatisfiedEntries,
  applyStateChanges,
  stateFrom,
  withoutKeys,
  worldStatesEqual,
  canonicalStateKey,
  formatState,
} from "./world-state.js";
import { StateValidationError } from "./errors.js";

describe("state vocabulary", () => {
  it("recognizes every declared key and nothing else", () => {
    for (const key of allStateKeys()) {
      expect(isStateKey(key)).toBe(true);
    }
    expect(isStateKey("flying_level")).toBe(false);
    expect(isStateKey("CHARACTER_LEVEL")).toBe(false);
  });

  it("has no duplicate values", () => {
    const keys = allStateKeys();
    expect(new Set(keys).size).toBe(keys.length);
  });

  it("maps skills and slots onto their keys", () => {
    expect(skillLevelKey("mining")).toBe("mining_level");
    expect(slotEquippedKey("body_armor")).toBe("body_armor_equipped");
  });
});

describe("validateStateDict", () => {
  it("accepts boolean, integer and string values", () => {
    const state = validateStateDict({ character_level: 5, cooldown_ready: true, item_obtained: "copper_ore" });
    expect(state).toEqual({ character_level: 5, cooldown_ready: true, item_obtained: "copper_ore" });
  });

  it("rejects the first unknown key by name", () => {
    const err = (() => {
      try {
        validateStateDict({ character_level: 5, teleport_ready: true, also_bogus: 1 });
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(err).toBeInstanceOf(StateValidationError);
    expect(err).toMatchObject({ key: "teleport_ready", message: 'Unknown state key: "teleport_ready"' });
  });

  it("rejects non-integer numbers and structured values", () => {
    expect(() => validateStateDict({ hp_current: 12.5 })).toThrow(StateValidationError);
    expect(() => validateStateDict({ hp_current: null })).toThrow(
      'Invalid value for state key "hp_current": expected boolean, integer or string, got null',
    );
    expect(() => validateStateDict({ item_obtained: ["a"] })).toThrow(StateValidationError);
  });

  it("keeps an empty dictionary empty", () => {
    expect(validateStateDict({})).toEqual({});
  });
});

describe("stateMatches", () => {
  const state = { [GameState.CURRENT_X]: 0, [GameState.COOLDOWN_READY]: false };

  it("requires exact equality", () => {
    expect(stateMatches(state, { current_x: 0 })).toBe(true);
    expect(stateMatches(state, { current_x: 1 })).toBe(false);
  });

  it("treats a missing key as unknown, not false", () => {
    expect(stateMatches(state, { can_move: false })).toBe(false);
    expect(stateMatches(state, { cooldown_ready: false })).toBe(true);
  });

  it("is vacuously true for an empty requirement", () => {
    expect(stateMatches({}, {})).toBe(true);
  });
});

describe("applyStateChanges", () => {
  it("returns a new state with later changes winning", () => {
    const base = { current_x: 0, current_y: 0 };
    const next = applyStateChanges(base, { current_x: 1 }, { current_x: 2, gained_xp: true });
    expect(next).toEqual({ current_x: 2, current_y: 0, gained_xp: true });
    expect(base).toEqual({ current_x: 0, current_y: 0 });
  });
});

describe("withoutKeys", () => {
  it("drops the event flags and keeps everything else", () => {
    const state = { current_x: 2, item_obtained: "copper_ore", item_quantity: 1, gained_skill_xp: "mining" };
    expect(withoutKeys(state, EVENT_FLAG_KEYS)).toEqual({ current_x: 2 });
    expect(state.item_obtained).toBe("copper_ore");
  });
});

describe("equality and canonical keys", () => {
  it("ignores insertion order", () => {
    const a = { current_x: 1, current_y: 2 };
    const b = { current_y: 2, current_x: 1 };
    expect(worldStatesEqual(a, b)).toBe(true);
    expect(canonicalStateKey(a)).toBe(canonicalStateKey(b));
    expect(canonicalStateKey(a)).toBe("current_x=1|current_y=2");
  });

  it("distinguishes a string from a number", () => {
    expect(canonicalStateKey({ item_obtained: "1" })).not.toBe(canonicalStateKey({ item_obtained: 1 }));
    expect(worldStatesEqual({ current_x: 1 }, { current_x: 1, current_y: 0 })).toBe(false);
  });

  it("lists unsatisfied goal pairs", () => {
    expect(unsatisfiedEntries({ current_x: 0, current_y: 0 }, { current_x: 2, current_y: 0 })).toEqual([
      ["current_x", 2],
    ]);
  });

  it("formats for humans", () => {
    expect(formatState({})).toBe("{}");
    expect(formatState({ current_x: 1, item_obtained: "ash_wood" })).toBe('{ current_x: 1, item_obtained: "ash_wood" }');
  });

  it("builds a state from computed keys", () => {
    expect(stateFrom([[slotEquippedKey("ring"), true], [skillLevelKey("alchemy"), 3]])).toEqual({
      ring_equipped: true,
      alchemy_level: 3,
    });
  });
});
