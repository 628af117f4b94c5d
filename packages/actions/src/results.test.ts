import { describe, it, expect } from "vitest";
import { actionFailure, actionSuccess, requestFingerprint, subGoalRequest } from "./results.js";

describe("action results", () => {
  it("builds frozen success results", () => {
    const result = actionSuccess("Moved", { current_x: 1 }, 5);
    expect(result).toEqual({
      success: true,
      message: "Moved",
      state_changes: { current_x: 1 },
      cooldown_seconds: 5,
      sub_goal_requests: [],
    });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.state_changes)).toBe(true);
  });

  it("gives every failure its own request list", () => {
    const request = subGoalRequest("free_inventory_space", {}, 8, "gather_ash_tree", "Inventory is full");
    const a = actionFailure("full", { requests: [request] });
    const b = actionFailure("full");
    expect(a.sub_goal_requests).toEqual([request]);
    expect(b.sub_goal_requests).toEqual([]);
    expect(a.sub_goal_requests).not.toBe(b.sub_goal_requests);
    expect(Object.isFrozen(a.sub_goal_requests)).toBe(true);
    expect(b.cooldown_seconds).toBe(0);
  });

  it("freezes requests and copies their parameters", () => {
    const params = { target_x: 1, target_y: 2 };
    const request = subGoalRequest("move_to_location", params, 7, "fight_chicken", "far away");
    params.target_x = 9;
    expect(request.parameters).toEqual({ target_x: 1, target_y: 2 });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it("fingerprints requests independently of parameter order", () => {
    const a = subGoalRequest("move_to_location", { target_x: 1, target_y: 2 }, 7, "a", "x");
    const b = subGoalRequest("move_to_location", { target_y: 2, target_x: 1 }, 3, "b", "y");
    expect(requestFingerprint(a)).toBe("move_to_location(target_x=1,target_y=2)");
    expect(requestFingerprint(b)).toBe(requestFingerprint(a));
  });
});
