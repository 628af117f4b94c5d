import type { ActionResult, InventorySlot } from "@goapbot/schemas";
import {
  ContentNotFoundError,
  CooldownActiveError,
  GameApiError,
  InventoryFullError,
  MissingItemsError,
} from "@goapbot/game-client";
import { actionFailure, subGoalRequest } from "./results.js";

export const PRIORITY = {
  WAIT_FOR_COOLDOWN: 10,
  REACH_HP_THRESHOLD: 9,
  FREE_INVENTORY: 8,
  GATHER_MATERIAL: 8,
  MOVE: 7,
  MOVE_TO_WORKSHOP: 7,
  EQUIP: 6,
  EXECUTE_CRAFT: 6,
} as const;

/** What an action knows that can turn a game refusal into a remedy. */
export interface FailureContext {
  requester: string;
  /** Tile the action must stand on. */
  target?: { x: number; y: number };
  /** Materials the action consumes. */
  materials?: readonly InventorySlot[];
}

/**
 * Converts an error thrown by the game client into a failed result.
 * Anything that is not a game-level refusal is re-thrown.
 */
export function translateApiError(err: unknown, context: FailureContext): ActionResult {
  if (!(err instanceof GameApiError)) throw err;
  const { requester } = context;

  if (err instanceof CooldownActiveError) {
    return actionFailure(err.message, {
      cooldownSeconds: err.remainingSeconds,
      requests: [
        subGoalRequest(
          "wait_for_cooldown",
          {},
          PRIORITY.WAIT_FOR_COOLDOWN,
          requester,
          `Character is on cooldown for ${err.remainingSeconds}s`,
        ),
      ],
    });
  }

  if (err instanceof InventoryFullError) {
    return actionFailure(err.message, {
      requests: [subGoalRequest("free_inventory_space", {}, PRIORITY.FREE_INVENTORY, requester, "Inventory is full")],
    });
  }

  if (err instanceof ContentNotFoundError && context.target) {
    const { x, y } = context.target;
    return actionFailure(err.message, {
      requests: [
        subGoalRequest(
          "move_to_location",
          { target_x: x, target_y: y },
          PRIORITY.MOVE,
          requester,
          `Action must run at (${x}, ${y})`,
        ),
      ],
    });
  }

  if (err instanceof MissingItemsError && context.materials && context.materials.length > 0) {
    return actionFailure(err.message, {
      requests: context.materials.map((m) =>
        subGoalRequest(
          "obtain_item",
          { item_code: m.code, quantity: m.quantity },
          PRIORITY.GATHER_MATERIAL,
          requester,
          `Needs ${m.code} x${m.quantity}`,
        ),
      ),
    });
  }

  return actionFailure(err.message);
}
