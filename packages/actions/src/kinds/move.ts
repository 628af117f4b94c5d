import { GameState, findTile, locationFlags } from "@goapbot/schemas";
import type { ActionResult, WorldState } from "@goapbot/schemas";
import { AlreadyAtDestinationError } from "@goapbot/game-client";
import { GameAction, validateAction } from "../game-action.js";
import type { ActionContext } from "../game-action.js";
import { actionSuccess } from "../results.js";

export function moveActionName(x: number, y: number): string {
  return `move_to_${x}_${y}`;
}

export class MoveAction extends GameAction {
  readonly kind = "move";
  readonly x: number;
  readonly y: number;
  private readonly preconditions: WorldState;
  private readonly effects: WorldState;

  constructor(x: number, y: number, cost: number, context: ActionContext) {
    super(moveActionName(x, y), cost, context);
    this.x = x;
    this.y = y;
    this.preconditions = { [GameState.COOLDOWN_READY]: true, [GameState.CAN_MOVE]: true };
    this.effects = {
      [GameState.CURRENT_X]: x,
      [GameState.CURRENT_Y]: y,
      ...locationFlags(findTile(context.snapshot, x, y)),
    };
    validateAction(this);
  }

  getPreconditions(): WorldState {
    return this.preconditions;
  }

  getEffects(): WorldState {
    return this.effects;
  }

  protected async perform(characterId: string): Promise<ActionResult> {
    try {
      const response = await this.context.client.move(characterId, this.x, this.y);
      return actionSuccess(
        `Moved to (${this.x}, ${this.y})`,
        this.observe(response.character),
        response.cooldown_seconds,
      );
    } catch (err) {
      if (err instanceof AlreadyAtDestinationError) {
        return actionSuccess(`Already at (${this.x}, ${this.y})`, {
          [GameState.CURRENT_X]: this.x,
          [GameState.CURRENT_Y]: this.y,
        });
      }
      throw err;
    }
  }
}
