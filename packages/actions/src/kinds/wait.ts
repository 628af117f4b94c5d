import { GameState } from "@goapbot/schemas";
import type { ActionResult, WorldState } from "@goapbot/schemas";
import { GameAction, validateAction } from "../game-action.js";
import type { ActionContext } from "../game-action.js";
import { actionSuccess } from "../results.js";

/** Reports the remaining cooldown so the executor can sleep it out. */
export class WaitAction extends GameAction {
  readonly kind = "wait";
  private readonly preconditions: WorldState = { [GameState.COOLDOWN_READY]: false };
  private readonly effects: WorldState = { [GameState.COOLDOWN_READY]: true };

  constructor(context: ActionContext) {
    super("wait_for_cooldown", 1, context);
    validateAction(this);
  }

  getPreconditions(): WorldState {
    return this.preconditions;
  }

  getEffects(): WorldState {
    return this.effects;
  }

  protected async perform(characterId: string): Promise<ActionResult> {
    const character = await this.context.client.getCharacter(characterId);
    const seconds = Math.max(0, character.cooldown);
    return actionSuccess(`Waiting ${seconds}s for cooldown`, { [GameState.COOLDOWN_READY]: true }, seconds);
  }
}
