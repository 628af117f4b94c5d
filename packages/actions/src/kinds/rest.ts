import { GameState } from "@goapbot/schemas";
import type { ActionResult, WorldState } from "@goapbot/schemas";
import { GameAction, validateAction } from "../game-action.js";
import type { ActionContext } from "../game-action.js";
import { actionSuccess } from "../results.js";

/** Rests to full HP. With a known maximum the effects name the HP it ends on. */
export class RestAction extends GameAction {
  readonly kind = "rest";
  private readonly preconditions: WorldState = { [GameState.COOLDOWN_READY]: true, [GameState.CAN_REST]: true };
  private readonly effects: WorldState;

  constructor(context: ActionContext, hpMax?: number) {
    super("rest", 5, context);
    const effects: WorldState = {
      [GameState.HP_LOW]: false,
      [GameState.HP_CRITICAL]: false,
      [GameState.SAFE_TO_FIGHT]: true,
      [GameState.CAN_FIGHT]: true,
    };
    this.effects = hpMax === undefined ? effects : { ...effects, [GameState.HP_CURRENT]: hpMax };
    validateAction(this);
  }

  getPreconditions(): WorldState {
    return this.preconditions;
  }

  getEffects(): WorldState {
    return this.effects;
  }

  protected async perform(characterId: string): Promise<ActionResult> {
    const response = await this.context.client.rest(characterId);
    return actionSuccess(
      `Rested (+${response.hp_restored} HP)`,
      this.observe(response.character),
      response.cooldown_seconds,
    );
  }
}
