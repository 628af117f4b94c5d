import { GameState } from "@goapbot/schemas";
import type { ActionResult, MapTile, WorldState } from "@goapbot/schemas";
import { GameAction, validateAction } from "../game-action.js";
import type { ActionContext } from "../game-action.js";
import type { FailureContext } from "../translate.js";
import { PRIORITY } from "../translate.js";
import { actionFailure, actionSuccess, subGoalRequest } from "../results.js";
import { isAt } from "../world-queries.js";

export class DepositAction extends GameAction {
  readonly kind = "deposit";
  readonly bank: MapTile;
  private readonly preconditions: WorldState;
  private readonly effects: WorldState = {
    [GameState.INVENTORY_FULL]: false,
    [GameState.INVENTORY_SPACE_AVAILABLE]: true,
    [GameState.INVENTORY_SPACE_USED]: 0,
    [GameState.CAN_GATHER]: true,
    [GameState.CAN_CRAFT]: true,
  };

  constructor(bank: MapTile, context: ActionContext) {
    super("deposit_all", 4, context);
    this.bank = bank;
    this.preconditions = {
      [GameState.COOLDOWN_READY]: true,
      [GameState.CAN_BANK]: true,
      [GameState.CURRENT_X]: bank.x,
      [GameState.CURRENT_Y]: bank.y,
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
    const { client } = this.context;
    const character = await client.getCharacter(characterId);
    if (!isAt(character, this.bank)) {
      return actionFailure(`Not at the bank (${this.bank.x}, ${this.bank.y})`, {
        stateChanges: this.observe(character),
        requests: [
          subGoalRequest(
            "move_to_location",
            { target_x: this.bank.x, target_y: this.bank.y },
            PRIORITY.MOVE,
            this.name,
            `Bank is at (${this.bank.x}, ${this.bank.y})`,
          ),
        ],
      });
    }

    const response = await client.depositAll(characterId);
    const count = response.deposited.reduce((sum, slot) => sum + slot.quantity, 0);
    return actionSuccess(`Deposited ${count} items`, this.observe(response.character), response.cooldown_seconds);
  }

  protected failureContext(): FailureContext {
    return { requester: this.name, target: this.bank };
  }
}
