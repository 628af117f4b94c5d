import { GameState, inventoryQuantity, inventoryUsed } from "@goapbot/schemas";
import type { ActionResult, MapTile, ResourceInfo, SubGoalRequest, WorldState } from "@goapbot/schemas";
import { GameAction, validateAction } from "../game-action.js";
import type { ActionContext } from "../game-action.js";
import type { FailureContext } from "../translate.js";
import { PRIORITY } from "../translate.js";
import { actionFailure, actionSuccess, subGoalRequest } from "../results.js";
import { isAt } from "../world-queries.js";

export class GatherAction extends GameAction {
  readonly kind = "gather";
  readonly resource: ResourceInfo;
  readonly tile: MapTile;
  private readonly preconditions: WorldState;
  private readonly effects: WorldState;

  constructor(resource: ResourceInfo, tile: MapTile, context: ActionContext) {
    super(`gather_${resource.code}`, 5, context);
    this.resource = resource;
    this.tile = tile;
    this.preconditions = {
      [GameState.COOLDOWN_READY]: true,
      [GameState.CAN_GATHER]: true,
      [GameState.CURRENT_X]: tile.x,
      [GameState.CURRENT_Y]: tile.y,
    };
    this.effects = {
      [GameState.ITEM_OBTAINED]: resource.drop,
      [GameState.GAINED_SKILL_XP]: resource.skill,
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

    const requests: SubGoalRequest[] = [];
    if (inventoryUsed(character) >= character.inventory_max_items) {
      requests.push(subGoalRequest("free_inventory_space", {}, PRIORITY.FREE_INVENTORY, this.name, "Inventory is full"));
    }
    if (!isAt(character, this.tile)) {
      requests.push(
        subGoalRequest(
          "move_to_location",
          { target_x: this.tile.x, target_y: this.tile.y },
          PRIORITY.MOVE,
          this.name,
          `${this.resource.code} is at (${this.tile.x}, ${this.tile.y})`,
        ),
      );
    }
    if (requests.length > 0) {
      return actionFailure(`Cannot gather ${this.resource.code}: ${requests.map((r) => r.reason).join("; ")}`, {
        requests,
        stateChanges: this.observe(character),
      });
    }

    const response = await client.gather(characterId);
    const obtained = response.details.items[0]?.code ?? this.resource.drop;
    return actionSuccess(
      `Gathered ${obtained} (+${response.details.xp} ${this.resource.skill} xp)`,
      this.observe(response.character, {
        [GameState.ITEM_OBTAINED]: obtained,
        [GameState.ITEM_QUANTITY]: inventoryQuantity(response.character, obtained),
        [GameState.GAINED_SKILL_XP]: this.resource.skill,
      }),
      response.cooldown_seconds,
    );
  }

  protected failureContext(): FailureContext {
    return { requester: this.name, target: this.tile };
  }
}
