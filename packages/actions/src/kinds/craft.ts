import { GameState, inventoryQuantity } from "@goapbot/schemas";
import type { ActionResult, CraftRecipe, MapTile, SubGoalRequest, WorldState } from "@goapbot/schemas";
import { GameAction, validateAction } from "../game-action.js";
import type { ActionContext } from "../game-action.js";
import type { FailureContext } from "../translate.js";
import { PRIORITY } from "../translate.js";
import { actionFailure, actionSuccess, subGoalRequest } from "../results.js";
import { isAt } from "../world-queries.js";

export class CraftAction extends GameAction {
  readonly kind = "craft";
  readonly itemCode: string;
  readonly recipe: CraftRecipe;
  readonly workshop: MapTile;
  private readonly preconditions: WorldState;
  private readonly effects: WorldState;

  constructor(itemCode: string, recipe: CraftRecipe, workshop: MapTile, context: ActionContext) {
    super(`craft_${itemCode}`, 8, context);
    this.itemCode = itemCode;
    this.recipe = recipe;
    this.workshop = workshop;
    this.preconditions = {
      [GameState.COOLDOWN_READY]: true,
      [GameState.CAN_CRAFT]: true,
      [GameState.CURRENT_X]: workshop.x,
      [GameState.CURRENT_Y]: workshop.y,
    };
    this.effects = {
      [GameState.ITEM_OBTAINED]: itemCode,
      [GameState.GAINED_SKILL_XP]: recipe.skill,
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
    for (const material of this.recipe.items) {
      const missing = material.quantity - inventoryQuantity(character, material.code);
      if (missing > 0) {
        // The request names the total to hold, not the shortfall.
        requests.push(
          subGoalRequest(
            "gather_material",
            { material_code: material.code, quantity: material.quantity },
            PRIORITY.GATHER_MATERIAL,
            this.name,
            `Missing ${material.code} x${missing}`,
          ),
        );
      }
    }
    if (!isAt(character, this.workshop)) {
      requests.push(
        subGoalRequest(
          "move_to_workshop",
          { workshop_x: this.workshop.x, workshop_y: this.workshop.y, workshop_type: this.recipe.skill },
          PRIORITY.MOVE_TO_WORKSHOP,
          this.name,
          `${this.recipe.skill} workshop is at (${this.workshop.x}, ${this.workshop.y})`,
        ),
      );
    }
    if (requests.length > 0) {
      return actionFailure(`Cannot craft ${this.itemCode}: ${requests.map((r) => r.reason).join("; ")}`, {
        requests,
        stateChanges: this.observe(character),
      });
    }

    const response = await client.craft(characterId, this.itemCode, 1);
    return actionSuccess(
      `Crafted ${this.itemCode} (+${response.details.xp} ${this.recipe.skill} xp)`,
      this.observe(response.character, {
        [GameState.ITEM_OBTAINED]: this.itemCode,
        [GameState.ITEM_QUANTITY]: inventoryQuantity(response.character, this.itemCode),
        [GameState.GAINED_SKILL_XP]: this.recipe.skill,
      }),
      response.cooldown_seconds,
    );
  }

  protected failureContext(): FailureContext {
    return { requester: this.name, target: this.workshop, materials: this.recipe.items };
  }
}
