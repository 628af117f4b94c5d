import { GameState, SAFE_TO_FIGHT_RATIO, hpRatio } from "@goapbot/schemas";
import type { ActionResult, MapTile, MonsterInfo, SubGoalRequest, WorldState } from "@goapbot/schemas";
import { GameAction, validateAction } from "../game-action.js";
import type { ActionContext } from "../game-action.js";
import type { FailureContext } from "../translate.js";
import { PRIORITY } from "../translate.js";
import { actionFailure, actionSuccess, subGoalRequest } from "../results.js";
import { isAt } from "../world-queries.js";

export class FightAction extends GameAction {
  readonly kind = "fight";
  readonly monster: MonsterInfo;
  readonly tile: MapTile;
  private readonly preconditions: WorldState;
  private readonly effects: WorldState;

  constructor(monster: MonsterInfo, tile: MapTile, context: ActionContext) {
    super(`fight_${monster.code}`, 10, context);
    this.monster = monster;
    this.tile = tile;
    this.preconditions = {
      [GameState.COOLDOWN_READY]: true,
      [GameState.CAN_FIGHT]: true,
      [GameState.SAFE_TO_FIGHT]: true,
      [GameState.CURRENT_X]: tile.x,
      [GameState.CURRENT_Y]: tile.y,
    };
    this.effects = { [GameState.GAINED_XP]: true, [GameState.COMBAT_WON]: true };
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
    const code = this.monster.code;

    const requests: SubGoalRequest[] = [];
    if (hpRatio(character.hp, character.max_hp) < SAFE_TO_FIGHT_RATIO) {
      requests.push(this.restRequest(`HP ${character.hp}/${character.max_hp} is too low to fight`));
    }
    if (!isAt(character, this.tile)) {
      requests.push(
        subGoalRequest(
          "move_to_location",
          { target_x: this.tile.x, target_y: this.tile.y },
          PRIORITY.MOVE,
          this.name,
          `${code} is at (${this.tile.x}, ${this.tile.y})`,
        ),
      );
    }
    if (!character.equipment.weapon) {
      requests.push(
        subGoalRequest(
          "equip_item_type",
          { item_type: "weapon" },
          PRIORITY.EQUIP,
          this.name,
          "No weapon equipped",
        ),
      );
    }
    if (requests.length > 0) {
      return actionFailure(`Cannot fight ${code}: ${requests.map((r) => r.reason).join("; ")}`, {
        requests,
        stateChanges: this.observe(character),
      });
    }

    const response = await client.fight(characterId);
    const { fight } = response;
    if (fight.result === "loss") {
      return actionFailure(`Lost the fight against ${code}`, {
        stateChanges: this.observe(response.character),
        cooldownSeconds: response.cooldown_seconds,
        requests: [this.restRequest(`Recover after losing to ${code}`)],
      });
    }
    return actionSuccess(
      `Defeated ${code} (+${fight.xp} xp, +${fight.gold} gold)`,
      this.observe(response.character, { [GameState.GAINED_XP]: true, [GameState.COMBAT_WON]: true }),
      response.cooldown_seconds,
    );
  }

  protected failureContext(): FailureContext {
    return { requester: this.name, target: this.tile };
  }

  private restRequest(reason: string): SubGoalRequest {
    return subGoalRequest(
      "reach_hp_threshold",
      { min_hp_percentage: SAFE_TO_FIGHT_RATIO },
      PRIORITY.REACH_HP_THRESHOLD,
      this.name,
      reason,
    );
  }
}
