import { GameState, inventoryQuantity, slotEquippedKey, stateFrom } from "@goapbot/schemas";
import type { ActionResult, Character, EquipmentSlot, ItemInfo, WorldState } from "@goapbot/schemas";
import { GameAction, validateAction } from "../game-action.js";
import type { ActionContext } from "../game-action.js";
import { PRIORITY } from "../translate.js";
import { actionFailure, actionSuccess, subGoalRequest } from "../results.js";
import { contentTiles } from "../world-queries.js";

function highestLevel(items: ItemInfo[]): ItemInfo | undefined {
  let best: ItemInfo | undefined;
  for (const item of items) {
    if (!best || item.level > best.level) best = item;
  }
  return best;
}

export class EquipAction extends GameAction {
  readonly kind = "equip";
  readonly slot: EquipmentSlot;
  private readonly preconditions: WorldState = { [GameState.COOLDOWN_READY]: true, [GameState.CAN_EQUIP]: true };
  private readonly effects: WorldState;

  constructor(slot: EquipmentSlot, context: ActionContext) {
    super(`equip_best_${slot}`, 2, context);
    this.slot = slot;
    this.effects = stateFrom([[slotEquippedKey(slot), true]]);
    validateAction(this);
  }

  getPreconditions(): WorldState {
    return this.preconditions;
  }

  getEffects(): WorldState {
    return this.effects;
  }

  /** Best item for the slot the character holds and may wear. */
  bestHeldItem(character: Character): ItemInfo | undefined {
    return highestLevel(
      this.context.snapshot.items.filter(
        (i) => i.type === this.slot && i.level <= character.level && inventoryQuantity(character, i.code) > 0,
      ),
    );
  }

  /** Best item for the slot the character could craft right now at a known workshop. */
  bestCraftableItem(character: Character): ItemInfo | undefined {
    const { snapshot } = this.context;
    return highestLevel(
      snapshot.items.filter((i) => {
        if (i.type !== this.slot || !i.craft || i.level > character.level) return false;
        const skillLevel = character.skills[i.craft.skill]?.level ?? 1;
        return skillLevel >= i.craft.level && contentTiles(snapshot, "workshop", i.craft.skill).length > 0;
      }),
    );
  }

  protected async perform(characterId: string): Promise<ActionResult> {
    const { client, snapshot } = this.context;
    const character = await client.getCharacter(characterId);
    const equipped = character.equipment[this.slot];
    const held = this.bestHeldItem(character);
    const equippedLevel = snapshot.items.find((i) => i.code === equipped)?.level ?? 0;

    if (held && (!equipped || held.level > equippedLevel)) {
      const response = await client.equip(characterId, held.code, this.slot);
      return actionSuccess(
        `Equipped ${held.code} in ${this.slot}`,
        this.observe(response.character),
        response.cooldown_seconds,
      );
    }
    if (equipped) {
      return actionSuccess(`${equipped} already equipped in ${this.slot}`, this.observe(character));
    }

    const craftable = this.bestCraftableItem(character);
    if (craftable?.craft) {
      return actionFailure(`No ${this.slot} in inventory`, {
        stateChanges: this.observe(character),
        requests: [
          subGoalRequest(
            "execute_craft",
            { recipe_code: craftable.code, workshop_type: craftable.craft.skill },
            PRIORITY.EXECUTE_CRAFT,
            this.name,
            `Craft ${craftable.code} to fill the ${this.slot} slot`,
          ),
        ],
      });
    }
    return actionFailure(`No ${this.slot} available to equip or craft`, { stateChanges: this.observe(character) });
  }
}
