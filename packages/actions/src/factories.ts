import {
  EQUIPMENT_SLOTS,
  GameState,
  readInteger,
  skillLevelKey,
  slotEquippedKey,
} from "@goapbot/schemas";
import type { MapTile, WorldSnapshot, WorldState } from "@goapbot/schemas";
import type { GameApiClient } from "@goapbot/game-client";
import { manhattanCost } from "@goapbot/planner";
import type { MovementCostProvider } from "@goapbot/planner";
import type { ActionContext, ActionKind, GameAction } from "./game-action.js";
import {
  CraftAction,
  DepositAction,
  EquipAction,
  FightAction,
  GatherAction,
  MoveAction,
  RestAction,
  WaitAction,
} from "./kinds/index.js";
import { nearestContentTile, positionOf } from "./world-queries.js";

/** Produces the concrete actions of one kind for a state and a world snapshot. */
export interface ActionFactory {
  readonly kind: ActionKind;
  createInstances(snapshot: WorldSnapshot, state: WorldState): GameAction[];
}

/**
 * Base for factories that emit one action per parameter value. Instances
 * with an already-emitted name are dropped; the first one wins.
 */
export abstract class ParameterizedActionFactory implements ActionFactory {
  abstract readonly kind: ActionKind;
  protected readonly client: GameApiClient;

  constructor(client: GameApiClient) {
    this.client = client;
  }

  createInstances(snapshot: WorldSnapshot, state: WorldState): GameAction[] {
    const seen = new Set<string>();
    const actions: GameAction[] = [];
    for (const action of this.build({ client: this.client, snapshot }, state)) {
      if (seen.has(action.name)) continue;
      seen.add(action.name);
      actions.push(action);
    }
    return actions;
  }

  protected abstract build(context: ActionContext, state: WorldState): Iterable<GameAction>;
}

export interface MovementFactoryOptions {
  /** Manhattan radius of the neighbourhood offered around the character. Default: 3 */
  radius?: number;
  /** Builds the cost provider for a snapshot. Default: Manhattan distance */
  costProvider?: (snapshot: WorldSnapshot) => MovementCostProvider;
}

export class MovementActionFactory extends ParameterizedActionFactory {
  readonly kind = "move";
  private readonly radius: number;
  private readonly costProvider: (snapshot: WorldSnapshot) => MovementCostProvider;
  private readonly providers = new WeakMap<WorldSnapshot, MovementCostProvider>();

  constructor(client: GameApiClient, options: MovementFactoryOptions = {}) {
    super(client);
    this.radius = options.radius ?? 3;
    this.costProvider = options.costProvider ?? (() => manhattanCost);
  }

  protected *build(context: ActionContext, state: WorldState): Iterable<GameAction> {
    const from = positionOf(state);
    if (!from) return;
    const cost = this.providerFor(context.snapshot);
    const { maps } = context.snapshot;
    const nearby = maps.filter((t) => Math.abs(t.x - from.x) + Math.abs(t.y - from.y) <= this.radius);
    const landmarks = maps.filter((t) => t.content !== undefined);

    for (const tile of [...nearby, ...landmarks]) {
      if (tile.walkable === false || (tile.x === from.x && tile.y === from.y)) continue;
      const pathCost = cost(from, tile);
      if (pathCost === undefined) continue;
      yield new MoveAction(tile.x, tile.y, Math.max(1, pathCost), context);
    }
  }

  private providerFor(snapshot: WorldSnapshot): MovementCostProvider {
    let provider = this.providers.get(snapshot);
    if (!provider) {
      provider = this.costProvider(snapshot);
      this.providers.set(snapshot, provider);
    }
    return provider;
  }
}

export class CombatActionFactory extends ParameterizedActionFactory {
  readonly kind = "fight";

  protected *build(context: ActionContext, state: WorldState): Iterable<GameAction> {
    const level = readInteger(state, GameState.CHARACTER_LEVEL) ?? 1;
    const from = positionOf(state);
    for (const monster of context.snapshot.monsters) {
      if (monster.level > level + 1) continue;
      const tile = nearestContentTile(context.snapshot, "monster", monster.code, from);
      if (tile) yield new FightAction(monster, tile, context);
    }
  }
}

export class GatheringActionFactory extends ParameterizedActionFactory {
  readonly kind = "gather";

  protected *build(context: ActionContext, state: WorldState): Iterable<GameAction> {
    const from = positionOf(state);
    for (const resource of context.snapshot.resources) {
      const skillLevel = readInteger(state, skillLevelKey(resource.skill)) ?? 1;
      if (skillLevel < resource.level) continue;
      const tile = nearestContentTile(context.snapshot, "resource", resource.code, from);
      if (tile) yield new GatherAction(resource, tile, context);
    }
  }
}

export class CraftingActionFactory extends ParameterizedActionFactory {
  readonly kind = "craft";

  protected *build(context: ActionContext, state: WorldState): Iterable<GameAction> {
    const from = positionOf(state);
    for (const item of context.snapshot.items) {
      const recipe = item.craft;
      if (!recipe) continue;
      const skillLevel = readInteger(state, skillLevelKey(recipe.skill)) ?? 1;
      if (skillLevel < recipe.level) continue;
      const workshop: MapTile | undefined = nearestContentTile(context.snapshot, "workshop", recipe.skill, from);
      if (workshop) yield new CraftAction(item.code, recipe, workshop, context);
    }
  }
}

export class EquipmentActionFactory extends ParameterizedActionFactory {
  readonly kind = "equip";

  protected *build(context: ActionContext, state: WorldState): Iterable<GameAction> {
    for (const slot of EQUIPMENT_SLOTS) {
      if (state[slotEquippedKey(slot)] !== true) yield new EquipAction(slot, context);
    }
  }
}

export class RestActionFactory extends ParameterizedActionFactory {
  readonly kind = "rest";

  protected *build(context: ActionContext, state: WorldState): Iterable<GameAction> {
    yield new RestAction(context, readInteger(state, GameState.HP_MAX));
  }
}

export class BankActionFactory extends ParameterizedActionFactory {
  readonly kind = "deposit";

  protected *build(context: ActionContext, state: WorldState): Iterable<GameAction> {
    const bank = nearestContentTile(context.snapshot, "bank", undefined, positionOf(state));
    if (bank) yield new DepositAction(bank, context);
  }
}

export class WaitActionFactory extends ParameterizedActionFactory {
  readonly kind = "wait";

  protected *build(context: ActionContext): Iterable<GameAction> {
    yield new WaitAction(context);
  }
}
