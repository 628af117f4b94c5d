import { DuplicateActionError } from "@goapbot/schemas";
import type { WorldSnapshot, WorldState } from "@goapbot/schemas";
import type { GameApiClient } from "@goapbot/game-client";
import { validateAction } from "./game-action.js";
import type { ActionKind, GameAction } from "./game-action.js";
import {
  BankActionFactory,
  CombatActionFactory,
  CraftingActionFactory,
  EquipmentActionFactory,
  GatheringActionFactory,
  MovementActionFactory,
  RestActionFactory,
  WaitActionFactory,
} from "./factories.js";
import type { ActionFactory, MovementFactoryOptions } from "./factories.js";

/**
 * Holds one factory per action kind and builds the planner's action
 * universe. Factory errors are never caught here.
 */
export class ActionRegistry {
  private factories = new Map<ActionKind, ActionFactory>();

  registerFactory(factory: ActionFactory): void {
    this.factories.set(factory.kind, factory);
  }

  getFactory(kind: ActionKind): ActionFactory | undefined {
    return this.factories.get(kind);
  }

  listFactories(): ActionFactory[] {
    return [...this.factories.values()];
  }

  generateActionsForState(state: WorldState, snapshot: WorldSnapshot): GameAction[] {
    const names = new Set<string>();
    const actions: GameAction[] = [];
    for (const factory of this.factories.values()) {
      for (const action of factory.createInstances(snapshot, state)) {
        validateAction(action);
        if (names.has(action.name)) throw new DuplicateActionError(action.name);
        names.add(action.name);
        actions.push(action);
      }
    }
    return actions;
  }

  /** Linear scan for diagnostics; not used while planning. */
  getActionByName(name: string, state: WorldState, snapshot: WorldSnapshot): GameAction | undefined {
    return this.generateActionsForState(state, snapshot).find((a) => a.name === name);
  }
}

export interface DefaultRegistryOptions {
  movement?: MovementFactoryOptions;
}

export function createDefaultRegistry(client: GameApiClient, options: DefaultRegistryOptions = {}): ActionRegistry {
  const registry = new ActionRegistry();
  registry.registerFactory(new MovementActionFactory(client, options.movement));
  registry.registerFactory(new CombatActionFactory(client));
  registry.registerFactory(new GatheringActionFactory(client));
  registry.registerFactory(new RestActionFactory(client));
  registry.registerFactory(new CraftingActionFactory(client));
  registry.registerFactory(new EquipmentActionFactory(client));
  registry.registerFactory(new BankActionFactory(client));
  registry.registerFactory(new WaitActionFactory(client));
  return registry;
}
