import {
  ActionDefinitionError,
  characterToStateDict,
  isStateKey,
  isStateValue,
  stateMatches,
  validateStateDict,
} from "@goapbot/schemas";
import type {
  ActionDescription,
  ActionResult,
  Character,
  PlannableAction,
  StateValue,
  WorldSnapshot,
  WorldState,
} from "@goapbot/schemas";
import type { GameApiClient } from "@goapbot/game-client";
import { translateApiError } from "./translate.js";
import type { FailureContext } from "./translate.js";

export const ACTION_KINDS = ["move", "fight", "gather", "rest", "craft", "equip", "deposit", "wait"] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

/** What every concrete action needs to reach the game. */
export interface ActionContext {
  client: GameApiClient;
  snapshot: WorldSnapshot;
}

/**
 * Base of every concrete action. Preconditions and effects are fixed at
 * construction; `execute` is the only method that performs I/O.
 */
export abstract class GameAction implements PlannableAction {
  abstract readonly kind: ActionKind;
  readonly name: string;
  readonly cost: number;
  protected readonly context: ActionContext;

  protected constructor(name: string, cost: number, context: ActionContext) {
    this.name = name;
    this.cost = cost;
    this.context = context;
  }

  abstract getPreconditions(): WorldState;
  abstract getEffects(): WorldState;

  canExecute(state: WorldState): boolean {
    return stateMatches(state, this.getPreconditions());
  }

  describe(): ActionDescription {
    return {
      name: this.name,
      kind: this.kind,
      cost: this.cost,
      preconditions: this.getPreconditions(),
      effects: this.getEffects(),
    };
  }

  /**
   * Game refusals come back as failed results. Transport failures and
   * malformed responses are thrown.
   */
  async execute(characterId: string, state: WorldState): Promise<ActionResult> {
    try {
      return await this.perform(characterId, state);
    } catch (err) {
      return translateApiError(err, this.failureContext());
    }
  }

  protected abstract perform(characterId: string, state: WorldState): Promise<ActionResult>;

  protected failureContext(): FailureContext {
    return { requester: this.name };
  }

  /** Observed state of a character returned by the game, plus event flags. */
  protected observe(character: Character, flags: Record<string, StateValue> = {}): WorldState {
    return validateStateDict({ ...characterToStateDict(character, this.context.snapshot), ...flags });
  }
}

/** Re-checks an action's declared shape against the vocabulary. */
export function validateAction(action: PlannableAction): void {
  if (action.name.trim() === "") {
    throw new ActionDefinitionError(action.name, "name must not be empty");
  }
  if (!Number.isInteger(action.cost) || action.cost < 0) {
    throw new ActionDefinitionError(action.name, `cost must be a non-negative integer, got ${action.cost}`);
  }
  for (const [label, state] of [["precondition", action.getPreconditions()], ["effect", action.getEffects()]] as const) {
    for (const [key, value] of Object.entries(state)) {
      if (!isStateKey(key)) {
        throw new ActionDefinitionError(action.name, `unknown ${label} key "${key}"`);
      }
      if (!isStateValue(value)) {
        throw new ActionDefinitionError(action.name, `invalid ${label} value for "${key}"`);
      }
    }
  }
}
