import {
  GameState,
  SAFE_TO_FIGHT_RATIO,
  formatState,
  hpRatio,
  readInteger,
  skillLevelKey,
  slotEquippedKey,
  stateFrom,
  stateMatches,
  validateStateDict,
} from "@goapbot/schemas";
import type { EquipmentSlot, Goal, Skill, WorldState } from "@goapbot/schemas";

export interface GoalOptions {
  name?: string;
  priority?: number;
  timeoutSeconds?: number;
}

/**
 * Shared plumbing for the built-in goals. A goal is satisfied when its
 * target state holds, unless a subclass says otherwise.
 */
abstract class BaseGoal implements Goal {
  readonly name: string;
  readonly priority: number;
  readonly timeoutSeconds?: number;

  protected constructor(defaultName: string, options: GoalOptions = {}) {
    this.name = options.name ?? defaultName;
    this.priority = options.priority ?? 0;
    if (options.timeoutSeconds !== undefined) this.timeoutSeconds = options.timeoutSeconds;
  }

  abstract getTargetState(state: WorldState): WorldState;
  abstract describe(): string;

  isSatisfied(state: WorldState): boolean {
    return stateMatches(state, this.getTargetState(state));
  }
}

/** A literal target. */
export class StateGoal extends BaseGoal {
  private readonly target: WorldState;

  constructor(target: Readonly<Record<string, unknown>>, options: GoalOptions = {}) {
    const validated = validateStateDict(target);
    super(`state ${formatState(validated)}`, options);
    this.target = validated;
  }

  getTargetState(): WorldState {
    return this.target;
  }

  describe(): string {
    return `Reach ${formatState(this.target)}`;
  }
}

export class MovementGoal extends BaseGoal {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number, options: GoalOptions = {}) {
    super(`move_to_${x}_${y}`, options);
    this.x = x;
    this.y = y;
  }

  getTargetState(): WorldState {
    return { [GameState.CURRENT_X]: this.x, [GameState.CURRENT_Y]: this.y };
  }

  describe(): string {
    return `Move to (${this.x}, ${this.y})`;
  }
}

export class WorkshopMovementGoal extends MovementGoal {
  readonly workshop: string | undefined;

  constructor(x: number, y: number, workshop?: string, options: GoalOptions = {}) {
    super(x, y, { name: `move_to_workshop_${x}_${y}`, ...options });
    this.workshop = workshop;
  }

  getTargetState(): WorldState {
    return { ...super.getTargetState(), [GameState.AT_WORKSHOP_LOCATION]: true };
  }

  describe(): string {
    const kind = this.workshop ? `${this.workshop} workshop` : "workshop";
    return `Move to the ${kind} at (${this.x}, ${this.y})`;
  }
}

/**
 * Satisfied by the HP ratio itself. Below the threshold the target asks for
 * full HP, which is what resting produces.
 */
export class RestGoal extends BaseGoal {
  readonly minHpPercentage: number;

  constructor(minHpPercentage = SAFE_TO_FIGHT_RATIO, options: GoalOptions = {}) {
    super("reach_hp_threshold", options);
    this.minHpPercentage = minHpPercentage;
  }

  getTargetState(state: WorldState = {}): WorldState {
    const target = { [GameState.HP_LOW]: false, [GameState.SAFE_TO_FIGHT]: true };
    const hp = readInteger(state, GameState.HP_CURRENT);
    const max = readInteger(state, GameState.HP_MAX);
    if (hp === undefined || max === undefined || hpRatio(hp, max) >= this.minHpPercentage) return target;
    return { ...target, [GameState.HP_CURRENT]: max };
  }

  isSatisfied(state: WorldState): boolean {
    const hp = readInteger(state, GameState.HP_CURRENT);
    const max = readInteger(state, GameState.HP_MAX);
    if (hp === undefined || max === undefined) return super.isSatisfied(state);
    return hpRatio(hp, max) >= this.minHpPercentage;
  }

  describe(): string {
    return `Rest until HP is at least ${Math.round(this.minHpPercentage * 100)}%`;
  }
}

/**
 * Each plan for the target obtains one more unit; the goal holds once the
 * last observed count reaches `quantity`.
 */
export class ObtainItemGoal extends BaseGoal {
  readonly itemCode: string;
  readonly quantity: number;

  constructor(itemCode: string, quantity = 1, options: GoalOptions = {}) {
    super(`obtain_${itemCode}`, options);
    this.itemCode = itemCode;
    this.quantity = quantity;
  }

  getTargetState(): WorldState {
    return { [GameState.ITEM_OBTAINED]: this.itemCode };
  }

  isSatisfied(state: WorldState): boolean {
    if (state[GameState.ITEM_OBTAINED] !== this.itemCode) return false;
    return (readInteger(state, GameState.ITEM_QUANTITY) ?? 1) >= this.quantity;
  }

  describe(): string {
    return `Obtain ${this.itemCode} x${this.quantity}`;
  }
}

export class EquipmentGoal extends BaseGoal {
  readonly slot: EquipmentSlot;
  private readonly target: WorldState;

  constructor(slot: EquipmentSlot, options: GoalOptions = {}) {
    super(`equip_${slot}`, options);
    this.slot = slot;
    this.target = stateFrom([[slotEquippedKey(slot), true]]);
  }

  getTargetState(): WorldState {
    return this.target;
  }

  describe(): string {
    return `Equip a ${this.slot}`;
  }
}

export class CraftGoal extends BaseGoal {
  readonly itemCode: string;
  readonly workshop: string | undefined;

  constructor(itemCode: string, workshop?: string, options: GoalOptions = {}) {
    super(`craft_${itemCode}`, options);
    this.itemCode = itemCode;
    this.workshop = workshop;
  }

  getTargetState(): WorldState {
    return { [GameState.ITEM_OBTAINED]: this.itemCode };
  }

  describe(): string {
    return this.workshop ? `Craft ${this.itemCode} at a ${this.workshop} workshop` : `Craft ${this.itemCode}`;
  }
}

export class FreeInventoryGoal extends BaseGoal {
  constructor(options: GoalOptions = {}) {
    super("free_inventory_space", options);
  }

  getTargetState(): WorldState {
    return { [GameState.INVENTORY_FULL]: false, [GameState.INVENTORY_SPACE_AVAILABLE]: true };
  }

  describe(): string {
    return "Free inventory space";
  }
}

export class WaitForCooldownGoal extends BaseGoal {
  constructor(options: GoalOptions = {}) {
    super("wait_for_cooldown", options);
  }

  getTargetState(): WorldState {
    return { [GameState.COOLDOWN_READY]: true };
  }

  describe(): string {
    return "Wait for cooldown";
  }
}

/**
 * Progress goal: each cycle plans for one XP gain until the level is
 * reached. The target is empty once the level holds.
 */
export class LevelGoal extends BaseGoal {
  readonly level: number;

  constructor(level: number, options: GoalOptions = {}) {
    super(`level_${level}`, options);
    this.level = level;
  }

  getTargetState(state: WorldState): WorldState {
    return this.isSatisfied(state) ? {} : { [GameState.GAINED_XP]: true };
  }

  isSatisfied(state: WorldState): boolean {
    return (readInteger(state, GameState.CHARACTER_LEVEL) ?? 0) >= this.level;
  }

  describe(): string {
    return `Reach character level ${this.level}`;
  }
}

export class SkillLevelGoal extends BaseGoal {
  readonly skill: Skill;
  readonly level: number;

  constructor(skill: Skill, level: number, options: GoalOptions = {}) {
    super(`${skill}_${level}`, options);
    this.skill = skill;
    this.level = level;
  }

  getTargetState(state: WorldState): WorldState {
    return this.isSatisfied(state) ? {} : { [GameState.GAINED_SKILL_XP]: this.skill };
  }

  isSatisfied(state: WorldState): boolean {
    return (readInteger(state, skillLevelKey(this.skill)) ?? 0) >= this.level;
  }

  describe(): string {
    return `Reach ${this.skill} level ${this.level}`;
  }
}

export function isGoal(value: unknown): value is Goal {
  return typeof value === "object"
    && value !== null
    && "getTargetState" in value
    && typeof value.getTargetState === "function"
    && "isSatisfied" in value
    && typeof value.isSatisfied === "function";
}
