import { v4 as uuid } from "uuid";
import {
  GoalFactoryError,
  MaxDepthExceededError,
  NoPlanFoundError,
  NoValidGoalError,
  UnknownGoalTypeError,
  isSkill,
  isStateKey,
  stateFrom,
  validateWithSchema,
} from "@goapbot/schemas";
import type {
  Goal,
  GoalFactoryContext,
  GoalTemplate,
  Logger,
  Plan,
  PlannableAction,
  PlanningFailureReason,
  StateKey,
  StateValue,
  SubGoalRequest,
  WorldState,
} from "@goapbot/schemas";
import { GoapPlanner } from "@goapbot/planner";
import type { GoapPlannerConfig } from "@goapbot/planner";
import { LevelGoal, SkillLevelGoal, StateGoal, isGoal } from "./goals.js";
import { goalFromTemplate } from "./templates.js";
import { builtinSubGoals } from "./sub-goals.js";
import type { SubGoalDefinition, SubGoalFactory } from "./sub-goals.js";

export type GoalInput = string | Goal | Readonly<Record<string, unknown>>;

export type PlanOutcome<A extends PlannableAction> =
  | { ok: true; goal: Goal; plan: Plan<A> }
  | {
      ok: false;
      kind: "no_plan";
      goal: Goal;
      reason: PlanningFailureReason;
      nodes_expanded: number;
      message: string;
    };

export interface GoalManagerOptions {
  templates?: Record<string, GoalTemplate>;
  planner?: GoapPlannerConfig;
  logger?: Logger;
}

const LEVEL_PATTERN = /^(?:reach\s+)?level[\s_]+(\d+)$/i;
const SKILL_PATTERN = /^([a-z]+)(?:[\s_]+level)?[\s_]+(\d+)$/i;
const BARE_KEY_PATTERN = /^(!)?([a-z_]+)$/;

function parseValue(raw: string): StateValue {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (/^-?\d+$/.test(raw)) return Number.parseInt(raw, 10);
  return raw;
}

/**
 * Turns goal strings, templates and sub-goal requests into goals, and
 * goals into plans.
 */
export class GoalManager {
  private templates: Map<string, GoalTemplate>;
  private subGoals: Map<string, SubGoalDefinition> = builtinSubGoals();
  private planner: GoapPlanner;
  private logger: Logger | undefined;

  constructor(options: GoalManagerOptions = {}) {
    this.templates = new Map(Object.entries(options.templates ?? {}));
    this.planner = new GoapPlanner(options.planner);
    this.logger = options.logger;
  }

  listTemplates(): string[] {
    return [...this.templates.keys()];
  }

  parseGoal(goalString: string): Goal {
    const text = goalString.trim();

    const template = this.templates.get(text);
    if (template) return goalFromTemplate(text, template);

    const level = LEVEL_PATTERN.exec(text);
    if (level?.[1]) return new LevelGoal(Number.parseInt(level[1], 10));

    const skill = SKILL_PATTERN.exec(text);
    const skillName = skill?.[1]?.toLowerCase();
    if (skill?.[2] && skillName && isSkill(skillName)) {
      return new SkillLevelGoal(skillName, Number.parseInt(skill[2], 10));
    }

    if (text.includes("=")) return new StateGoal(this.parsePairs(text));

    const bare = BARE_KEY_PATTERN.exec(text);
    const key = bare?.[2];
    if (key !== undefined && isStateKey(key)) {
      return new StateGoal(stateFrom([[key, bare?.[1] !== "!"]]));
    }

    throw new NoValidGoalError(`Cannot parse goal: "${goalString}"`);
  }

  resolveGoal(input: GoalInput): Goal {
    if (typeof input === "string") return this.parseGoal(input);
    if (isGoal(input)) return input;
    return new StateGoal(input);
  }

  registerSubGoalFactory(goalType: string, factory: SubGoalFactory, schema?: Record<string, unknown>): void {
    this.subGoals.set(goalType, schema ? { factory, schema } : { factory });
  }

  hasSubGoalType(goalType: string): boolean {
    return this.subGoals.has(goalType);
  }

  /**
   * Builds the goal answering a sub-goal request. The depth bound is checked
   * before anything else.
   */
  createGoalFromSubRequest(request: SubGoalRequest, context: GoalFactoryContext): Goal {
    if (context.recursion_depth >= context.max_depth) {
      throw new MaxDepthExceededError(context.recursion_depth, context.max_depth);
    }
    const definition = this.subGoals.get(request.goal_type);
    if (!definition) throw new UnknownGoalTypeError(request.goal_type);

    if (definition.schema) {
      const validation = validateWithSchema(request.parameters, definition.schema);
      if (!validation.valid) throw new GoalFactoryError(request.goal_type, validation.errors);
    }

    const goal = definition.factory(request.parameters, request, context);
    this.logger?.debug("Sub-goal created", {
      goal_type: request.goal_type,
      goal: goal.name,
      requester: request.requester,
      depth: context.recursion_depth,
    });
    return goal;
  }

  /** Plans from `current` to `target`. Throws NoPlanFoundError when the search fails. */
  planToTargetState<A extends PlannableAction>(
    current: WorldState,
    target: WorldState,
    actions: readonly A[],
    goalName = "target_state",
  ): Plan<A> {
    const result = this.planner.plan(current, target, actions);
    if (!result.success) {
      throw new NoPlanFoundError(goalName, result.reason, result.nodes_expanded, result.message);
    }
    this.logger?.debug("Plan found", {
      goal: goalName,
      steps: result.actions.length,
      total_cost: result.total_cost,
      nodes_expanded: result.nodes_expanded,
    });
    return {
      plan_id: uuid(),
      goal: goalName,
      target_state: target,
      actions: result.actions,
      total_cost: result.total_cost,
      created_at: new Date().toISOString(),
    };
  }

  plan<A extends PlannableAction>(input: GoalInput, current: WorldState, actions: readonly A[]): PlanOutcome<A> {
    const goal = this.resolveGoal(input);
    try {
      return { ok: true, goal, plan: this.planToTargetState(current, goal.getTargetState(current), actions, goal.name) };
    } catch (err) {
      if (!(err instanceof NoPlanFoundError)) throw err;
      return {
        ok: false,
        kind: "no_plan",
        goal,
        reason: err.reason,
        nodes_expanded: err.nodesExpanded,
        message: err.message,
      };
    }
  }

  private parsePairs(text: string): WorldState {
    const entries: Array<[StateKey, StateValue]> = [];
    for (const pair of text.split(",")) {
      const [rawKey, rawValue, ...rest] = pair.split("=").map((s) => s.trim());
      if (!rawKey || rawValue === undefined || rawValue === "" || rest.length > 0) {
        throw new NoValidGoalError(`Malformed goal pair "${pair.trim()}" in "${text}"`);
      }
      if (!isStateKey(rawKey)) throw new NoValidGoalError(`Unknown state key "${rawKey}" in goal "${text}"`);
      entries.push([rawKey, parseValue(rawValue)]);
    }
    return stateFrom(entries);
  }
}

/** Highest-priority goal not yet satisfied; list order breaks ties. */
export function selectGoal(goals: readonly Goal[], state: WorldState): Goal | undefined {
  let best: Goal | undefined;
  for (const goal of goals) {
    if (goal.isSatisfied(state)) continue;
    if (!best || goal.priority > best.priority) best = goal;
  }
  return best;
}
