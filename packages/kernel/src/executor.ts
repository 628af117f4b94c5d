import { v4 as uuid } from "uuid";
import {
  EVENT_FLAG_KEYS,
  GameState,
  MaxDepthExceededError,
  NoValidGoalError,
  StateConsistencyError,
  StateValidationError,
  TimeoutError,
  applyStateChanges,
  deadlinePassed,
  errorMessage,
  withTimeout,
  withoutKeys,
} from "@goapbot/schemas";
import type {
  ActionResult,
  ExecutionResult,
  ExecutorState,
  FailureKind,
  Goal,
  JournalEventType,
  Logger,
  Plan,
  SubGoalRequest,
  WorldSnapshot,
  WorldState,
} from "@goapbot/schemas";
import { requestFingerprint } from "@goapbot/actions";
import type { ActionRegistry, GameAction } from "@goapbot/actions";
import type { GoalManager } from "@goapbot/goals";
import type { StateSource } from "@goapbot/game-client";
import type { Journal } from "@goapbot/journal";
import { createLogger } from "@goapbot/journal";
import { assertSubGoalReached } from "./consistency.js";

export interface ExecutorConfig {
  goals: GoalManager;
  registry: ActionRegistry;
  stateSource: StateSource;
  snapshot: WorldSnapshot;
  journal?: Journal;
  /** Journal session id for every event this executor records. Default: a fresh uuid */
  runId?: string;
  /** Depth at which recursion stops. Default: 5 */
  maxDepth?: number;
  /** Attempts per action, first one included. Default: 3 */
  maxAttempts?: number;
  /** Plan-and-run rounds for one sub-goal whose goal needs more than one pass. Default: 10 */
  maxSubGoalRounds?: number;
  /** Per-call bound on `execute`. Default: none */
  actionTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

export const DEFAULT_MAX_DEPTH = 5;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_MAX_SUB_GOAL_ROUNDS = 10;

const VALID_TRANSITIONS: Record<ExecutorState, ExecutorState[]> = {
  executing: ["succeeded", "failed", "awaiting_sub_goal"],
  awaiting_sub_goal: ["recursing", "failed"],
  recursing: ["awaiting_sub_goal", "retrying", "failed"],
  retrying: ["executing", "failed"],
  succeeded: [],
  failed: [],
};

/** Counters shared by every depth of one top-level execution. */
interface RunContext {
  actionsExecuted: number;
  depthReached: number;
  lastState: WorldState;
  startedAt: number;
}

/** State machine of one plan at one depth. */
interface Frame {
  depth: number;
  status: ExecutorState;
}

interface Outcome {
  success: boolean;
  state: WorldState;
  message?: string;
  failureKind?: FailureKind;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs a plan action by action. A failed action may name sub-goals; each
 * one is planned and executed one level deeper before the action is
 * retried.
 */
export class RecursiveActionExecutor {
  readonly maxDepth: number;
  readonly maxAttempts: number;
  readonly maxSubGoalRounds: number;
  readonly runId: string;
  private config: ExecutorConfig;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;
  private logger: Logger;

  constructor(config: ExecutorConfig) {
    this.config = config;
    this.maxDepth = config.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.maxSubGoalRounds = Math.max(1, config.maxSubGoalRounds ?? DEFAULT_MAX_SUB_GOAL_ROUNDS);
    this.runId = config.runId ?? uuid();
    this.sleep = config.sleep ?? sleep;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? createLogger("executor");
  }

  /**
   * Top-level entry. Depth, validation and unexpected errors come back as a
   * failed result rather than a rejection.
   */
  async executePlan(
    plan: Plan<GameAction>,
    characterId: string,
    state: WorldState,
    goal?: Goal,
  ): Promise<ExecutionResult> {
    const ctx = this.newContext(state);
    try {
      return this.summarize(ctx, await this.run(plan, characterId, state, 0, ctx, goal));
    } catch (err) {
      const message = errorMessage(err);
      if (err instanceof MaxDepthExceededError) {
        return this.summarize(ctx, { success: false, state: ctx.lastState, message, failureKind: "max_depth" });
      }
      if (err instanceof StateValidationError) {
        return this.summarize(ctx, { success: false, state: ctx.lastState, message, failureKind: "state_validation" });
      }
      this.logger.error("Plan execution aborted", { plan_id: plan.plan_id, character: characterId, error: message });
      return this.summarize(ctx, {
        success: false,
        state: ctx.lastState,
        message: `Internal error: ${message}`,
        failureKind: "internal_error",
      });
    }
  }

  /** Runs `plan` at `depth`. Throws MaxDepthExceededError when `depth` is out of bounds. */
  async executePlanRecursive(
    plan: Plan<GameAction>,
    characterId: string,
    state: WorldState,
    depth = 0,
    goal?: Goal,
  ): Promise<ExecutionResult> {
    const ctx = this.newContext(state);
    return this.summarize(ctx, await this.run(plan, characterId, state, depth, ctx, goal));
  }

  private newContext(state: WorldState): RunContext {
    return { actionsExecuted: 0, depthReached: 0, lastState: state, startedAt: this.now() };
  }

  private summarize(ctx: RunContext, outcome: Outcome): ExecutionResult {
    const result: ExecutionResult = {
      success: outcome.success,
      depth_reached: ctx.depthReached,
      actions_executed: ctx.actionsExecuted,
      execution_time_ms: this.now() - ctx.startedAt,
      final_state: outcome.state,
    };
    if (outcome.message !== undefined) result.error_message = outcome.message;
    if (outcome.failureKind !== undefined) result.failure_kind = outcome.failureKind;
    return result;
  }

  private async run(
    plan: Plan<GameAction>,
    characterId: string,
    state: WorldState,
    depth: number,
    ctx: RunContext,
    goal: Goal | undefined,
  ): Promise<Outcome> {
    if (depth >= this.maxDepth) {
      await this.record("executor.depth_exceeded", { depth, max_depth: this.maxDepth, plan_id: plan.plan_id });
      throw new MaxDepthExceededError(depth, this.maxDepth);
    }
    ctx.depthReached = Math.max(ctx.depthReached, depth);

    const frame: Frame = { depth, status: "executing" };
    const startedAt = this.now();
    let current = state;

    for (const action of plan.actions) {
      const outcome = await this.runAction(action, characterId, current, frame, ctx, goal, startedAt);
      current = outcome.state;
      if (!outcome.success) return outcome;
    }

    await this.transition(frame, "succeeded");
    return { success: true, state: current };
  }

  private async runAction(
    action: GameAction,
    characterId: string,
    state: WorldState,
    frame: Frame,
    ctx: RunContext,
    goal: Goal | undefined,
    startedAt: number,
  ): Promise<Outcome> {
    const { depth } = frame;
    const resolved = new Set<string>();
    let current = state;
    let lastMessage = "";

    const fail = async (message: string, failureKind: FailureKind): Promise<Outcome> => {
      await this.transition(frame, "failed");
      return { success: false, state: current, message, failureKind };
    };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (attempt > 1) {
        if (goal && deadlinePassed(startedAt, goal.timeoutSeconds, this.now())) {
          const message = `Goal "${goal.name}" timed out after ${goal.timeoutSeconds ?? 0}s`;
          await this.record("executor.timeout", { depth, goal: goal.name, action: action.name, attempt });
          return fail(message, "timeout");
        }
        await this.transition(frame, "executing");
      }

      ctx.actionsExecuted += 1;
      await this.record("action.started", { action: action.name, attempt, depth });

      let result: ActionResult;
      try {
        result = await withTimeout(
          action.execute(characterId, current),
          this.config.actionTimeoutMs,
          `Action "${action.name}"`,
        );
      } catch (err) {
        if (!(err instanceof TimeoutError)) throw err;
        await this.record("action.failed", { action: action.name, attempt, depth, message: err.message });
        return fail(err.message, "timeout");
      }

      current = applyStateChanges(current, result.state_changes);
      ctx.lastState = current;

      if (result.success) {
        current = applyStateChanges(current, await this.config.stateSource.fetchState(characterId));
        await this.record("action.succeeded", { action: action.name, attempt, depth, message: result.message });
        await this.waitCooldown(action.name, result.cooldown_seconds, depth);
        current = applyStateChanges(current, { [GameState.COOLDOWN_READY]: true });
        ctx.lastState = current;
        return { success: true, state: current };
      }

      lastMessage = result.message;
      await this.record("action.failed", {
        action: action.name,
        attempt,
        depth,
        message: result.message,
        sub_goal_requests: result.sub_goal_requests.map((r) => r.goal_type),
      });
      await this.waitCooldown(action.name, result.cooldown_seconds, depth);

      if (result.sub_goal_requests.length === 0) return fail(result.message, "execution_failed");
      if (attempt === this.maxAttempts) break;

      await this.transition(frame, "awaiting_sub_goal");
      const after = await this.resolveSubGoals(result.sub_goal_requests, characterId, current, frame, ctx, goal, resolved);
      if (!after) return fail(result.message, "execution_failed");
      current = after;
      ctx.lastState = current;
      await this.transition(frame, "retrying");
    }

    return fail(`${action.name} failed after ${this.maxAttempts} attempts: ${lastMessage}`, "execution_failed");
  }

  /**
   * Tries the requests in descending priority. Returns the refreshed state
   * after the first one that resolves, or undefined when none does.
   */
  private async resolveSubGoals(
    requests: readonly SubGoalRequest[],
    characterId: string,
    current: WorldState,
    frame: Frame,
    ctx: RunContext,
    parent: Goal | undefined,
    resolved: Set<string>,
  ): Promise<WorldState | undefined> {
    const { depth } = frame;
    const { goals, snapshot, stateSource } = this.config;
    const ordered = [...requests].sort((a, b) => b.priority - a.priority);

    for (const request of ordered) {
      const fingerprint = requestFingerprint(request);
      if (resolved.has(fingerprint)) continue;
      await this.record("subgoal.requested", {
        goal_type: request.goal_type,
        parameters: request.parameters,
        priority: request.priority,
        requester: request.requester,
        reason: request.reason,
        depth: depth + 1,
      });

      // Flags left by earlier actions must not satisfy the new goal.
      const refreshed = withoutKeys(
        applyStateChanges(current, await stateSource.fetchState(characterId)),
        EVENT_FLAG_KEYS,
      );
      let goal: Goal;
      try {
        goal = goals.createGoalFromSubRequest(request, {
          character_state: refreshed,
          game_data: snapshot,
          parent_goal_type: parent?.name,
          recursion_depth: depth + 1,
          max_depth: this.maxDepth,
        });
      } catch (err) {
        if (!(err instanceof NoValidGoalError)) throw err;
        await this.reject(request, depth + 1, err);
        continue;
      }

      const after = await this.pursueSubGoal(goal, request, characterId, refreshed, frame, ctx);
      if (!after) continue;
      try {
        assertSubGoalReached(refreshed, after, goal);
      } catch (err) {
        if (!(err instanceof StateConsistencyError)) throw err;
        this.logger.warn("Sub-goal left an inconsistent state", { goal: goal.name, violations: err.violations });
        await this.record("executor.state_inconsistent", { goal: goal.name, depth: depth + 1, violations: err.violations });
        await this.transition(frame, "awaiting_sub_goal");
        continue;
      }

      resolved.add(fingerprint);
      await this.record("subgoal.resolved", { goal: goal.name, depth: depth + 1 });
      return after;
    }
    return undefined;
  }

  /**
   * Plans and runs `goal` one level deeper, replanning while a round makes
   * progress and the goal still does not hold. Returns the observed state,
   * or undefined after a planning or execution failure.
   */
  private async pursueSubGoal(
    goal: Goal,
    request: SubGoalRequest,
    characterId: string,
    start: WorldState,
    frame: Frame,
    ctx: RunContext,
  ): Promise<WorldState | undefined> {
    const depth = frame.depth + 1;
    const { goals, registry, snapshot, stateSource } = this.config;
    let state = start;

    for (let round = 1; ; round++) {
      let plan: Plan<GameAction>;
      try {
        const actions = registry.generateActionsForState(state, snapshot);
        plan = goals.planToTargetState(state, goal.getTargetState(state), actions, goal.name);
      } catch (err) {
        if (!(err instanceof NoValidGoalError)) throw err;
        await this.reject(request, depth, err);
        return undefined;
      }

      await this.record("subgoal.planned", {
        goal: goal.name,
        plan_id: plan.plan_id,
        steps: plan.actions.map((a) => a.name),
        total_cost: plan.total_cost,
        depth,
        round,
      });
      await this.transition(frame, "recursing");
      const executedBefore = ctx.actionsExecuted;
      const sub = await this.run(plan, characterId, state, depth, ctx, goal);
      if (!sub.success) {
        await this.record("subgoal.failed", { goal: goal.name, depth, error: sub.message ?? "" });
        await this.transition(frame, "awaiting_sub_goal");
        return undefined;
      }

      const after = applyStateChanges(sub.state, await stateSource.fetchState(characterId));
      const stalled = ctx.actionsExecuted === executedBefore;
      if (goal.isSatisfied(after) || stalled || round >= this.maxSubGoalRounds) return after;

      this.logger.debug("Sub-goal needs another round", { goal: goal.name, depth, round });
      await this.transition(frame, "awaiting_sub_goal");
      state = withoutKeys(after, EVENT_FLAG_KEYS);
    }
  }

  private async reject(request: SubGoalRequest, depth: number, err: Error): Promise<void> {
    this.logger.warn("Sub-goal rejected", { goal_type: request.goal_type, depth, error: err.message });
    await this.record("subgoal.rejected", { goal_type: request.goal_type, depth, error: err.message });
  }

  private async waitCooldown(action: string, seconds: number, depth: number): Promise<void> {
    if (seconds <= 0) return;
    await this.record("action.cooldown", { action, seconds, depth });
    await this.sleep(seconds * 1000);
  }

  private async transition(frame: Frame, next: ExecutorState): Promise<void> {
    const allowed = VALID_TRANSITIONS[frame.status];
    if (!allowed.includes(next)) {
      throw new Error(`Invalid executor transition: ${frame.status} → ${next}`);
    }
    await this.record("executor.transition", { depth: frame.depth, from: frame.status, to: next });
    frame.status = next;
  }

  private async record(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    await this.config.journal?.tryEmit(this.runId, type, payload);
  }
}
