import { v4 as uuid } from "uuid";
import { errorMessage } from "@goapbot/schemas";
import type { ExecutionResult, FailureKind, Goal, Logger, WorldSnapshot, WorldState } from "@goapbot/schemas";
import type { ActionRegistry } from "@goapbot/actions";
import type { GoalInput, GoalManager } from "@goapbot/goals";
import type { StateSource } from "@goapbot/game-client";
import type { Journal } from "@goapbot/journal";
import { createLogger } from "@goapbot/journal";
import { RecursiveActionExecutor } from "./executor.js";
import type { ExecutorConfig } from "./executor.js";

export type ExecutorTuning = Pick<ExecutorConfig, "maxDepth" | "maxAttempts" | "maxSubGoalRounds" | "actionTimeoutMs" | "sleep" | "now">;

export interface AgentConfig {
  characterId: string;
  goals: GoalManager;
  registry: ActionRegistry;
  stateSource: StateSource;
  snapshot: WorldSnapshot;
  journal?: Journal;
  logger?: Logger;
  executor?: ExecutorTuning;
}

export interface RunOptions {
  /** Plan-and-execute cycles before giving up. Default: 10 */
  maxCycles?: number;
}

export type RunStatus = "completed" | "failed";

export interface RunSummary {
  run_id: string;
  character_id: string;
  goal: string;
  status: RunStatus;
  cycles: number;
  final_state: WorldState;
  last_result?: ExecutionResult;
  error_message?: string;
  failure_kind?: FailureKind;
}

export const DEFAULT_MAX_CYCLES = 10;

/**
 * Drives one character towards a goal: refresh, plan, execute, repeat.
 * Everything inside one agent is sequential; separate agents are independent.
 */
export class CharacterAgent {
  readonly characterId: string;
  private config: AgentConfig;
  private logger: Logger;
  private state: WorldState = {};
  private running = false;

  constructor(config: AgentConfig) {
    this.config = config;
    this.characterId = config.characterId;
    this.logger = config.logger ?? createLogger(`agent:${config.characterId}`);
  }

  /** Last state the agent observed or produced. */
  currentState(): WorldState {
    return this.state;
  }

  async runGoal(input: GoalInput, options: RunOptions = {}): Promise<RunSummary> {
    if (this.running) throw new Error(`Agent for "${this.characterId}" is already running`);
    this.running = true;
    try {
      return await this.loop(this.config.goals.resolveGoal(input), options.maxCycles ?? DEFAULT_MAX_CYCLES);
    } finally {
      this.running = false;
    }
  }

  private async loop(goal: Goal, maxCycles: number): Promise<RunSummary> {
    const { goals, registry, snapshot, stateSource, journal } = this.config;
    const runId = uuid();
    const executor = new RecursiveActionExecutor({
      ...this.config.executor,
      goals,
      registry,
      stateSource,
      snapshot,
      journal,
      runId,
      logger: this.logger,
    });
    const summary = (status: RunStatus, cycles: number, extra: Partial<RunSummary> = {}): RunSummary => ({
      run_id: runId,
      character_id: this.characterId,
      goal: goal.name,
      status,
      cycles,
      final_state: this.state,
      ...extra,
    });

    await journal?.tryEmit(runId, "run.started", {
      character: this.characterId,
      goal: goal.name,
      description: goal.describe(),
      max_cycles: maxCycles,
    });
    this.logger.info("Run started", { run_id: runId, goal: goal.name });

    let last: ExecutionResult | undefined;
    try {
      for (let cycle = 1; cycle <= maxCycles; cycle++) {
        this.state = await stateSource.fetchState(this.characterId);
        if (goal.isSatisfied(this.state)) {
          return await this.complete(summary("completed", cycle - 1, last ? { last_result: last } : {}));
        }

        const actions = registry.generateActionsForState(this.state, snapshot);
        const outcome = goals.plan(goal, this.state, actions);
        if (!outcome.ok) {
          await journal?.tryEmit(runId, "plan.not_found", {
            goal: goal.name,
            reason: outcome.reason,
            nodes_expanded: outcome.nodes_expanded,
            message: outcome.message,
          });
          return await this.fail(summary("failed", cycle, {
            error_message: outcome.message,
            failure_kind: "no_plan",
          }));
        }

        const { plan } = outcome;
        await journal?.tryEmit(runId, "plan.created", {
          plan_id: plan.plan_id,
          goal: goal.name,
          steps: plan.actions.map((a) => a.name),
          total_cost: plan.total_cost,
          cycle,
        });

        last = await executor.executePlan(plan, this.characterId, this.state, goal);
        this.state = last.final_state;
        await journal?.tryEmit(runId, "run.cycle", {
          cycle,
          success: last.success,
          actions_executed: last.actions_executed,
          depth_reached: last.depth_reached,
          failure_kind: last.failure_kind ?? null,
        });

        if (last.success && goal.isSatisfied(this.state)) {
          return await this.complete(summary("completed", cycle, { last_result: last }));
        }
        if (last.failure_kind === "internal_error") {
          return await this.fail(summary("failed", cycle, {
            last_result: last,
            error_message: last.error_message ?? "Internal error",
            failure_kind: "internal_error",
          }));
        }
      }
    } catch (err) {
      await journal?.tryEmit(runId, "run.failed", { goal: goal.name, error: errorMessage(err) });
      throw err;
    }

    const extra: Partial<RunSummary> = { error_message: `Goal "${goal.name}" not satisfied after ${maxCycles} cycles` };
    if (last) {
      extra.last_result = last;
      if (last.failure_kind) extra.failure_kind = last.failure_kind;
    }
    return this.fail(summary("failed", maxCycles, extra));
  }

  private async complete(summary: RunSummary): Promise<RunSummary> {
    await this.config.journal?.tryEmit(summary.run_id, "run.completed", {
      goal: summary.goal,
      cycles: summary.cycles,
    });
    this.logger.info("Run completed", { run_id: summary.run_id, cycles: summary.cycles });
    return summary;
  }

  private async fail(summary: RunSummary): Promise<RunSummary> {
    await this.config.journal?.tryEmit(summary.run_id, "run.failed", {
      goal: summary.goal,
      cycles: summary.cycles,
      error: summary.error_message ?? "",
      failure_kind: summary.failure_kind ?? null,
    });
    this.logger.warn("Run failed", { run_id: summary.run_id, error: summary.error_message });
    return summary;
  }
}
