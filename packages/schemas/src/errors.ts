import type { PlanningFailureReason } from "./types.js";

// ─── State ──────────────────────────────────────────────────────────

export class StateValidationError extends Error {
  readonly key: string;

  constructor(key: string, message?: string) {
    super(message ?? `Unknown state key: "${key}"`);
    this.name = "StateValidationError";
    this.key = key;
  }
}

export class StateConsistencyError extends Error {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`State consistency violated: ${violations.join("; ")}`);
    this.name = "StateConsistencyError";
    this.violations = violations;
  }
}

// ─── Actions ────────────────────────────────────────────────────────

export class ActionDefinitionError extends Error {
  readonly actionName: string;

  constructor(actionName: string, message: string) {
    super(`Invalid action "${actionName}": ${message}`);
    this.name = "ActionDefinitionError";
    this.actionName = actionName;
  }
}

export class DuplicateActionError extends Error {
  readonly actionName: string;

  constructor(actionName: string) {
    super(`Duplicate action name generated: "${actionName}"`);
    this.name = "DuplicateActionError";
    this.actionName = actionName;
  }
}

// ─── Goals ──────────────────────────────────────────────────────────

/** A goal cannot be built or cannot be planned for. Recoverable by the executor. */
export class NoValidGoalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NoValidGoalError";
  }
}

export class UnknownGoalTypeError extends NoValidGoalError {
  readonly goalType: string;

  constructor(goalType: string) {
    super(`Unknown sub-goal type: "${goalType}"`);
    this.name = "UnknownGoalTypeError";
    this.goalType = goalType;
  }
}

export class GoalFactoryError extends NoValidGoalError {
  readonly goalType: string;
  readonly errors: string[];

  constructor(goalType: string, errors: string[]) {
    super(`Invalid parameters for sub-goal "${goalType}": ${errors.join(", ")}`);
    this.name = "GoalFactoryError";
    this.goalType = goalType;
    this.errors = errors;
  }
}

/** The planner found no action sequence for a goal. Carries the search outcome. */
export class NoPlanFoundError extends NoValidGoalError {
  readonly goalName: string;
  readonly reason: PlanningFailureReason;
  readonly nodesExpanded: number;

  constructor(goalName: string, reason: PlanningFailureReason, nodesExpanded: number, message: string) {
    super(`No plan for goal "${goalName}": ${message}`);
    this.name = "NoPlanFoundError";
    this.goalName = goalName;
    this.reason = reason;
    this.nodesExpanded = nodesExpanded;
  }
}

export class MaxDepthExceededError extends Error {
  readonly depth: number;
  readonly maxDepth: number;

  constructor(depth: number, maxDepth: number) {
    super(`Maximum recursion depth exceeded: depth ${depth} >= max depth ${maxDepth}`);
    this.name = "MaxDepthExceededError";
    this.depth = depth;
    this.maxDepth = maxDepth;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
