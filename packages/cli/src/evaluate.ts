import { applyStateChanges, unsatisfiedEntries } from "@goapbot/schemas";
import type { Goal, PlannableAction, StateKey, StateValue, WorldState } from "@goapbot/schemas";

export interface UnmetPrecondition {
  key: StateKey;
  expected: StateValue;
  actual: StateValue | undefined;
}

export interface EvaluatedStep {
  action: string;
  cost: number;
  preconditions_met: boolean;
  unmet: UnmetPrecondition[];
  state_after: WorldState;
}

export interface SequenceEvaluation {
  steps: EvaluatedStep[];
  total_cost: number;
  all_preconditions_met: boolean;
  final_state: WorldState;
  goal?: string;
  goal_satisfied?: boolean;
}

/**
 * Walks a hand-written action list through declared effects only. A step
 * whose preconditions fail is reported and its effects still applied, so
 * later steps are judged as if it had run.
 */
export function evaluateSequence(
  initial: WorldState,
  available: readonly PlannableAction[],
  names: readonly string[],
  goal?: Goal,
): SequenceEvaluation {
  const byName = new Map(available.map((a) => [a.name, a]));
  const steps: EvaluatedStep[] = [];
  let state = initial;
  let totalCost = 0;

  for (const name of names) {
    const action = byName.get(name);
    if (!action) throw new Error(`Unknown action: "${name}"`);
    const unmet = unsatisfiedEntries(state, action.getPreconditions()).map(([key, expected]) => ({
      key,
      expected,
      actual: state[key],
    }));
    state = applyStateChanges(state, action.getEffects());
    totalCost += action.cost;
    steps.push({
      action: name,
      cost: action.cost,
      preconditions_met: unmet.length === 0,
      unmet,
      state_after: state,
    });
  }

  const evaluation: SequenceEvaluation = {
    steps,
    total_cost: totalCost,
    all_preconditions_met: steps.every((s) => s.preconditions_met),
    final_state: state,
  };
  if (goal) {
    evaluation.goal = goal.name;
    evaluation.goal_satisfied = goal.isSatisfied(state);
  }
  return evaluation;
}
