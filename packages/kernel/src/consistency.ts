import {
  EQUIPMENT_KEYS,
  MONOTONIC_LEVEL_KEYS,
  StateConsistencyError,
  readInteger,
  unsatisfiedEntries,
} from "@goapbot/schemas";
import type { Goal, WorldState } from "@goapbot/schemas";

function violationsBetween(before: WorldState, after: WorldState, target: WorldState | undefined): string[] {
  const violations: string[] = [];

  for (const key of MONOTONIC_LEVEL_KEYS) {
    const was = readInteger(before, key);
    const now = readInteger(after, key);
    if (was !== undefined && now !== undefined && now < was) {
      violations.push(`${key} decreased from ${was} to ${now}`);
    }
  }

  for (const key of EQUIPMENT_KEYS) {
    if (before[key] === true && after[key] === false) {
      violations.push(`${key} was lost`);
    }
  }

  if (target) {
    for (const [key, value] of unsatisfiedEntries(after, target)) {
      const actual = after[key];
      violations.push(
        `target ${key}=${JSON.stringify(value)} not reached (is ${actual === undefined ? "unknown" : JSON.stringify(actual)})`,
      );
    }
  }
  return violations;
}

/**
 * Checks the state observed after a sub-goal against the state before it.
 * Levels never drop, equipped slots never empty, and the target (if any)
 * holds afterwards.
 */
export function assertStateConsistency(before: WorldState, after: WorldState, target?: WorldState): void {
  const violations = violationsBetween(before, after, target);
  if (violations.length > 0) throw new StateConsistencyError(violations);
}

/**
 * The sub-goal boundary check: consistency against the goal's target, then
 * the goal's own test, which may ask for more than the target says.
 */
export function assertSubGoalReached(before: WorldState, after: WorldState, goal: Goal): void {
  const violations = violationsBetween(before, after, goal.getTargetState(before));
  if (violations.length === 0 && !goal.isSatisfied(after)) {
    violations.push(`goal ${goal.name} is not satisfied`);
  }
  if (violations.length > 0) throw new StateConsistencyError(violations);
}
