import { isStateKey } from "./state-keys.js";
import type { StateKey } from "./state-keys.js";
import { StateValidationError } from "./errors.js";

export type StateValue = boolean | number | string;

/**
 * A partial assignment of state keys to values. A key that is absent is
 * unknown, which is not the same as `false` or `0`.
 */
export type WorldState = { readonly [K in StateKey]?: StateValue };

type MutableWorldState = { [K in StateKey]?: StateValue };

export function isStateValue(value: unknown): value is StateValue {
  if (typeof value === "boolean" || typeof value === "string") return true;
  return typeof value === "number" && Number.isSafeInteger(value);
}

/**
 * The single gate for externally sourced state. Throws on the first key
 * outside the vocabulary, and on values that are not boolean, integer or string.
 */
export function validateStateDict(raw: Readonly<Record<string, unknown>>): WorldState {
  const result: MutableWorldState = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isStateKey(key)) {
      throw new StateValidationError(key);
    }
    if (!isStateValue(value)) {
      throw new StateValidationError(
        key,
        `Invalid value for state key "${key}": expected boolean, integer or string, got ${value === null ? "null" : typeof value}`,
      );
    }
    result[key] = value;
  }
  return result;
}

export function stateEntries(state: WorldState): Array<[StateKey, StateValue]> {
  const entries: Array<[StateKey, StateValue]> = [];
  for (const [key, value] of Object.entries(state)) {
    if (isStateKey(key) && value !== undefined) entries.push([key, value]);
  }
  return entries;
}

/** True iff every pair in `required` is present in `state` with an exactly equal value. */
export function stateMatches(state: WorldState, required: WorldState): boolean {
  for (const [key, value] of stateEntries(required)) {
    if (state[key] !== value) return false;
  }
  return true;
}

export function unsatisfiedEntries(state: WorldState, goal: WorldState): Array<[StateKey, StateValue]> {
  return stateEntries(goal).filter(([key, value]) => state[key] !== value);
}

/** Builds a state from pairs whose keys are only known as `StateKey`. */
export function stateFrom(entries: Iterable<readonly [StateKey, StateValue]>): WorldState {
  const result: MutableWorldState = {};
  for (const [key, value] of entries) result[key] = value;
  return result;
}

/** Returns a copy of `state` without `keys`. */
export function withoutKeys(state: WorldState, keys: readonly StateKey[]): WorldState {
  return stateFrom(stateEntries(state).filter(([key]) => !keys.includes(key)));
}

/** Returns a new state with `changes` laid over `state`. Neither input is mutated. */
export function applyStateChanges(state: WorldState, ...changes: WorldState[]): WorldState {
  const next: MutableWorldState = { ...state };
  for (const delta of changes) {
    for (const [key, value] of stateEntries(delta)) {
      next[key] = value;
    }
  }
  return next;
}

export function worldStatesEqual(a: WorldState, b: WorldState): boolean {
  const aEntries = stateEntries(a);
  if (aEntries.length !== stateEntries(b).length) return false;
  return aEntries.every(([key, value]) => b[key] === value);
}

/** Order-independent serialization, usable as a map key. */
export function canonicalStateKey(state: WorldState): string {
  return stateEntries(state)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join("|");
}

export function formatState(state: WorldState): string {
  const entries = stateEntries(state);
  if (entries.length === 0) return "{}";
  return `{ ${entries.map(([k, v]) => `${k}: ${JSON.stringify(v)}`).join(", ")} }`;
}
