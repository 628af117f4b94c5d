import {
  applyStateChanges,
  canonicalStateKey,
  formatState,
  stateMatches,
  unsatisfiedEntries,
} from "@goapbot/schemas";
import type { PlannableAction, PlanningResult, StateKey, StateValue, WorldState } from "@goapbot/schemas";
import { PriorityQueue } from "./priority-queue.js";

export interface GoapPlannerConfig {
  /** Upper bound on expanded nodes before the search gives up. Default: 5000 */
  maxNodes?: number;
}

export const DEFAULT_MAX_NODES = 5000;

interface SearchNode<A> {
  state: WorldState;
  key: string;
  g: number;
  h: number;
  seq: number;
  parent: SearchNode<A> | undefined;
  action: A | undefined;
}

function compareNodes<A>(a: SearchNode<A>, b: SearchNode<A>): number {
  return (a.g + a.h) - (b.g + b.h) || a.g - b.g || a.seq - b.seq;
}

/**
 * Forward A* over World States. Edges are actions whose preconditions hold;
 * children are produced by laying the declared effects over the parent.
 * The heuristic is the number of unsatisfied goal pairs.
 */
export class GoapPlanner {
  readonly maxNodes: number;

  constructor(config: GoapPlannerConfig = {}) {
    this.maxNodes = config.maxNodes ?? DEFAULT_MAX_NODES;
  }

  plan<A extends PlannableAction>(current: WorldState, goal: WorldState, actions: readonly A[]): PlanningResult<A> {
    const missing = unsatisfiedEntries(current, goal);
    if (missing.length === 0) {
      return { success: true, actions: [], total_cost: 0, nodes_expanded: 0 };
    }

    const orphan = missing.find(([key, value]) => !actions.some((a) => producesValue(a, key, value)));
    if (orphan) {
      const [key, value] = orphan;
      return {
        success: false,
        reason: "unreachable",
        nodes_expanded: 0,
        message: `No available action produces ${key}=${JSON.stringify(value)}`,
      };
    }

    let seq = 0;
    const open = new PriorityQueue<SearchNode<A>>(compareNodes);
    const bestG = new Map<string, number>();
    const closed = new Set<string>();
    const startKey = canonicalStateKey(current);
    open.push({
      state: current,
      key: startKey,
      g: 0,
      h: missing.length,
      seq: seq++,
      parent: undefined,
      action: undefined,
    });
    bestG.set(startKey, 0);

    let expanded = 0;
    for (let node = open.pop(); node !== undefined; node = open.pop()) {
      if (closed.has(node.key)) continue;
      // A cheaper route to this state was queued after this entry
      if ((bestG.get(node.key) ?? Infinity) < node.g) continue;

      if (stateMatches(node.state, goal)) {
        const path = reconstruct(node);
        return { success: true, actions: path, total_cost: node.g, nodes_expanded: expanded };
      }

      if (expanded >= this.maxNodes) {
        return {
          success: false,
          reason: "budget_exceeded",
          nodes_expanded: expanded,
          message: `Search budget of ${this.maxNodes} nodes exhausted before reaching ${formatState(goal)}`,
        };
      }
      expanded++;
      closed.add(node.key);

      for (const action of actions) {
        if (!stateMatches(node.state, action.getPreconditions())) continue;
        const state = applyStateChanges(node.state, action.getEffects());
        const key = canonicalStateKey(state);
        if (closed.has(key)) continue;
        const g = node.g + action.cost;
        if ((bestG.get(key) ?? Infinity) <= g) continue;
        bestG.set(key, g);
        open.push({
          state,
          key,
          g,
          h: unsatisfiedEntries(state, goal).length,
          seq: seq++,
          parent: node,
          action,
        });
      }
    }

    return {
      success: false,
      reason: "exhausted",
      nodes_expanded: expanded,
      message: `No action sequence reaches ${formatState(goal)} (${expanded} states explored)`,
    };
  }
}

function producesValue(action: PlannableAction, key: StateKey, value: StateValue): boolean {
  return action.getEffects()[key] === value;
}

function reconstruct<A>(node: SearchNode<A>): A[] {
  const path: A[] = [];
  for (let cursor: SearchNode<A> | undefined = node; cursor; cursor = cursor.parent) {
    if (cursor.action !== undefined) path.push(cursor.action);
  }
  return path.reverse();
}
