import type { WorldSnapshot } from "@goapbot/schemas";
import { bfsPath, walkableTiles } from "./bfs.js";
import type { Position } from "./bfs.js";

/**
 * Planning cost of walking between two tiles. `undefined` means the
 * destination cannot be reached and no move action should be offered.
 */
export type MovementCostProvider = (from: Position, to: Position) => number | undefined;

export const manhattanCost: MovementCostProvider = (from, to) =>
  Math.abs(from.x - to.x) + Math.abs(from.y - to.y);

/** Path length through walkable tiles, memoized per (from, to) pair. */
export function createGridPathCost(snapshot: WorldSnapshot): MovementCostProvider {
  const walkable = walkableTiles(snapshot.maps);
  const cache = new Map<string, number | undefined>();
  return (from, to) => {
    const key = `${from.x},${from.y}>${to.x},${to.y}`;
    if (cache.has(key)) return cache.get(key);
    const path = bfsPath(walkable, from, to);
    const cost = path === null ? undefined : path.length;
    cache.set(key, cost);
    return cost;
  };
}
