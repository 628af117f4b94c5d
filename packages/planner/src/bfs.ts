/**
 * BFS pathfinding over the walkable tiles of a world map.
 */
import type { MapTile } from "@goapbot/schemas";

export interface Position {
  x: number;
  y: number;
}

export type Direction = "north" | "south" | "east" | "west";

export interface BfsStep {
  direction: Direction;
  destination: Position;
}

const NEIGHBOURS: ReadonlyArray<[Direction, number, number]> = [
  ["north", 0, -1],
  ["east", 1, 0],
  ["south", 0, 1],
  ["west", -1, 0],
];

function tileKey(x: number, y: number): string {
  return `${x},${y}`;
}

/** Walkable tile positions keyed by "x,y". */
export function walkableTiles(maps: readonly MapTile[]): Set<string> {
  const walkable = new Set<string>();
  for (const tile of maps) {
    if (tile.walkable !== false) walkable.add(tileKey(tile.x, tile.y));
  }
  return walkable;
}

/**
 * Shortest 4-connected path across walkable tiles.
 *
 * @returns Steps from start to target, null if unreachable, [] if already there
 */
export function bfsPath(walkable: ReadonlySet<string>, start: Position, target: Position): BfsStep[] | null {
  if (start.x === target.x && start.y === target.y) return [];
  if (!walkable.has(tileKey(target.x, target.y))) return null;

  const queue: Array<{ at: Position; path: BfsStep[] }> = [{ at: start, path: [] }];
  const visited = new Set<string>([tileKey(start.x, start.y)]);
  for (let head = 0; head < queue.length; head++) {
    const entry = queue[head];
    if (!entry) break;
    for (const [direction, dx, dy] of NEIGHBOURS) {
      const destination = { x: entry.at.x + dx, y: entry.at.y + dy };
      const key = tileKey(destination.x, destination.y);
      if (visited.has(key) || !walkable.has(key)) continue;
      const path: BfsStep[] = [...entry.path, { direction, destination }];
      if (destination.x === target.x && destination.y === target.y) return path;
      visited.add(key);
      queue.push({ at: destination, path });
    }
  }
  return null;
}
