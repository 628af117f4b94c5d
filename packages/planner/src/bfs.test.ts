import { describe, it, expect } from "vitest";
import type { MapTile, WorldSnapshot } from "@goapbot/schemas";
import { bfsPath, walkableTiles } from "./bfs.js";
import { createGridPathCost, manhattanCost } from "./path-cost.js";

function grid(size: number, blocked: Array<[number, number]> = []): MapTile[] {
  const tiles: MapTile[] = [];
  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      const tile: MapTile = { x, y };
      if (blocked.some(([bx, by]) => bx === x && by === y)) tile.walkable = false;
      tiles.push(tile);
    }
  }
  return tiles;
}

function snapshotOf(maps: MapTile[]): WorldSnapshot {
  return { maps, monsters: [], resources: [], items: [] };
}

describe("bfsPath", () => {
  it("returns [] when start equals target", () => {
    expect(bfsPath(walkableTiles(grid(3)), { x: 1, y: 1 }, { x: 1, y: 1 })).toEqual([]);
  });

  it("finds a straight path", () => {
    expect(bfsPath(walkableTiles(grid(3)), { x: 0, y: 0 }, { x: 2, y: 0 })).toEqual([
      { direction: "east", destination: { x: 1, y: 0 } },
      { direction: "east", destination: { x: 2, y: 0 } },
    ]);
  });

  it("walks around blocked tiles", () => {
    const walkable = walkableTiles(grid(3, [[1, 0], [1, 1]]));
    const path = bfsPath(walkable, { x: 0, y: 0 }, { x: 2, y: 0 });
    expect(path?.map((s) => s.direction)).toEqual(["south", "south", "east", "east", "north", "north"]);
  });

  it("returns null for a blocked or missing target", () => {
    const walkable = walkableTiles(grid(3, [[2, 2]]));
    expect(bfsPath(walkable, { x: 0, y: 0 }, { x: 2, y: 2 })).toBeNull();
    expect(bfsPath(walkable, { x: 0, y: 0 }, { x: 7, y: 7 })).toBeNull();
  });

  it("returns null when the target is walled off", () => {
    const walkable = walkableTiles(grid(3, [[1, 0], [1, 1], [1, 2]]));
    expect(bfsPath(walkable, { x: 0, y: 0 }, { x: 2, y: 0 })).toBeNull();
  });
});

describe("movement cost providers", () => {
  it("manhattanCost ignores walls", () => {
    expect(manhattanCost({ x: 0, y: 0 }, { x: 2, y: 3 })).toBe(5);
  });

  it("grid cost follows the detour", () => {
    const cost = createGridPathCost(snapshotOf(grid(3, [[1, 0], [1, 1]])));
    expect(cost({ x: 0, y: 0 }, { x: 2, y: 0 })).toBe(6);
    expect(cost({ x: 0, y: 0 }, { x: 0, y: 2 })).toBe(2);
  });

  it("grid cost is undefined for unreachable tiles", () => {
    const cost = createGridPathCost(snapshotOf(grid(3, [[1, 0], [1, 1], [1, 2]])));
    expect(cost({ x: 0, y: 0 }, { x: 2, y: 2 })).toBeUndefined();
    expect(cost({ x: 0, y: 0 }, { x: 2, y: 2 })).toBeUndefined();
  });
});
