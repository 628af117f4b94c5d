export { GoapPlanner, DEFAULT_MAX_NODES } from "./goap-planner.js";
export type { GoapPlannerConfig } from "./goap-planner.js";
export { PriorityQueue } from "./priority-queue.js";
export { bfsPath, walkableTiles } from "./bfs.js";
export type { BfsStep, Direction, Position } from "./bfs.js";
export { manhattanCost, createGridPathCost } from "./path-cost.js";
export type { MovementCostProvider } from "./path-cost.js";
