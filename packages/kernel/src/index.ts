export {
  RecursiveActionExecutor,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_SUB_GOAL_ROUNDS,
} from "./executor.js";
export type { ExecutorConfig } from "./executor.js";
export { CharacterAgent, DEFAULT_MAX_CYCLES } from "./agent.js";
export type { AgentConfig, ExecutorTuning, RunOptions, RunStatus, RunSummary } from "./agent.js";
export { assertStateConsistency, assertSubGoalReached } from "./consistency.js";
