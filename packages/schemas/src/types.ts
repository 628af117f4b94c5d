/**
 * Core data models shared by the planner, the executor and the game client.
 */
import type { EquipmentSlot, GatheringSkill, Skill } from "./state-keys.js";
import type { WorldState } from "./world-state.js";

// ─── Character ──────────────────────────────────────────────────────

export interface InventorySlot {
  code: string;
  quantity: number;
}

export interface SkillProgress {
  level: number;
  xp: number;
}

/** Live character payload as returned by the game API. */
export interface Character {
  name: string;
  level: number;
  xp: number;
  max_xp: number;
  gold: number;
  hp: number;
  max_hp: number;
  x: number;
  y: number;
  /** Remaining cooldown in seconds; 0 when the character may act. */
  cooldown: number;
  skills: Partial<Record<Skill, SkillProgress>>;
  equipment: Partial<Record<EquipmentSlot, string>>;
  inventory: InventorySlot[];
  inventory_max_items: number;
}

// ─── World data ─────────────────────────────────────────────────────

export type MapContentType = "monster" | "resource" | "workshop" | "bank";

export interface MapContent {
  type: MapContentType;
  code: string;
}

export interface MapTile {
  x: number;
  y: number;
  content?: MapContent;
  /** Defaults to true. */
  walkable?: boolean;
}

export interface ItemDrop {
  code: string;
  rate: number;
}

export interface MonsterInfo {
  code: string;
  name?: string;
  level: number;
  hp: number;
  drops?: ItemDrop[];
}

export interface ResourceInfo {
  code: string;
  skill: GatheringSkill;
  level: number;
  drop: string;
}

export interface CraftRecipe {
  skill: Skill;
  level: number;
  quantity?: number;
  items: InventorySlot[];
}

export interface ItemInfo {
  code: string;
  /** Equipment slot name for gear, otherwise a category such as "resource". */
  type: string;
  level: number;
  craft?: CraftRecipe;
}

/** Read-only bulk world data fetched before planning. Only action factories read it. */
export interface WorldSnapshot {
  maps: MapTile[];
  monsters: MonsterInfo[];
  resources: ResourceInfo[];
  items: ItemInfo[];
}

// ─── Actions ────────────────────────────────────────────────────────

export type SubGoalParameter = string | number | boolean;

export interface SubGoalRequest {
  readonly goal_type: string;
  readonly parameters: Readonly<Record<string, SubGoalParameter>>;
  readonly priority: number;
  readonly requester: string;
  readonly reason: string;
}

export interface ActionResult {
  readonly success: boolean;
  readonly message: string;
  /** Observed deltas; may differ from the action's declared effects. */
  readonly state_changes: WorldState;
  readonly cooldown_seconds: number;
  readonly sub_goal_requests: readonly SubGoalRequest[];
}

/** What the planner needs to know about an action. */
export interface PlannableAction {
  readonly name: string;
  readonly cost: number;
  getPreconditions(): WorldState;
  getEffects(): WorldState;
}

export interface ActionDescription {
  name: string;
  kind: string;
  cost: number;
  preconditions: WorldState;
  effects: WorldState;
}

// ─── Planning ───────────────────────────────────────────────────────

export type PlanningFailureReason = "unreachable" | "exhausted" | "budget_exceeded";

export type PlanningResult<A extends PlannableAction> =
  | { success: true; actions: A[]; total_cost: number; nodes_expanded: number }
  | { success: false; reason: PlanningFailureReason; nodes_expanded: number; message: string };

export interface Plan<A extends PlannableAction = PlannableAction> {
  plan_id: string;
  goal: string;
  target_state: WorldState;
  actions: readonly A[];
  total_cost: number;
  created_at: string;
}

// ─── Goals ──────────────────────────────────────────────────────────

export interface Goal {
  readonly name: string;
  readonly priority: number;
  readonly timeoutSeconds?: number;
  getTargetState(state: WorldState): WorldState;
  isSatisfied(state: WorldState): boolean;
  describe(): string;
}

export type GoalTemplateType = "level" | "skill_level" | "state" | "rest" | "move" | "free_inventory";

export interface GoalTemplate {
  type: GoalTemplateType;
  description?: string;
  priority?: number;
  timeout_seconds?: number;
  params?: Record<string, unknown>;
}

export interface GoalTemplatesFile {
  goal_templates: Record<string, GoalTemplate>;
}

export interface GoalFactoryContext {
  character_state: WorldState;
  game_data: WorldSnapshot;
  parent_goal_type?: string;
  recursion_depth: number;
  max_depth: number;
}

// ─── Execution ──────────────────────────────────────────────────────

export type ExecutorState =
  | "executing"
  | "awaiting_sub_goal"
  | "recursing"
  | "retrying"
  | "succeeded"
  | "failed";

export type FailureKind =
  | "no_plan"
  | "execution_failed"
  | "max_depth"
  | "timeout"
  | "state_validation"
  | "internal_error";

export interface ExecutionResult {
  success: boolean;
  depth_reached: number;
  actions_executed: number;
  execution_time_ms: number;
  final_state: WorldState;
  error_message?: string;
  failure_kind?: FailureKind;
}

// ─── Journal ────────────────────────────────────────────────────────

export type JournalEventType =
  | "run.started"
  | "run.cycle"
  | "run.completed"
  | "run.failed"
  | "plan.created"
  | "plan.not_found"
  | "action.started"
  | "action.succeeded"
  | "action.failed"
  | "action.cooldown"
  | "subgoal.requested"
  | "subgoal.planned"
  | "subgoal.rejected"
  | "subgoal.resolved"
  | "subgoal.failed"
  | "executor.transition"
  | "executor.depth_exceeded"
  | "executor.state_inconsistent"
  | "executor.timeout";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  session_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

// ─── Logging ────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}
