// Pure formatting for CLI output. No I/O.
import { formatState } from "@goapbot/schemas";
import type { ActionDescription, JournalEvent, Plan, PlannableAction } from "@goapbot/schemas";
import type { RunSummary } from "@goapbot/kernel";
import type { SequenceEvaluation } from "./evaluate.js";

export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

// Bookkeeping events left out of the live simulate trace
const QUIET_EVENTS = new Set(["executor.transition", "action.started"]);

export function isQuietEvent(type: string): boolean {
  return QUIET_EVENTS.has(type);
}

export function colorForType(type: string): (s: string) => string {
  if (type.endsWith("completed") || type.endsWith("succeeded") || type.endsWith("resolved")) return green;
  if (type.endsWith("failed") || type.endsWith("not_found") || type.endsWith("exceeded")) return red;
  if (type.endsWith("rejected") || type.endsWith("timeout") || type.endsWith("inconsistent")) return yellow;
  return cyan;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

/** Renders a payload value for one line of output. */
function text(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) return value.map(text).join(", ");
  if (value === undefined || value === null) return "";
  return JSON.stringify(value);
}

export function formatActionDescription(action: ActionDescription): string[] {
  return [
    `${action.name} [${action.kind}] cost ${action.cost}`,
    `  requires: ${formatState(action.preconditions)}`,
    `  effects:  ${formatState(action.effects)}`,
  ];
}

export function formatPlan<A extends PlannableAction>(plan: Plan<A>): string[] {
  if (plan.actions.length === 0) return [`Plan for ${plan.goal}: already satisfied`];
  const lines = [
    `Plan for ${plan.goal}: ${plural(plan.actions.length, "step")}, total cost ${plan.total_cost}`,
  ];
  plan.actions.forEach((action, i) => {
    lines.push(`  ${i + 1}. ${action.name} (cost ${action.cost})`);
    lines.push(`     requires: ${formatState(action.getPreconditions())}`);
    lines.push(`     effects:  ${formatState(action.getEffects())}`);
  });
  return lines;
}

export function formatEvaluation(evaluation: SequenceEvaluation): string[] {
  const lines: string[] = [];
  evaluation.steps.forEach((step, i) => {
    lines.push(`  ${i + 1}. ${step.preconditions_met ? "ok   " : "UNMET"} ${step.action} (cost ${step.cost})`);
    for (const { key, expected, actual } of step.unmet) {
      lines.push(`       ${key}: needs ${JSON.stringify(expected)}, has ${actual === undefined ? "unset" : JSON.stringify(actual)}`);
    }
  });
  lines.push(`Total cost: ${evaluation.total_cost}`);
  lines.push(`Preconditions: ${evaluation.all_preconditions_met ? "all met" : "some unmet"}`);
  if (evaluation.goal !== undefined) {
    lines.push(`Goal ${evaluation.goal}: ${evaluation.goal_satisfied ? "satisfied" : "not satisfied"}`);
  }
  return lines;
}

export function formatRunSummary(summary: RunSummary): string[] {
  const lines = [
    `Run ${summary.run_id}`,
    `Character: ${summary.character_id}`,
    `Goal: ${summary.goal}`,
    `Status: ${summary.status}`,
    `Cycles: ${summary.cycles}`,
  ];
  if (summary.last_result) {
    lines.push(`Actions executed (last cycle): ${summary.last_result.actions_executed}`);
    lines.push(`Deepest sub-goal (last cycle): ${summary.last_result.depth_reached}`);
  }
  if (summary.error_message !== undefined) {
    const kind = summary.failure_kind ? `[${summary.failure_kind}] ` : "";
    lines.push(`Error: ${kind}${summary.error_message}`);
  }
  return lines;
}

/** One-line detail for a journal event, empty when the type has none. */
export function describeEvent(event: JournalEvent): string {
  const p = event.payload;
  switch (event.type) {
    case "run.started":
      return `${text(p.character)} -> ${text(p.goal)}`;
    case "run.cycle":
      return `cycle ${text(p.cycle)}: ${p.success === true ? "ok" : text(p.failure_kind)}`;
    case "run.completed":
      return `after ${text(p.cycles)} cycle(s)`;
    case "run.failed":
      return text(p.error);
    case "plan.created":
    case "subgoal.planned":
      return `${text(p.goal)}: ${Array.isArray(p.steps) && p.steps.length > 0 ? p.steps.map(text).join(" > ") : "(nothing to do)"}`;
    case "plan.not_found":
      return text(p.message);
    case "action.succeeded":
    case "action.failed":
      return `${text(p.action)}: ${text(p.message)}`;
    case "action.cooldown":
      return `${text(p.action)} ${text(p.seconds)}s`;
    case "subgoal.requested":
      return `${text(p.goal_type)} at depth ${text(p.depth)} (${text(p.reason)})`;
    case "subgoal.rejected":
      return `${text(p.goal_type)}: ${text(p.error)}`;
    case "subgoal.resolved":
      return text(p.goal);
    case "subgoal.failed":
      return `${text(p.goal)}: ${text(p.error)}`;
    case "executor.depth_exceeded":
      return `depth ${text(p.depth)} of ${text(p.max_depth)}`;
    case "executor.state_inconsistent":
      return `${text(p.goal)}: ${Array.isArray(p.violations) ? p.violations.map(text).join("; ") : ""}`;
    case "executor.timeout":
      return `${text(p.goal)} during ${text(p.action)}`;
    case "executor.transition":
      return `depth ${text(p.depth)}: ${text(p.from)} -> ${text(p.to)}`;
    case "action.started":
      return `${text(p.action)} attempt ${text(p.attempt)}`;
  }
}

export function formatEvent(event: JournalEvent): string {
  const ts = event.timestamp.split("T")[1]?.slice(0, 8) ?? "";
  const detail = describeEvent(event);
  const type = colorForType(event.type)(event.type);
  return detail ? `[${ts}] ${type} ${detail}` : `[${ts}] ${type}`;
}
