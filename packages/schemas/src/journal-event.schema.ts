export const JOURNAL_EVENT_TYPES = [
  "run.started", "run.cycle", "run.completed", "run.failed",
  "plan.created", "plan.not_found",
  "action.started", "action.succeeded", "action.failed", "action.cooldown",
  "subgoal.requested", "subgoal.planned", "subgoal.rejected", "subgoal.resolved", "subgoal.failed",
  "executor.transition", "executor.depth_exceeded", "executor.state_inconsistent", "executor.timeout",
] as const;

export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "session_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    session_id: { type: "string", minLength: 1 },
    type: { type: "string", enum: JOURNAL_EVENT_TYPES },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
