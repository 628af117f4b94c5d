import type { ActionResult, SubGoalParameter, SubGoalRequest, WorldState } from "@goapbot/schemas";

export function actionSuccess(message: string, stateChanges: WorldState = {}, cooldownSeconds = 0): ActionResult {
  return Object.freeze({
    success: true,
    message,
    state_changes: Object.freeze({ ...stateChanges }),
    cooldown_seconds: cooldownSeconds,
    sub_goal_requests: Object.freeze([]),
  });
}

export function actionFailure(
  message: string,
  options: { requests?: readonly SubGoalRequest[]; stateChanges?: WorldState; cooldownSeconds?: number } = {},
): ActionResult {
  return Object.freeze({
    success: false,
    message,
    state_changes: Object.freeze({ ...options.stateChanges }),
    cooldown_seconds: options.cooldownSeconds ?? 0,
    sub_goal_requests: Object.freeze([...(options.requests ?? [])]),
  });
}

export function subGoalRequest(
  goalType: string,
  parameters: Record<string, SubGoalParameter>,
  priority: number,
  requester: string,
  reason: string,
): SubGoalRequest {
  return Object.freeze({
    goal_type: goalType,
    parameters: Object.freeze({ ...parameters }),
    priority,
    requester,
    reason,
  });
}

/** Identity of a request for "already tried" bookkeeping. */
export function requestFingerprint(request: SubGoalRequest): string {
  const params = Object.keys(request.parameters)
    .sort()
    .map((key) => `${key}=${JSON.stringify(request.parameters[key])}`)
    .join(",");
  return `${request.goal_type}(${params})`;
}
