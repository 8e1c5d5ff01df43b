import type { JsonObject, RunStatus, TaskRecord, TaskStatus } from "./types.js";

const taskTransitions: Record<TaskStatus, Set<TaskStatus>> = {
  pending: new Set(["waiting_approval", "running", "failed", "skipped", "blocked"]),
  waiting_approval: new Set(["approved"]),
  approved: new Set(["running", "blocked"]),
  running: new Set(["completed", "failed"]),
  completed: new Set(),
  failed: new Set(),
  skipped: new Set(),
  blocked: new Set()
};

const terminalStatuses: ReadonlySet<TaskStatus> = new Set(["completed", "failed", "skipped", "blocked"]);

export class TaskTransitionError extends Error {
  constructor(
    readonly taskName: string,
    readonly from: TaskStatus,
    readonly to: TaskStatus
  ) {
    super(`Invalid task transition for '${taskName}': ${from} -> ${to}`);
    this.name = "TaskTransitionError";
  }
}

export function canTransitionTask(from: TaskStatus, to: TaskStatus): boolean {
  return taskTransitions[from].has(to);
}

export function isTerminal(status: TaskStatus): boolean {
  return terminalStatuses.has(status);
}

function transition(task: TaskRecord, to: TaskStatus, changes: Partial<TaskRecord> = {}): TaskRecord {
  if (!canTransitionTask(task.status, to)) {
    throw new TaskTransitionError(task.name, task.status, to);
  }
  return { ...task, ...changes, status: to };
}

export function markWaitingApproval(task: TaskRecord, resolvedInputs: JsonObject): TaskRecord {
  return transition(task, "waiting_approval", { resolvedInputs });
}

export function markApproved(task: TaskRecord, approver: string): TaskRecord {
  return transition(task, "approved", { approvedBy: approver });
}

export function markRunning(task: TaskRecord, resolvedInputs: JsonObject, now = new Date()): TaskRecord {
  return transition(task, "running", { resolvedInputs, startedAt: now.toISOString() });
}

export function markCompleted(task: TaskRecord, output: JsonObject, now = new Date()): TaskRecord {
  return transition(task, "completed", { output, completedAt: now.toISOString() });
}

export function markFailed(task: TaskRecord, error: string, now = new Date()): TaskRecord {
  return transition(task, "failed", { error, completedAt: now.toISOString() });
}

export function markSkipped(task: TaskRecord, reason: string, now = new Date()): TaskRecord {
  return transition(task, "skipped", { reason, completedAt: now.toISOString() });
}

export function markBlocked(task: TaskRecord, reason: string, now = new Date()): TaskRecord {
  return transition(task, "blocked", { reason, completedAt: now.toISOString() });
}

export function summarizeRunStatus(statuses: TaskStatus[]): RunStatus {
  if (statuses.some((status) => !isTerminal(status))) {
    return statuses.some((status) => status === "waiting_approval" || status === "approved")
      ? "waiting_approval"
      : "running";
  }
  if (statuses.some((status) => status === "failed" || status === "blocked")) {
    return "failed";
  }
  return "succeeded";
}
