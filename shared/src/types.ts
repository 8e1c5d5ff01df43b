export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type TaskStatus =
  | "pending"
  | "waiting_approval"
  | "approved"
  | "running"
  | "completed"
  | "failed"
  | "skipped"
  | "blocked";

export type RunStatus = "running" | "waiting_approval" | "succeeded" | "failed";

export type Role = "admin" | "operator" | "viewer";

export interface TaskDefinition {
  name: string;
  type: string;
  inputs: JsonObject;
  needs: string[];
  approvalRequired: boolean;
  idempotencyKey: string | null;
}

export interface Playbook {
  playbookId: string;
  title: string;
  tasks: Record<string, TaskDefinition>;
}

export interface CaseRecord {
  caseId: string;
  title: string;
  description: string;
  createdAt: string;
}

export interface TaskRecord {
  id: string;
  caseId: string;
  playbookId: string;
  name: string;
  type: string;
  definition: TaskDefinition;
  status: TaskStatus;
  resolvedInputs: JsonObject | null;
  output: JsonObject | null;
  error: string | null;
  /** Explanation for SKIPPED and BLOCKED outcomes. */
  reason: string | null;
  approvedBy: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
}

export interface RunResult {
  caseId: string;
  playbookId: string;
  status: RunStatus;
  tasks: Record<string, TaskRecord>;
  results: Record<string, JsonObject>;
}

export interface AuditEntry {
  index: number;
  timestamp: string;
  actor: string;
  action: string;
  details: JsonObject;
  hash: string;
  parentHash: string;
}

export interface AnchorRecord {
  ledgerId: string;
  latestHash: string;
  entryCount: number;
  timestamp: string;
  anchorData: JsonObject;
}

export interface IdempotencyRecord {
  taskId: string;
  taskName: string;
  output: JsonObject;
  completedAt: string;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}
