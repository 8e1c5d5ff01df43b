import type { TaskStatus } from "@incident/shared";

export class TaskNotFoundError extends Error {
  constructor(readonly taskName: string) {
    super(`Task '${taskName}' not found.`);
    this.name = "TaskNotFoundError";
  }
}

export class NotAwaitingApprovalError extends Error {
  constructor(
    readonly taskName: string,
    readonly status: TaskStatus
  ) {
    super(`Task '${taskName}' is not awaiting approval (status: ${status}).`);
    this.name = "NotAwaitingApprovalError";
  }
}

export class CaseNotFoundError extends Error {
  constructor(readonly caseId: string) {
    super(`Case '${caseId}' not found.`);
    this.name = "CaseNotFoundError";
  }
}

export class PlaybookNotFoundError extends Error {
  constructor(readonly playbookId: string) {
    super(`Playbook '${playbookId}' not found.`);
    this.name = "PlaybookNotFoundError";
  }
}

export class UnresolvedReferenceError extends Error {
  constructor(readonly reference: string) {
    super(`Unresolved reference '{{${reference}}}'.`);
    this.name = "UnresolvedReferenceError";
  }
}

export class ConnectorTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`task timed out after ${timeoutMs}ms`);
    this.name = "ConnectorTimeoutError";
  }
}

export class CaseExistsError extends Error {
  constructor(readonly caseId: string) {
    super(`Case '${caseId}' already exists.`);
    this.name = "CaseExistsError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
