import { EventEmitter } from "node:events";
import type { RunStatus, TaskStatus } from "@incident/shared";

export type EngineEvent =
  | { type: "case.opened"; caseId: string; playbookId: string }
  | { type: "case.updated"; caseId: string; status: RunStatus }
  | { type: "task.updated"; caseId: string; taskId: string; taskName: string; status: TaskStatus }
  | { type: "ledger.anchored"; caseId: string; latestHash: string; entryCount: number };

class AppEvents extends EventEmitter {
  emitEvent(event: EngineEvent): void {
    this.emit("event", event);
  }
}

export const appEvents = new AppEvents();
