import type { AnchorRecord, JsonObject, Playbook, RunResult, RunStatus, TaskRecord, TaskStatus } from "@incident/shared";
import { v4 as uuidv4 } from "uuid";
import { ExecutionEngine } from "./engine/executionEngine.js";
import { CaseExistsError, CaseNotFoundError } from "./errors.js";
import { appEvents } from "./events.js";
import type { HandlerRegistry } from "./handlers/registry.js";
import type { IdempotencyStore } from "./idempotency/types.js";
import { AuditLedger } from "./ledger/auditLedger.js";
import { caseOpenedCounter, ledgerAnchorCounter, runStatusCounter } from "./metrics/metrics.js";
import type { PolicyChecker } from "./policy/checker.js";
import type { PolicyGate } from "./policy/policyGate.js";
import type { PlaybookSource } from "./playbooks/source.js";

export interface CaseServiceOptions {
  playbooks: PlaybookSource;
  handlers: HandlerRegistry;
  idempotency: IdempotencyStore;
  /** Ledger files go here; null keeps every ledger in memory. */
  ledgerDir: string | null;
  policyGate?: PolicyGate;
  policyChecker?: PolicyChecker | null;
  maxConcurrency?: number;
  connectorTimeoutMs?: number;
}

export interface OpenCaseInput {
  caseId?: string;
  /** Loaded through the PlaybookSource unless `playbook` is given inline. */
  playbookId?: string;
  playbook?: Playbook;
  title?: string;
  description?: string;
  context?: JsonObject;
  autoApprove?: boolean;
}

export interface CaseSummary {
  caseId: string;
  playbookId: string;
  title: string;
  status: RunStatus;
  createdAt: string;
  ledgerEntries: number;
  latestHash: string;
}

interface OpenCase {
  engine: ExecutionEngine;
  ledger: AuditLedger;
}

export class CaseService {
  private readonly cases = new Map<string, OpenCase>();

  constructor(private readonly options: CaseServiceOptions) {}

  async openCase(input: OpenCaseInput): Promise<RunResult> {
    const caseId = input.caseId ?? uuidv4();
    if (this.cases.has(caseId)) {
      throw new CaseExistsError(caseId);
    }
    const context = input.context ?? {};
    let playbook: Playbook;
    if (input.playbook) {
      playbook = input.playbook;
    } else if (input.playbookId) {
      playbook = await this.options.playbooks.load(input.playbookId, context);
    } else {
      throw new Error("Either playbook or playbookId is required.");
    }

    const ledger = this.options.ledgerDir
      ? await AuditLedger.open({ ledgerId: caseId, directory: this.options.ledgerDir })
      : AuditLedger.inMemory(caseId);
    const engine = new ExecutionEngine({
      ledger,
      handlers: this.options.handlers,
      idempotency: this.options.idempotency,
      policyGate: this.options.policyGate,
      policyChecker: this.options.policyChecker,
      maxConcurrency: this.options.maxConcurrency,
      connectorTimeoutMs: this.options.connectorTimeoutMs,
      onTransition: (transition) => {
        appEvents.emitEvent({
          type: "task.updated",
          caseId: transition.caseId,
          taskId: transition.taskId,
          taskName: transition.taskName,
          status: transition.status
        });
      }
    });

    this.cases.set(caseId, { engine, ledger });
    caseOpenedCounter.inc({ playbook_id: playbook.playbookId });
    appEvents.emitEvent({ type: "case.opened", caseId, playbookId: playbook.playbookId });

    let result: RunResult;
    try {
      result = await engine.run(playbook, {
        caseId,
        context,
        autoApprove: input.autoApprove ?? false,
        title: input.title,
        description: input.description
      });
    } catch (error) {
      this.cases.delete(caseId);
      throw error;
    }
    this.publishStatus(result);
    return result;
  }

  async approveTask(caseId: string, taskName: string, approver: string): Promise<{ task: TaskRecord; case: RunResult }> {
    const { engine } = this.require(caseId);
    const task = await engine.approve(taskName, approver);
    const result = this.getCase(caseId);
    this.publishStatus(result);
    return { task, case: result };
  }

  getCase(caseId: string): RunResult {
    const result = this.require(caseId).engine.result();
    if (!result) {
      throw new CaseNotFoundError(caseId);
    }
    return result;
  }

  listTasks(caseId: string, status?: TaskStatus): TaskRecord[] {
    const { engine } = this.require(caseId);
    if (status) return engine.tasksByStatus(status);
    return Object.values(this.getCase(caseId).tasks);
  }

  listCases(): CaseSummary[] {
    const summaries: CaseSummary[] = [];
    for (const [caseId, { engine, ledger }] of this.cases) {
      const result = engine.result();
      const caseRecord = engine.caseRecord;
      if (!result || !caseRecord) continue;
      summaries.push({
        caseId,
        playbookId: result.playbookId,
        title: caseRecord.title,
        status: result.status,
        createdAt: caseRecord.createdAt,
        ledgerEntries: ledger.size,
        latestHash: ledger.latestHash()
      });
    }
    return summaries.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  ledgerFor(caseId: string): AuditLedger {
    return this.require(caseId).ledger;
  }

  async anchorCase(caseId: string, anchorData: JsonObject): Promise<AnchorRecord> {
    const anchor = await this.ledgerFor(caseId).anchor(anchorData);
    ledgerAnchorCounter.inc();
    appEvents.emitEvent({
      type: "ledger.anchored",
      caseId,
      latestHash: anchor.latestHash,
      entryCount: anchor.entryCount
    });
    return anchor;
  }

  async anchorAll(anchorData: JsonObject): Promise<AnchorRecord[]> {
    const anchors: AnchorRecord[] = [];
    for (const caseId of this.cases.keys()) {
      anchors.push(await this.anchorCase(caseId, anchorData));
    }
    return anchors;
  }

  private publishStatus(result: RunResult): void {
    runStatusCounter.inc({ status: result.status });
    appEvents.emitEvent({ type: "case.updated", caseId: result.caseId, status: result.status });
  }

  private require(caseId: string): OpenCase {
    const open = this.cases.get(caseId);
    if (!open) {
      throw new CaseNotFoundError(caseId);
    }
    return open;
  }
}
