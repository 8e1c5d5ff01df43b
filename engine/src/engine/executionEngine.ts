import {
  CompileError,
  compileGraph,
  isJsonObject,
  isTerminal,
  markApproved,
  markBlocked,
  markCompleted,
  markFailed,
  markRunning,
  markSkipped,
  markWaitingApproval,
  summarizeRunStatus,
  type CaseRecord,
  type IdempotencyRecord,
  type JsonObject,
  type JsonValue,
  type Playbook,
  type RunResult,
  type TaskRecord,
  type TaskStatus
} from "@incident/shared";
import { v4 as uuidv4 } from "uuid";
import { NotAwaitingApprovalError, TaskNotFoundError, UnresolvedReferenceError, errorMessage } from "../errors.js";
import type { HandlerRegistry } from "../handlers/registry.js";
import { InMemoryIdempotencyStore } from "../idempotency/memoryStore.js";
import type { IdempotencyStore } from "../idempotency/types.js";
import type { AuditLedger } from "../ledger/auditLedger.js";
import { dispatchLatencyHistogram, taskStatusCounter } from "../metrics/metrics.js";
import type { PolicyChecker } from "../policy/checker.js";
import { PolicyGate, PolicyViolation } from "../policy/policyGate.js";
import { resolveInputs, resolveTemplate, type ResolutionScope } from "./inputs.js";
import { runBounded } from "./pool.js";
import { withTimeout } from "./timeout.js";

export interface TaskTransition {
  caseId: string;
  playbookId: string;
  taskId: string;
  taskName: string;
  status: TaskStatus;
}

export interface ExecutionEngineOptions {
  ledger: AuditLedger;
  handlers: HandlerRegistry;
  idempotency?: IdempotencyStore;
  policyGate?: PolicyGate;
  policyChecker?: PolicyChecker | null;
  maxConcurrency?: number;
  /** Per-dispatch limit; 0 disables it. */
  connectorTimeoutMs?: number;
  /** Actor recorded on entries the engine writes itself. */
  actor?: string;
  onTransition?: (transition: TaskTransition) => void;
  clock?: () => Date;
}

export interface RunOptions {
  caseId: string;
  context?: JsonObject;
  autoApprove?: boolean;
  title?: string;
  description?: string;
}

interface RunState {
  playbook: Playbook;
  caseRecord: CaseRecord;
  context: JsonObject;
  autoApprove: boolean;
  layers: string[][];
  outputs: Map<string, JsonObject>;
  /** Idempotency keys after reference substitution, by task name. */
  keys: Map<string, string>;
}

const SETTLED: ReadonlySet<TaskStatus> = new Set(["completed", "skipped"]);
const UPSTREAM_DEAD: ReadonlySet<TaskStatus> = new Set(["failed", "blocked"]);

/**
 * Drives one playbook run for one case: layer by layer, with a bounded pool inside each
 * layer. Tasks that need approval suspend the run; `approve` executes them and resumes
 * every dependent that became ready.
 */
export class ExecutionEngine {
  private readonly ledger: AuditLedger;
  private readonly handlers: HandlerRegistry;
  private readonly idempotency: IdempotencyStore;
  private readonly policyGate: PolicyGate;
  private readonly policyChecker: PolicyChecker | null;
  private readonly maxConcurrency: number;
  private readonly connectorTimeoutMs: number;
  private readonly actor: string;
  private readonly onTransition: ((transition: TaskTransition) => void) | null;
  private readonly clock: () => Date;

  private readonly tasks = new Map<string, TaskRecord>();
  // Names of tasks some caller is currently advancing; claimed before the first await.
  private readonly inFlight = new Set<string>();
  private state: RunState | null = null;
  // Set while `run` walks the layers; approvals then leave resumption to the layer loop.
  private runInProgress = false;
  private approvals: Promise<unknown> = Promise.resolve();

  constructor(options: ExecutionEngineOptions) {
    this.ledger = options.ledger;
    this.handlers = options.handlers;
    this.idempotency = options.idempotency ?? new InMemoryIdempotencyStore();
    this.policyGate = options.policyGate ?? PolicyGate.withDefaults();
    this.policyChecker = options.policyChecker ?? null;
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? 4);
    this.connectorTimeoutMs = options.connectorTimeoutMs ?? 30_000;
    this.actor = options.actor ?? "playbook-engine";
    this.onTransition = options.onTransition ?? null;
    this.clock = options.clock ?? (() => new Date());
  }

  async run(playbook: Playbook, options: RunOptions): Promise<RunResult> {
    const { caseId } = options;
    await this.record("playbook_started", { caseId, playbookId: playbook.playbookId });

    let layers: string[][];
    try {
      layers = compileGraph(playbook.tasks);
    } catch (error) {
      if (error instanceof CompileError) {
        await this.record("playbook_compile_failed", {
          playbookId: playbook.playbookId,
          kind: error.kind,
          message: error.message,
          tasks: error.tasks
        });
      }
      throw error;
    }
    await this.record("graph_compiled", {
      playbookId: playbook.playbookId,
      taskCount: Object.keys(playbook.tasks).length,
      layers
    });

    const now = this.clock().toISOString();
    const state: RunState = {
      playbook,
      caseRecord: {
        caseId,
        title: options.title ?? playbook.title,
        description: options.description ?? "",
        createdAt: now
      },
      context: structuredClone(options.context ?? {}),
      autoApprove: options.autoApprove ?? false,
      layers,
      outputs: new Map(),
      keys: new Map()
    };
    this.state = state;
    this.tasks.clear();
    this.inFlight.clear();

    for (const [name, definition] of Object.entries(playbook.tasks)) {
      const task: TaskRecord = {
        id: uuidv4(),
        caseId,
        playbookId: playbook.playbookId,
        name,
        type: definition.type,
        definition: structuredClone({ ...definition, name }),
        status: "pending",
        resolvedInputs: null,
        output: null,
        error: null,
        reason: null,
        approvedBy: null,
        createdAt: now,
        startedAt: null,
        completedAt: null
      };
      this.tasks.set(name, task);
      await this.record("task_created", { task: name, taskId: task.id, type: task.type });
    }

    try {
      this.policyGate.evaluateCase(state.caseRecord);
    } catch (error) {
      if (!(error instanceof PolicyViolation)) throw error;
      await this.record("case_policy_denied", { caseId, rule: error.rule, reason: error.reason });
      for (const name of layers.flat()) {
        await this.block(name, error.message);
      }
      return this.finish();
    }

    this.runInProgress = true;
    try {
      for (const [index, members] of layers.entries()) {
        await this.record("layer_started", { layer: index, tasks: members });
        await runBounded(members, this.maxConcurrency, (name) => this.advance(name, true));
        await this.record("layer_completed", {
          layer: index,
          statuses: Object.fromEntries(members.map((name) => [name, this.requireTask(name).status]))
        });
      }
      // Approvals granted mid-run can unblock tasks in layers that were already walked.
      for (;;) {
        const ready = this.readyTasks();
        if (ready.length === 0) break;
        await this.advanceReady(ready);
      }
    } finally {
      this.runInProgress = false;
    }
    return this.finish();
  }

  /**
   * Approves a task that is waiting for a human, executes it and resumes the dependents
   * that become ready. Calls are handled one at a time.
   */
  approve(taskName: string, approver: string): Promise<TaskRecord> {
    const result = this.approvals.then(() => this.approveNow(taskName, approver));
    this.approvals = result.catch(() => undefined);
    return result;
  }

  status(taskName: string): TaskStatus | null {
    return this.tasks.get(taskName)?.status ?? null;
  }

  getTask(taskName: string): TaskRecord | null {
    const task = this.tasks.get(taskName);
    return task ? structuredClone(task) : null;
  }

  tasksByStatus(status: TaskStatus): TaskRecord[] {
    return [...this.tasks.values()].filter((task) => task.status === status).map((task) => structuredClone(task));
  }

  get caseRecord(): CaseRecord | null {
    return this.state ? structuredClone(this.state.caseRecord) : null;
  }

  result(): RunResult | null {
    const state = this.state;
    if (!state) return null;
    const tasks: Record<string, TaskRecord> = {};
    for (const [name, task] of this.tasks) {
      tasks[name] = structuredClone(task);
    }
    return {
      caseId: state.caseRecord.caseId,
      playbookId: state.playbook.playbookId,
      status: summarizeRunStatus([...this.tasks.values()].map((task) => task.status)),
      tasks,
      results: structuredClone(Object.fromEntries(state.outputs))
    };
  }

  private async approveNow(taskName: string, approver: string): Promise<TaskRecord> {
    const task = this.tasks.get(taskName);
    if (!task) {
      throw new TaskNotFoundError(taskName);
    }
    if (task.status !== "waiting_approval" || this.inFlight.has(taskName)) {
      throw new NotAwaitingApprovalError(taskName, task.status);
    }

    this.inFlight.add(taskName);
    try {
      const approved = this.update(markApproved(task, approver));
      await this.ledger.append(approver, "task_approved", {
        caseId: approved.caseId,
        task: taskName,
        taskId: approved.id
      });
      await this.execute(taskName, approved.resolvedInputs ?? {});
    } finally {
      this.inFlight.delete(taskName);
    }

    if (!this.runInProgress) {
      await this.resume();
    }
    return structuredClone(this.requireTask(taskName));
  }

  private async resume(): Promise<void> {
    const pending = [...this.tasks.values()].filter((task) => task.status === "pending").map((task) => task.name);
    if (pending.length > 0) {
      await this.advanceReady(pending);
    }
    await this.finish();
  }

  private async advanceReady(pending: string[]): Promise<void> {
    await this.record("run_resumed", { pending });
    for (const members of this.requireState().layers) {
      const ready = members.filter((name) => this.isReady(name));
      if (ready.length > 0) {
        await runBounded(ready, this.maxConcurrency, (name) => this.advance(name, false));
      }
    }
  }

  private readyTasks(): string[] {
    return this.requireState().layers.flat().filter((name) => this.isReady(name));
  }

  private isReady(name: string): boolean {
    const task = this.requireTask(name);
    return task.status === "pending" && task.definition.needs.every((dep) => isTerminal(this.requireTask(dep).status));
  }

  private async advance(name: string, announceDeferral: boolean): Promise<void> {
    const task = this.requireTask(name);
    if (task.status !== "pending" || this.inFlight.has(name)) return;
    this.inFlight.add(name);
    try {
      await this.advanceClaimed(task, announceDeferral);
    } finally {
      this.inFlight.delete(name);
    }
  }

  private async advanceClaimed(task: TaskRecord, announceDeferral: boolean): Promise<void> {
    const state = this.requireState();
    const { name, definition } = task;
    const upstream = definition.needs.map((dep) => this.requireTask(dep));

    const dead = upstream.find((dep) => UPSTREAM_DEAD.has(dep.status));
    if (dead) {
      await this.block(name, `Upstream task '${dead.name}' ended ${dead.status}.`);
      return;
    }

    const waitingOn = upstream.filter((dep) => !SETTLED.has(dep.status)).map((dep) => dep.name);
    if (waitingOn.length > 0) {
      if (announceDeferral) {
        await this.record("task_deferred", { task: name, taskId: task.id, waitingOn });
      }
      return;
    }

    const scope: ResolutionScope = {
      context: state.context,
      outputs: state.outputs,
      taskNames: new Set(this.tasks.keys())
    };
    let key: string | null;
    try {
      key = definition.idempotencyKey === null ? null : resolveTemplate(definition.idempotencyKey, scope);
    } catch (error) {
      if (!(error instanceof UnresolvedReferenceError)) throw error;
      await this.fail(name, error.message);
      return;
    }

    if (key !== null) {
      state.keys.set(name, key);
      let previous: IdempotencyRecord | null;
      try {
        previous = await this.idempotency.get(key);
      } catch (error) {
        await this.fail(name, `Idempotency lookup for '${key}' failed: ${errorMessage(error)}`);
        return;
      }
      if (previous) {
        const skipped = this.update(
          markSkipped(this.requireTask(name), `Idempotency key '${key}' already recorded by task ${previous.taskId}.`, this.clock())
        );
        state.outputs.set(name, structuredClone(previous.output));
        await this.record("task_skipped", {
          task: name,
          taskId: skipped.id,
          idempotencyKey: key,
          originalTaskId: previous.taskId
        });
        return;
      }
    }

    let inputs: JsonObject;
    try {
      inputs = resolveInputs(definition.inputs, scope);
    } catch (error) {
      if (!(error instanceof UnresolvedReferenceError)) throw error;
      await this.fail(name, error.message);
      return;
    }

    if (definition.approvalRequired && !state.autoApprove) {
      const waiting = this.update(markWaitingApproval(this.requireTask(name), inputs));
      await this.record("task_waiting_approval", { task: name, taskId: waiting.id });
      return;
    }
    if (definition.approvalRequired) {
      await this.record("task_auto_approved", { task: name, taskId: task.id });
    }

    await this.execute(name, inputs);
  }

  private async execute(name: string, inputs: JsonObject): Promise<void> {
    const state = this.requireState();
    const task = this.requireTask(name);

    try {
      this.policyGate.evaluateTask(state.caseRecord, task, { inputs }, "before");
    } catch (error) {
      if (!(error instanceof PolicyViolation)) throw error;
      await this.block(name, error.message);
      return;
    }

    if (this.policyChecker) {
      let allowed: boolean;
      try {
        allowed = await this.policyChecker.check({ taskType: task.type, taskName: name, inputs });
      } catch (error) {
        await this.record("policy_check_error", { task: name, taskId: task.id, error: errorMessage(error) });
        await this.block(name, `Policy check failed: ${errorMessage(error)}`);
        return;
      }
      await this.record("policy_checked", { task: name, taskId: task.id, allowed });
      if (!allowed) {
        await this.block(name, "Policy check failed");
        return;
      }
    }

    const handler = this.handlers.resolve(task.type);
    if (!handler) {
      await this.block(name, `No handler registered for task type '${task.type}'.`);
      return;
    }

    const running = this.update(markRunning(task, inputs, this.clock()));
    await this.record("task_started", { task: name, taskId: running.id, type: running.type });

    let output: JsonObject;
    const endTimer = dispatchLatencyHistogram.startTimer({ task_type: running.type });
    try {
      const result: JsonValue = await withTimeout(
        Promise.resolve().then(() =>
          handler.dispatch({
            operation: this.handlers.operationFor(running.type),
            inputs: structuredClone(inputs),
            task: structuredClone(running)
          })
        ),
        this.connectorTimeoutMs
      );
      if (!isJsonObject(result)) {
        throw new Error(`Handler for '${running.type}' returned a non-object result.`);
      }
      output = result;
    } catch (error) {
      await this.fail(name, errorMessage(error));
      return;
    } finally {
      endTimer();
    }

    try {
      this.policyGate.evaluateTask(state.caseRecord, running, { inputs, output }, "after");
    } catch (error) {
      if (!(error instanceof PolicyViolation)) throw error;
      await this.fail(name, error.message);
      return;
    }

    const completed = this.update(markCompleted(running, output, this.clock()));
    state.outputs.set(name, structuredClone(output));

    const key = state.keys.get(name);
    const details: JsonObject = { task: name, taskId: completed.id };
    let storeError: string | null = null;
    if (key) {
      details.idempotencyKey = key;
      try {
        details.recorded = await this.idempotency.put(key, {
          taskId: completed.id,
          taskName: name,
          output: structuredClone(output),
          completedAt: completed.completedAt ?? this.clock().toISOString()
        });
      } catch (error) {
        details.recorded = false;
        storeError = errorMessage(error);
      }
    }
    await this.record("task_completed", details);
    if (key && storeError !== null) {
      await this.record("idempotency_record_failed", {
        task: name,
        taskId: completed.id,
        idempotencyKey: key,
        error: storeError
      });
    }
  }

  private async block(name: string, reason: string): Promise<void> {
    const blocked = this.update(markBlocked(this.requireTask(name), reason, this.clock()));
    await this.record("task_blocked", { task: name, taskId: blocked.id, reason });
  }

  private async fail(name: string, message: string): Promise<void> {
    const failed = this.update(markFailed(this.requireTask(name), message, this.clock()));
    await this.record("task_failed", { task: name, taskId: failed.id, error: message });
  }

  private async finish(): Promise<RunResult> {
    const result = this.result();
    if (!result) {
      throw new Error("No playbook run has started.");
    }
    if (result.status === "succeeded" || result.status === "failed") {
      await this.record("playbook_completed", { caseId: result.caseId, status: result.status });
    } else {
      await this.record("playbook_suspended", {
        caseId: result.caseId,
        status: result.status,
        waiting: Object.values(result.tasks)
          .filter((task) => task.status === "waiting_approval")
          .map((task) => task.name)
      });
    }
    return result;
  }

  private update(task: TaskRecord): TaskRecord {
    this.tasks.set(task.name, task);
    taskStatusCounter.inc({ status: task.status });
    this.onTransition?.({
      caseId: task.caseId,
      playbookId: task.playbookId,
      taskId: task.id,
      taskName: task.name,
      status: task.status
    });
    return task;
  }

  private requireTask(name: string): TaskRecord {
    const task = this.tasks.get(name);
    if (!task) {
      throw new TaskNotFoundError(name);
    }
    return task;
  }

  private requireState(): RunState {
    if (!this.state) {
      throw new Error("No playbook run has started.");
    }
    return this.state;
  }

  private record(action: string, details: JsonObject): Promise<unknown> {
    return this.ledger.append(this.actor, action, details);
  }
}
