import type { AuditEntry, JsonObject, JsonValue, Playbook, TaskDefinition } from "@incident/shared";
import { PlaybookNotFoundError } from "../src/errors.js";
import { HandlerRegistry, type Connector, type DispatchRequest } from "../src/handlers/registry.js";
import type { PlaybookSource } from "../src/playbooks/source.js";

type TaskSpec = Partial<Omit<TaskDefinition, "name">>;

export function playbook(tasks: Record<string, TaskSpec>, title = "Test playbook"): Playbook {
  const definitions: Record<string, TaskDefinition> = {};
  for (const [name, spec] of Object.entries(tasks)) {
    definitions[name] = {
      name,
      type: spec.type ?? "Step",
      inputs: spec.inputs ?? {},
      needs: spec.needs ?? [],
      approvalRequired: spec.approvalRequired ?? false,
      idempotencyKey: spec.idempotencyKey ?? null
    };
  }
  return { playbookId: "test-playbook", title, tasks: definitions };
}

export class StaticPlaybookSource implements PlaybookSource {
  private readonly playbooks = new Map<string, Playbook>();

  constructor(playbooks: Playbook[]) {
    playbooks.forEach((playbook) => this.playbooks.set(playbook.playbookId, playbook));
  }

  async load(playbookId: string, _context: JsonObject): Promise<Playbook> {
    const playbook = this.playbooks.get(playbookId);
    if (!playbook) {
      throw new PlaybookNotFoundError(playbookId);
    }
    return structuredClone(playbook);
  }
}

/** Records every call and answers with `respond`, or `{ ok: true, task }` by default. */
export class RecordingConnector implements Connector {
  readonly calls: { operation: string; payload: JsonObject }[] = [];

  constructor(private readonly respond?: (operation: string, payload: JsonObject) => Promise<JsonValue>) {}

  async call(operation: string, payload: JsonObject): Promise<JsonValue> {
    this.calls.push({ operation, payload });
    return this.respond ? this.respond(operation, payload) : { ok: true, operation };
  }
}

export function registryFor(connector: Connector, taskTypes: string[] = ["Step"]): HandlerRegistry {
  const registry = new HandlerRegistry();
  for (const taskType of taskTypes) {
    registry.register(taskType, {
      dispatch: (request: DispatchRequest) => connector.call(request.operation, request.inputs)
    });
  }
  return registry;
}

export function actions(entries: AuditEntry[]): string[] {
  return entries.map((entry) => entry.action);
}

export function entryFor(entries: AuditEntry[], action: string, task: string): AuditEntry | undefined {
  return entries.find((entry) => entry.action === action && entry.details.task === task);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
