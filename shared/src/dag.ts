import type { JsonObject, JsonValue, Playbook, TaskDefinition, ValidationError, ValidationResult } from "./types.js";

export type CompileErrorKind = "unknown_dependency" | "cycle";

export class CompileError extends Error {
  constructor(
    readonly kind: CompileErrorKind,
    message: string,
    readonly tasks: string[]
  ) {
    super(message);
    this.name = "CompileError";
  }
}

export class PlaybookValidationError extends Error {
  constructor(readonly errors: ValidationError[]) {
    super(`Invalid playbook: ${errors.map((error) => `${error.path}: ${error.message}`).join("; ")}`);
    this.name = "PlaybookValidationError";
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  if (isObject(value)) return Object.values(value).every(isJsonValue);
  return false;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isObject(value) && isJsonValue(value);
}

/**
 * Checks a playbook document in its file/wire form:
 * `{ playbook_id, title?, tasks: { [name]: { type, inputs?, needs?, approval_required?, idempotency_key? } } }`.
 * Graph-level problems (unknown dependencies, cycles) are reported as well, so one call
 * surfaces everything wrong with the document.
 */
export function validatePlaybookDocument(input: unknown): ValidationResult {
  const errors: ValidationResult["errors"] = [];

  if (!isObject(input)) {
    return {
      valid: false,
      errors: [{ path: "root", message: "Playbook must be an object." }]
    };
  }

  const playbookId = input.playbook_id;
  if (typeof playbookId !== "string" || playbookId.trim().length === 0) {
    errors.push({ path: "playbook_id", message: "playbook_id is required." });
  }
  if (input.title !== undefined && typeof input.title !== "string") {
    errors.push({ path: "title", message: "title must be a string." });
  }

  const tasks = input.tasks;
  if (!isObject(tasks) || Object.keys(tasks).length === 0) {
    errors.push({ path: "tasks", message: "Tasks must be a non-empty object keyed by task name." });
    return { valid: false, errors };
  }

  const edgeMap = new Map<string, string[]>();

  for (const [name, task] of Object.entries(tasks)) {
    const path = `tasks.${name}`;
    if (!isObject(task)) {
      errors.push({ path, message: "Task must be an object." });
      continue;
    }
    if (typeof task.type !== "string" || task.type.length === 0) {
      errors.push({ path: `${path}.type`, message: "Task type is required." });
    }
    if (task.inputs !== undefined && !isJsonObject(task.inputs)) {
      errors.push({ path: `${path}.inputs`, message: "inputs must be an object of JSON values." });
    }
    if (task.approval_required !== undefined && typeof task.approval_required !== "boolean") {
      errors.push({ path: `${path}.approval_required`, message: "approval_required must be a boolean." });
    }
    const key = task.idempotency_key;
    if (key !== undefined && key !== null && (typeof key !== "string" || key.length === 0)) {
      errors.push({ path: `${path}.idempotency_key`, message: "idempotency_key must be a non-empty string." });
    }

    const needs = task.needs;
    if (needs !== undefined && (!Array.isArray(needs) || !needs.every((dep) => typeof dep === "string"))) {
      errors.push({ path: `${path}.needs`, message: "needs must be an array of task names." });
      edgeMap.set(name, []);
      continue;
    }
    edgeMap.set(name, Array.isArray(needs) ? needs.map((dep) => String(dep)) : []);
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  try {
    compileEdges(edgeMap);
  } catch (error) {
    if (!(error instanceof CompileError)) throw error;
    errors.push({ path: "tasks", message: error.message });
  }

  return { valid: errors.length === 0, errors };
}

export function parsePlaybookDocument(input: unknown): Playbook {
  const result = validatePlaybookDocument(input);
  if (!result.valid || !isObject(input) || !isObject(input.tasks)) {
    throw new PlaybookValidationError(result.errors);
  }

  const playbookId = String(input.playbook_id);
  const tasks: Record<string, TaskDefinition> = {};
  for (const [name, raw] of Object.entries(input.tasks)) {
    if (!isObject(raw)) continue;
    tasks[name] = {
      name,
      type: String(raw.type),
      inputs: isJsonObject(raw.inputs) ? raw.inputs : {},
      needs: Array.isArray(raw.needs) ? raw.needs.map((dep) => String(dep)) : [],
      approvalRequired: raw.approval_required === true,
      idempotencyKey: typeof raw.idempotency_key === "string" ? raw.idempotency_key : null
    };
  }

  return {
    playbookId,
    title: typeof input.title === "string" ? input.title : playbookId,
    tasks
  };
}

/**
 * Compiles task definitions into execution layers. Every task lands in exactly one
 * layer, strictly after the layers of all of its dependencies. Names inside a layer
 * are sorted so the plan is stable for a given playbook.
 */
export function compileGraph(tasks: Record<string, Pick<TaskDefinition, "needs">>): string[][] {
  const edges = new Map<string, string[]>();
  for (const [name, task] of Object.entries(tasks)) {
    edges.set(name, [...task.needs]);
  }
  return compileEdges(edges);
}

function compileEdges(edges: Map<string, string[]>): string[][] {
  for (const [node, deps] of edges.entries()) {
    const unknown = deps.find((dep) => !edges.has(dep));
    if (unknown !== undefined) {
      throw new CompileError(
        "unknown_dependency",
        `Task '${node}' depends on unknown task '${unknown}'.`,
        [node, unknown]
      );
    }
  }

  const cycle = findCycle(edges);
  if (cycle) {
    throw new CompileError("cycle", `Task graph contains a cycle: ${cycle.join(" -> ")}.`, cycle);
  }

  return layer(edges);
}

function findCycle(edges: Map<string, string[]>): string[] | null {
  const visited = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (node: string): string[] | null => {
    if (onStack.has(node)) {
      return [...stack.slice(stack.indexOf(node)), node];
    }
    if (visited.has(node)) return null;
    stack.push(node);
    onStack.add(node);
    for (const dep of edges.get(node) ?? []) {
      const found = visit(dep);
      if (found) return found;
    }
    stack.pop();
    onStack.delete(node);
    visited.add(node);
    return null;
  };

  for (const node of edges.keys()) {
    const found = visit(node);
    if (found) return found;
  }
  return null;
}

function layer(edges: Map<string, string[]>): string[][] {
  const inDegree = new Map<string, number>();
  const reverse = new Map<string, string[]>();

  for (const [node, deps] of edges.entries()) {
    inDegree.set(node, new Set(deps).size);
    new Set(deps).forEach((dep) => {
      const list = reverse.get(dep) ?? [];
      list.push(node);
      reverse.set(dep, list);
    });
  }

  const layers: string[][] = [];
  let frontier = [...inDegree.entries()].filter(([, degree]) => degree === 0).map(([node]) => node);
  let placed = 0;

  while (frontier.length > 0) {
    frontier.sort((a, b) => a.localeCompare(b));
    layers.push(frontier);
    placed += frontier.length;
    const next: string[] = [];
    frontier.forEach((current) => {
      (reverse.get(current) ?? []).forEach((dependent) => {
        const nextDegree = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, nextDegree);
        if (nextDegree === 0) next.push(dependent);
      });
    });
    frontier = next;
  }

  if (placed !== edges.size) {
    const unplaced = [...edges.keys()].filter((node) => !layers.some((members) => members.includes(node)));
    throw new CompileError("cycle", `Task graph contains a cycle among: ${unplaced.join(", ")}.`, unplaced);
  }

  return layers;
}
