import type { JsonObject, JsonValue, TaskRecord } from "@incident/shared";

/** Adapter to an external system. Any rejection is treated as a task failure. */
export interface Connector {
  call(operation: string, payload: JsonObject): Promise<JsonValue>;
}

export interface DispatchRequest {
  operation: string;
  inputs: JsonObject;
  task: Readonly<TaskRecord>;
}

export interface Handler {
  dispatch(request: DispatchRequest): Promise<JsonValue>;
}

function operationName(taskType: string): string {
  return taskType
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[\s-]+/g, "_")
    .toLowerCase();
}

export function connectorHandler(connector: Connector, operation?: string): Handler {
  return {
    dispatch: (request) => connector.call(operation ?? request.operation, request.inputs)
  };
}

/** For task types that need no external system, e.g. advice produced for the analyst. */
export function advisoryHandler(message?: string): Handler {
  return {
    async dispatch(request) {
      return { status: "success", message: message ?? `${request.task.type} completed` };
    }
  };
}

/**
 * Task type -> handler lookup injected into the engine. Routes written as
 * `connector:operation` bind a task type to one operation of a named connector.
 */
export class HandlerRegistry {
  private readonly handlers = new Map<string, Handler>();

  register(taskType: string, handler: Handler): this {
    this.handlers.set(taskType, handler);
    return this;
  }

  resolve(taskType: string): Handler | null {
    return this.handlers.get(taskType) ?? null;
  }

  get taskTypes(): string[] {
    return [...this.handlers.keys()].sort((a, b) => a.localeCompare(b));
  }

  operationFor(taskType: string): string {
    return operationName(taskType);
  }

  static fromConnectors(connectors: Record<string, Connector>, routes: Record<string, string>): HandlerRegistry {
    const registry = new HandlerRegistry();
    for (const [taskType, route] of Object.entries(routes)) {
      const [connectorName, operation] = route.split(":");
      const connector = connectors[connectorName];
      if (!connector) {
        throw new Error(`Route for '${taskType}' names unknown connector '${connectorName}'.`);
      }
      registry.register(taskType, connectorHandler(connector, operation || undefined));
    }
    return registry;
  }
}
