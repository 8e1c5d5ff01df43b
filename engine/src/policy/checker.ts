import type { JsonObject } from "@incident/shared";

export interface PolicyCheckRequest {
  taskType: string;
  taskName: string;
  inputs: JsonObject;
}

/** External allow/deny decision consulted after the PolicyGate's own rules. */
export interface PolicyChecker {
  check(request: PolicyCheckRequest): Promise<boolean>;
}

/** Denies the listed task types outright; everything else is allowed. */
export function denyTaskTypes(types: Iterable<string>): PolicyChecker {
  const denied = new Set(types);
  return {
    async check(request) {
      return !denied.has(request.taskType);
    }
  };
}
