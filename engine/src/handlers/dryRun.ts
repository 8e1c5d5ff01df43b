import type { JsonObject, JsonValue } from "@incident/shared";
import type { Connector } from "./registry.js";

/**
 * Stands in for a remote system when no live integration is configured: logs the
 * request and echoes it back as accepted.
 */
export function dryRunConnector(system: string): Connector {
  return {
    async call(operation: string, payload: JsonObject): Promise<JsonValue> {
      console.log(`dry-run ${system}.${operation}`);
      return { status: "accepted", system, operation, dryRun: true, request: payload };
    }
  };
}
