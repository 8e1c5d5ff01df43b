import { readFile } from "node:fs/promises";
import { isJsonObject } from "@incident/shared";
import { dryRunConnector } from "./dryRun.js";
import { HandlerRegistry, advisoryHandler, type Connector } from "./registry.js";

/** Reads a `{ "<TaskType>": "<connector>:<operation>" }` routing file. */
export async function loadConnectorRoutes(file: string): Promise<Record<string, string>> {
  const parsed: unknown = JSON.parse(await readFile(file, "utf8"));
  if (!isJsonObject(parsed)) {
    throw new Error(`Connector routes in ${file} must be an object.`);
  }
  const routes: Record<string, string> = {};
  for (const [taskType, route] of Object.entries(parsed)) {
    if (typeof route !== "string" || !route.includes(":")) {
      throw new Error(`Connector route for '${taskType}' must look like 'connector:operation'.`);
    }
    routes[taskType] = route;
  }
  return routes;
}

/**
 * Routes every task type to a dry-run connector for its system, plus the advisory
 * HardeningCoach step that needs no connector.
 */
export function createDefaultRegistry(routes: Record<string, string>): HandlerRegistry {
  const connectors: Record<string, Connector> = {};
  for (const route of Object.values(routes)) {
    const [system] = route.split(":");
    connectors[system] ??= dryRunConnector(system);
  }
  return HandlerRegistry.fromConnectors(connectors, routes).register(
    "HardeningCoach",
    advisoryHandler("Review recovery codes and enable sign-in alerts.")
  );
}
