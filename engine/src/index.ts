import { Redis } from "ioredis";
import { config } from "./config.js";
import { createApp } from "./app.js";
import { CaseService } from "./caseService.js";
import { closePool, getPool } from "./db.js";
import { createDefaultRegistry, loadConnectorRoutes } from "./handlers/defaults.js";
import { InMemoryIdempotencyStore } from "./idempotency/memoryStore.js";
import { PostgresIdempotencyStore } from "./idempotency/postgresStore.js";
import { RedisIdempotencyStore } from "./idempotency/redisStore.js";
import type { IdempotencyStore } from "./idempotency/types.js";
import { denyTaskTypes } from "./policy/checker.js";
import { PolicyGate } from "./policy/policyGate.js";
import { FilePlaybookSource } from "./playbooks/source.js";
import { AnchorScheduler } from "./scheduler/anchorScheduler.js";

function createIdempotencyStore(): { store: IdempotencyStore; close: () => Promise<void> } {
  if (config.idempotencyBackend === "postgres") {
    return { store: new PostgresIdempotencyStore(getPool()), close: closePool };
  }
  if (config.idempotencyBackend === "redis") {
    const redis = new Redis(config.redisUrl);
    return {
      store: new RedisIdempotencyStore(redis),
      close: async () => {
        await redis.quit();
      }
    };
  }
  return { store: new InMemoryIdempotencyStore(), close: async () => undefined };
}

async function main(): Promise<void> {
  const routes = await loadConnectorRoutes(config.connectorRoutesFile);
  const idempotency = createIdempotencyStore();
  const handlers = createDefaultRegistry(routes);

  const service = new CaseService({
    playbooks: new FilePlaybookSource(config.playbookDir),
    handlers,
    idempotency: idempotency.store,
    ledgerDir: config.ledgerDir || null,
    policyGate: PolicyGate.withDefaults(),
    policyChecker: config.deniedTaskTypes.length > 0 ? denyTaskTypes(config.deniedTaskTypes) : null,
    maxConcurrency: config.maxConcurrency,
    connectorTimeoutMs: config.connectorTimeoutMs
  });

  const scheduler = new AnchorScheduler(service, config.anchorSchedule);
  scheduler.start();

  const app = createApp({ config, service });
  const server = app.listen(config.apiPort, () => {
    console.log(`playbook engine listening on port ${config.apiPort} (idempotency: ${config.idempotencyBackend})`);
    console.log(`handlers registered for: ${handlers.taskTypes.join(", ")}`);
  });

  const shutdown = async (): Promise<void> => {
    scheduler.stop();
    await service.anchorAll({ trigger: "shutdown" });
    await idempotency.close();
    server.close(() => {
      process.exit(0);
    });
  };

  process.on("SIGINT", () => {
    shutdown().catch((error) => {
      console.error("shutdown failed", error);
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown().catch((error) => {
      console.error("shutdown failed", error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
