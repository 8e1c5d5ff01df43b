import cors from "cors";
import express from "express";
import type { AppConfig } from "./config.js";
import { createApiRouter } from "./api/routes.js";
import { createAuthMiddleware } from "./auth/middleware.js";
import type { CaseService } from "./caseService.js";
import { metricsSnapshot } from "./metrics/metrics.js";

export function createApp(deps: { config: Pick<AppConfig, "maxBodyBytes" | "tokenMap">; service: CaseService }) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: deps.config.maxBodyBytes }));
  app.get("/api/health", (_request, response) => {
    response.status(200).json({ ok: true });
  });
  app.get("/api/metrics", async (_request, response) => {
    response.setHeader("Content-Type", "text/plain");
    response.send(await metricsSnapshot());
  });
  app.use(createAuthMiddleware(deps.config.tokenMap));
  app.use("/api", createApiRouter({ service: deps.service }));
  return app;
}
