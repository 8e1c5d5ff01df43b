import { Router, type Response } from "express";
import {
  CompileError,
  PlaybookValidationError,
  isJsonObject,
  parsePlaybookDocument,
  type JsonObject,
  type TaskStatus
} from "@incident/shared";
import type { CaseService, OpenCaseInput } from "../caseService.js";
import {
  CaseExistsError,
  CaseNotFoundError,
  NotAwaitingApprovalError,
  PlaybookNotFoundError,
  TaskNotFoundError,
  errorMessage
} from "../errors.js";
import { appEvents } from "../events.js";
import { requireRole, type AuthenticatedRequest } from "../auth/middleware.js";

const TASK_STATUSES: TaskStatus[] = [
  "pending",
  "waiting_approval",
  "approved",
  "running",
  "completed",
  "failed",
  "skipped",
  "blocked"
];

function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

function sendError(response: Response, error: unknown): void {
  const message = errorMessage(error);
  if (error instanceof CaseNotFoundError || error instanceof TaskNotFoundError || error instanceof PlaybookNotFoundError) {
    response.status(404).json({ error: message });
    return;
  }
  if (error instanceof CaseExistsError || error instanceof NotAwaitingApprovalError) {
    response.status(409).json({ error: message });
    return;
  }
  if (error instanceof PlaybookValidationError) {
    response.status(400).json({ error: "playbook is invalid", details: error.errors });
    return;
  }
  if (error instanceof CompileError) {
    response.status(400).json({ error: message });
    return;
  }
  console.error("request failed", error);
  response.status(500).json({ error: message });
}

/** Returns the parsed input, or the message for a 400. An invalid inline playbook throws. */
function parseOpenCaseBody(body: unknown): OpenCaseInput | string {
  if (!isJsonObject(body)) return "body must be a JSON object.";
  const { caseId, playbookId, playbook, title, description, context, autoApprove } = body;

  const input: OpenCaseInput = {};
  if (caseId !== undefined) {
    if (typeof caseId !== "string" || caseId.trim().length === 0) return "caseId must be a non-empty string.";
    input.caseId = caseId.trim();
  }
  if (title !== undefined) {
    if (typeof title !== "string") return "title must be a string.";
    input.title = title;
  }
  if (description !== undefined) {
    if (typeof description !== "string") return "description must be a string.";
    input.description = description;
  }
  if (context !== undefined) {
    if (!isJsonObject(context)) return "context must be an object.";
    input.context = context;
  }
  if (autoApprove !== undefined) {
    if (typeof autoApprove !== "boolean") return "autoApprove must be a boolean.";
    input.autoApprove = autoApprove;
  }

  if (playbook !== undefined) {
    input.playbook = parsePlaybookDocument(playbook);
  } else if (typeof playbookId === "string" && playbookId.trim().length > 0) {
    input.playbookId = playbookId.trim();
  } else {
    return "playbookId or playbook is required.";
  }
  return input;
}

export function createApiRouter(deps: { service: CaseService }): Router {
  const router = Router();
  const { service } = deps;

  router.post("/cases", requireRole(["admin", "operator"]), async (request, response) => {
    try {
      const input = parseOpenCaseBody(request.body);
      if (typeof input === "string") {
        response.status(400).json({ error: input });
        return;
      }
      const result = await service.openCase(input);
      response.status(201).json({ case: result });
    } catch (error) {
      sendError(response, error);
    }
  });

  router.get("/cases", requireRole(["admin", "operator", "viewer"]), (_request, response) => {
    response.status(200).json({ cases: service.listCases() });
  });

  router.get("/cases/:caseId", requireRole(["admin", "operator", "viewer"]), (request, response) => {
    try {
      response.status(200).json({ case: service.getCase(String(request.params.caseId ?? "")) });
    } catch (error) {
      sendError(response, error);
    }
  });

  router.get("/cases/:caseId/tasks", requireRole(["admin", "operator", "viewer"]), (request, response) => {
    try {
      const status = request.query.status;
      if (status !== undefined && !isTaskStatus(status)) {
        response.status(400).json({ error: `Invalid status filter. Expected one of: ${TASK_STATUSES.join(", ")}.` });
        return;
      }
      const tasks = service.listTasks(String(request.params.caseId ?? ""), status);
      response.status(200).json({ tasks });
    } catch (error) {
      sendError(response, error);
    }
  });

  router.post(
    "/cases/:caseId/tasks/:taskName/approve",
    requireRole(["admin", "operator"]),
    async (request: AuthenticatedRequest, response) => {
      try {
        const approver = request.principal?.name ?? "unknown";
        const result = await service.approveTask(
          String(request.params.caseId ?? ""),
          String(request.params.taskName ?? ""),
          approver
        );
        response.status(200).json(result);
      } catch (error) {
        sendError(response, error);
      }
    }
  );

  router.get("/cases/:caseId/ledger", requireRole(["admin", "operator", "viewer"]), (request, response) => {
    try {
      const ledger = service.ledgerFor(String(request.params.caseId ?? ""));
      const rawLimit = request.query.limit;
      let limit: number | undefined;
      if (rawLimit !== undefined) {
        limit = typeof rawLimit === "string" ? Number.parseInt(rawLimit, 10) : Number.NaN;
        if (!Number.isFinite(limit) || limit < 0) {
          response.status(400).json({ error: "limit must be a non-negative integer." });
          return;
        }
      }
      response.status(200).json({
        entries: ledger.entries(limit),
        latestHash: ledger.latestHash(),
        size: ledger.size
      });
    } catch (error) {
      sendError(response, error);
    }
  });

  router.get("/cases/:caseId/ledger/verify", requireRole(["admin", "operator", "viewer"]), async (request, response) => {
    try {
      const ledger = service.ledgerFor(String(request.params.caseId ?? ""));
      const valid = await ledger.verifyChain();
      response.status(200).json({ valid, entryCount: ledger.size, latestHash: ledger.latestHash() });
    } catch (error) {
      sendError(response, error);
    }
  });

  router.get("/cases/:caseId/ledger/anchors", requireRole(["admin", "operator", "viewer"]), (request, response) => {
    try {
      response.status(200).json({ anchors: service.ledgerFor(String(request.params.caseId ?? "")).anchors() });
    } catch (error) {
      sendError(response, error);
    }
  });

  router.post("/cases/:caseId/ledger/anchors", requireRole(["admin"]), async (request, response) => {
    try {
      const body: unknown = request.body;
      let anchorData: JsonObject = { trigger: "manual" };
      if (isJsonObject(body) && body.anchorData !== undefined) {
        if (!isJsonObject(body.anchorData)) {
          response.status(400).json({ error: "anchorData must be an object." });
          return;
        }
        anchorData = body.anchorData;
      }
      const anchor = await service.anchorCase(String(request.params.caseId ?? ""), anchorData);
      response.status(201).json({ anchor });
    } catch (error) {
      sendError(response, error);
    }
  });

  router.get("/events", requireRole(["admin", "operator", "viewer"]), (request, response) => {
    response.setHeader("Content-Type", "text/event-stream");
    response.setHeader("Cache-Control", "no-cache");
    response.setHeader("Connection", "keep-alive");
    response.flushHeaders();

    const send = (event: unknown) => {
      response.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    const listener = (event: unknown) => send(event);
    appEvents.on("event", listener);
    const ping = setInterval(() => {
      response.write(":keepalive\n\n");
    }, 15_000);

    request.on("close", () => {
      clearInterval(ping);
      appEvents.off("event", listener);
      response.end();
    });
  });

  return router;
}
