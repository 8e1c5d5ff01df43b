import type { NextFunction, Request, Response } from "express";
import type { Role } from "@incident/shared";
import type { Principal } from "../config.js";

export interface AuthenticatedRequest extends Request {
  principal?: Principal;
}

export function createAuthMiddleware(tokenMap: Map<string, Principal>) {
  return (request: AuthenticatedRequest, response: Response, next: NextFunction): void => {
    const header = request.header("authorization");
    const headerToken = header?.startsWith("Bearer ") ? header.replace("Bearer ", "").trim() : "";
    // EventSource clients pass the token as a query parameter.
    const queryToken = typeof request.query.token === "string" ? request.query.token.trim() : "";
    const token = headerToken || queryToken;

    if (!token) {
      response.status(401).json({ error: "Missing bearer token." });
      return;
    }
    const principal = tokenMap.get(token);
    if (!principal) {
      response.status(403).json({ error: "Invalid token." });
      return;
    }
    request.principal = principal;
    next();
  };
}

export function requireRole(roles: Role[]) {
  return (request: AuthenticatedRequest, response: Response, next: NextFunction): void => {
    if (!request.principal || !roles.includes(request.principal.role)) {
      response.status(403).json({ error: "Insufficient permissions." });
      return;
    }
    next();
  };
}
