import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { timingSafeEqual } from "node:crypto";
import { ZodError, z } from "zod";

import type { UpdaterRuntimeConfig } from "./config.js";
import { UpdaterError, toErrorMessage } from "./errors.js";
import { summarizeComparisons, type RegistryUpdateOrchestrator } from "./orchestrator.js";

export interface RouteRequest {
  body?: unknown;
}

export interface RouteResponse {
  status(code: number): RouteResponse;
  json(payload: unknown): unknown;
}

export type RouteHandler = (request: RouteRequest, response: RouteResponse) => Promise<void>;

export interface UpdateRouteHandlers {
  health: RouteHandler;
  status: RouteHandler;
  apply: RouteHandler;
}

type UpdateOperations = Pick<RegistryUpdateOrchestrator, "checkAll" | "updateAll" | "updateOne">;

const applyUpdateSchema = z
  .object({
    service: z.string().trim().min(1).max(120).optional(),
    dryRun: z.boolean().optional()
  })
  .strict();

function extractBearerToken(value: string | undefined): string {
  if (!value) {
    return "";
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return "";
  }

  const match = trimmed.match(/^bearer\s+(.+)$/i);
  if (match?.[1]) {
    return match[1].trim();
  }

  return trimmed;
}

function constantTimeEquals(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left);
  const rightBuffer = Buffer.from(right);
  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }

  return timingSafeEqual(leftBuffer, rightBuffer);
}

export function isAuthorized(headers: Record<string, string | string[] | undefined>, authToken: string): boolean {
  const expected = authToken.trim();
  if (expected.length === 0) {
    return false;
  }

  const authorization = headers.authorization;
  const bearer = extractBearerToken(typeof authorization === "string" ? authorization : undefined);
  const rawApiToken = headers["x-api-token"];
  const xApiToken = typeof rawApiToken === "string" ? rawApiToken.trim() : "";
  const candidate = bearer || xApiToken;

  return candidate.length > 0 && constantTimeEquals(candidate, expected);
}

function createAuthMiddleware(authToken: string) {
  return (request: Request, response: Response, next: NextFunction) => {
    if (request.path === "/health") {
      next();
      return;
    }

    if (!isAuthorized(request.headers, authToken)) {
      response.status(401).json({ error: "Unauthorized" });
      return;
    }

    next();
  };
}

function createCorsMiddleware(config: UpdaterRuntimeConfig) {
  return cors({
    origin: (origin, callback) => {
      if (!origin || config.allowAnyCorsOrigin || config.corsOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      callback(null, false);
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "x-api-token"],
    credentials: false,
    maxAge: 600
  });
}

function sendUpdateError(error: unknown, response: RouteResponse): void {
  if (error instanceof UpdaterError) {
    const statusCode = error.code === "unknown_service" ? 404 : error.code === "updater_busy" ? 409 : 500;
    response.status(statusCode).json({ error: error.message, code: error.code });
    return;
  }

  if (error instanceof ZodError) {
    response.status(400).json({
      error: "Validation failed",
      details: error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message
      }))
    });
    return;
  }

  console.error("[updater-api-error]", error);
  response.status(500).json({ error: toErrorMessage(error) });
}

export function createUpdateRouteHandlers(orchestrator: UpdateOperations): UpdateRouteHandlers {
  let busy = false;

  return {
    health: async (_request, response) => {
      response.json({
        ok: true,
        now: new Date().toISOString()
      });
    },

    status: async (_request, response) => {
      try {
        const comparisons = await orchestrator.checkAll();
        response.json({
          comparisons,
          summary: summarizeComparisons(comparisons)
        });
      } catch (error) {
        sendUpdateError(error, response);
      }
    },

    apply: async (request, response) => {
      try {
        const input = applyUpdateSchema.parse(request.body ?? {});
        if (busy) {
          throw new UpdaterError("updater_busy", "Updater is busy with another operation.");
        }

        busy = true;
        try {
          const dryRun = input.dryRun ?? false;
          if (input.service) {
            response.json({ result: await orchestrator.updateOne(input.service, dryRun) });
          } else {
            response.json(await orchestrator.updateAll(dryRun));
          }
        } finally {
          busy = false;
        }
      } catch (error) {
        sendUpdateError(error, response);
      }
    }
  };
}

export function createUpdaterApp(config: UpdaterRuntimeConfig, orchestrator: UpdateOperations): express.Express {
  const app = express();
  const handlers = createUpdateRouteHandlers(orchestrator);

  app.disable("x-powered-by");
  app.use(createCorsMiddleware(config));
  app.use(express.json({ limit: "64kb" }));
  app.use(createAuthMiddleware(config.authToken));

  app.get("/health", handlers.health);
  app.get("/api/updates/status", handlers.status);
  app.post("/api/updates/apply", handlers.apply);

  app.use((_request, response) => {
    response.status(404).json({ error: "Not found" });
  });

  app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      response.status(400).json({ error: "Request body is not valid JSON." });
      return;
    }
    sendUpdateError(error, response);
  });

  return app;
}
