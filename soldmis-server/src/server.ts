import { timingSafeEqual } from "crypto";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { CircuitState } from "../../shared/circuit-breaker/src/index.js";
import {
  requestLoggingMiddleware,
  errorLoggingMiddleware,
  logWarn,
} from "../../shared/observability/src/index.js";
import type { GatewayConfig } from "./config.js";
import { ReportError, UnauthorizedError, toErrorResponse } from "./errors.js";
import { createReportRouter, getReportDefinitions } from "./reports/registry.js";
import type { ReportContext } from "./reports/types.js";

export const SERVICE_NAME = "soldmis-gateway";

export interface AppDependencies {
  ctx: ReportContext;
  config: Pick<GatewayConfig, "apiKey" | "rateLimitPerMinute" | "reportCacheTtlSeconds">;
  /** Circuit breaker states reported by /health */
  circuits: () => Record<string, CircuitState>;
}

// ── Bearer token gate ──────────────────────────────────────────────────────

/** Byte-for-byte, constant-time comparison of the presented token. */
export function tokenMatches(presented: string, expected: string): boolean {
  const a = Buffer.from(presented, "utf8");
  const b = Buffer.from(expected, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}

/** An empty API key disables the gate entirely. */
function bearerAuth(apiKey: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }
    const header = req.headers.authorization ?? "";
    const token = header.startsWith("Bearer ") ? header.slice(7) : "";
    if (!tokenMatches(token, apiKey)) {
      next(new UnauthorizedError());
      return;
    }
    next();
  };
}

// ── Express app ────────────────────────────────────────────────────────────

export function createApp(deps: AppDependencies): Express {
  const { ctx, config } = deps;

  if (!config.apiKey) {
    logWarn("API_KEY is empty: /soldmis/* endpoints are unauthenticated");
  }

  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(requestLoggingMiddleware());

  // ── Public routes ──

  const routeList = [
    "/health [GET]",
    "/routes [GET]",
    ...getReportDefinitions().map((d) => `${d.path} [GET]`),
  ].sort();

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      service: SERVICE_NAME,
      ts: new Date().toISOString(),
      circuits: deps.circuits(),
    });
  });

  app.get("/routes", (_req: Request, res: Response) => {
    res.json({ routes: routeList });
  });

  // ── Reports ──

  app.use(
    "/soldmis/",
    rateLimit({
      windowMs: 60 * 1000,
      limit: config.rateLimitPerMinute,
      standardHeaders: "draft-7",
      legacyHeaders: false,
      message: { error: "Too many requests, please try again later", code: "RateLimited" },
    })
  );
  app.use("/soldmis/", bearerAuth(config.apiKey));
  app.use(createReportRouter(ctx, config.reportCacheTtlSeconds));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found", code: "NotFound" });
  });

  // Taxonomy errors answer directly; anything else is logged first
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (!(err instanceof ReportError)) {
      next(err);
      return;
    }
    const { status, body } = toErrorResponse(err);
    res.status(status).json(body);
  });
  app.use(errorLoggingMiddleware());
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(err);
    res.status(status).json(body);
  });

  return app;
}
