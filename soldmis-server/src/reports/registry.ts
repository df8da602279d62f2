import { Router, type NextFunction, type Request, type Response } from "express";
import { logger } from "../../../shared/observability/src/logger.js";
import { withReportSpan } from "../../../shared/observability/src/index.js";
import { RedisCache } from "../../../shared/redis/src/index.js";
import { bookingsReport } from "./bookings.plugin.js";
import { breakdownReport } from "./breakdown.plugin.js";
import type { QueryParams } from "./params.js";
import { paymentsReport } from "./payments.plugin.js";
import { receivablesReport } from "./receivables.plugin.js";
import { summaryReport } from "./summary.plugin.js";
import type { ReportContext, ReportDefinition, ReportPlugin } from "./types.js";
import { unitReport } from "./unit.plugin.js";

// ── Plugin registry ─────────────────────────────────────────────────────────

export const reportPlugins: readonly ReportPlugin[] = [
  summaryReport,
  breakdownReport,
  unitReport,
  paymentsReport,
  receivablesReport,
  bookingsReport,
];

export function getReportDefinitions(): ReportDefinition[] {
  return reportPlugins.map((p) => p.definition);
}

// ── Response cache ─────────────────────────────────────────────────────────

/** Endpoint name plus the query string with keys sorted, so parameter order does not matter. */
export function reportCacheKey(name: string, query: QueryParams): string {
  const parts = Object.keys(query)
    .sort()
    .map((key) => `${key}=${JSON.stringify(query[key])}`);
  return `${name}?${parts.join("&")}`;
}

/**
 * Run one report, consulting the response cache first when one is given.
 * Errors propagate unchanged to the HTTP boundary.
 */
export async function runReport(
  plugin: ReportPlugin,
  query: QueryParams,
  ctx: ReportContext,
  cache?: RedisCache<object>
): Promise<object> {
  const { name } = plugin.definition;
  return withReportSpan({ reportName: name, query }, async (span) => {
    const key = reportCacheKey(name, query);
    if (cache) {
      const hit = await cache.get(key);
      span.setAttribute("report.cache_hit", hit !== null);
      if (hit !== null) return hit;
    }

    const body = await plugin.handler(query, ctx);
    if (cache) await cache.set(key, body);
    return body;
  });
}

/** Mount every report plugin as a GET route. */
export function createReportRouter(ctx: ReportContext, cacheTtlSeconds: number): Router {
  const router = Router();
  const cache = cacheTtlSeconds > 0 ? new RedisCache<object>("report", cacheTtlSeconds) : undefined;

  for (const plugin of reportPlugins) {
    router.get(plugin.definition.path, async (req: Request, res: Response, next: NextFunction) => {
      try {
        res.json(await runReport(plugin, req.query, ctx, cache));
      } catch (err) {
        next(err);
      }
    });
  }

  logger.info(`Registered ${reportPlugins.length} report route(s)`, {
    reports: reportPlugins.map((p) => p.definition.name).join(", "),
    cache_ttl_seconds: cacheTtlSeconds,
  });
  return router;
}
