import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from "express";
import { trace, SpanStatusCode, type Span } from "@opentelemetry/api";
import { v4 as uuidv4 } from "uuid";
import { logInfo, logError } from "./logger.js";

const CORRELATION_HEADER = "x-correlation-id";

// ── Request logging ────────────────────────────────────────────────────────

/**
 * Logs one line per finished request and propagates (or assigns) the
 * correlation id on the response.
 */
export function requestLoggingMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    const header = req.headers[CORRELATION_HEADER];
    const correlationId = typeof header === "string" && header ? header : uuidv4();
    res.setHeader(CORRELATION_HEADER, correlationId);

    res.on("finish", () => {
      logInfo(`${req.method} ${req.path} ${res.statusCode}`, {
        correlation_id: correlationId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - started,
      });
    });

    next();
  };
}

/** Logs errors that reach the end of the Express chain, then delegates. */
export function errorLoggingMiddleware(): ErrorRequestHandler {
  return (err: unknown, req: Request, _res: Response, next: NextFunction) => {
    logError(
      `Unhandled error on ${req.method} ${req.path}`,
      err instanceof Error ? err : new Error(String(err))
    );
    next(err);
  };
}

// ── Spans ──────────────────────────────────────────────────────────────────

const tracer = trace.getTracer("soldmis-gateway");

export interface ReportSpanInput {
  reportName: string;
  query: Record<string, unknown>;
}

/** Run a report inside a span named after it; records failures on the span. */
export async function withReportSpan<T>(
  input: ReportSpanInput,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return tracer.startActiveSpan(`report ${input.reportName}`, async (span) => {
    span.setAttribute("report.name", input.reportName);
    span.setAttribute("report.params", Object.keys(input.query).sort().join(","));
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      throw err;
    } finally {
      span.end();
    }
  });
}
