import { logs, SeverityNumber } from "@opentelemetry/api-logs";

export type LogAttributes = Record<string, string | number | boolean | undefined>;

type Level = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<Level | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SEVERITY: Record<Level, SeverityNumber> = {
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
};

function isLevelName(value: string): value is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function thresholdFromEnv(): number {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLevelName(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

function cleanAttributes(attributes?: LogAttributes): Record<string, string | number | boolean> {
  const out: Record<string, string | number | boolean> = {};
  if (!attributes) return out;
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Structured logger. Every record goes to the OTel logs API (a no-op until
 * tracing.ts registers a provider) and to stdout/stderr as one JSON line.
 */
class Logger {
  private readonly otel = logs.getLogger(process.env.OTEL_SERVICE_NAME || "soldmis-gateway");

  debug(message: string, attributes?: LogAttributes): void {
    this.write("debug", message, attributes);
  }

  info(message: string, attributes?: LogAttributes): void {
    this.write("info", message, attributes);
  }

  warn(message: string, attributes?: LogAttributes): void {
    this.write("warn", message, attributes);
  }

  error(message: string, attributes?: LogAttributes): void {
    this.write("error", message, attributes);
  }

  private write(level: Level, message: string, attributes?: LogAttributes): void {
    if (LEVEL_ORDER[level] < thresholdFromEnv()) return;

    const attrs = cleanAttributes(attributes);
    this.otel.emit({
      severityNumber: SEVERITY[level],
      severityText: level.toUpperCase(),
      body: message,
      attributes: attrs,
    });

    const line = JSON.stringify({ ts: new Date().toISOString(), level, message, ...attrs });
    if (level === "error" || level === "warn") {
      process.stderr.write(line + "\n");
    } else {
      process.stdout.write(line + "\n");
    }
  }
}

export const logger = new Logger();

export function logInfo(message: string, attributes?: LogAttributes): void {
  logger.info(message, attributes);
}

export function logWarn(message: string, attributes?: LogAttributes): void {
  logger.warn(message, attributes);
}

export function logError(message: string, error?: Error, attributes?: LogAttributes): void {
  logger.error(message, {
    ...attributes,
    error: error?.message,
    error_name: error?.name,
    stack: error?.stack,
  });
}
