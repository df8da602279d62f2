/**
 * OpenTelemetry bootstrap. Import it before anything it instruments
 * (express, http, pg) so the patches are in place when those load.
 *
 * Traces and logs go to the collector over OTLP/gRPC. OTEL_SDK_DISABLED=true
 * skips the SDK entirely; the logger then writes JSON lines only.
 *
 * No signal handlers are installed here: the entrypoint owns shutdown and
 * awaits {@link shutdownTracing} before the process exits.
 */

import { diag, DiagConsoleLogger, DiagLogLevel } from "@opentelemetry/api";
import { logs } from "@opentelemetry/api-logs";
import type { NodeSDK } from "@opentelemetry/sdk-node";
import type { LoggerProvider } from "@opentelemetry/sdk-logs";

export interface TracingSettings {
  enabled: boolean;
  serviceName: string;
  collectorUrl: string;
  diagLevel: DiagLogLevel;
}

const DIAG_LEVELS = new Map<string, DiagLogLevel>([
  ["debug", DiagLogLevel.DEBUG],
  ["info", DiagLogLevel.INFO],
  ["error", DiagLogLevel.ERROR],
]);

export function tracingSettings(env: NodeJS.ProcessEnv = process.env): TracingSettings {
  const disabled = env.OTEL_SDK_DISABLED === "true" || env.OTEL_SDK_DISABLED === "1";
  return {
    enabled: !disabled,
    serviceName: env.OTEL_SERVICE_NAME || "soldmis-gateway",
    collectorUrl: env.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4317",
    // WARN unless asked otherwise; a missing collector would flood the logs
    diagLevel: DIAG_LEVELS.get(env.OTEL_LOG_LEVEL ?? "") ?? DiagLogLevel.WARN,
  };
}

interface TracingHandles {
  sdk: NodeSDK;
  loggerProvider: LoggerProvider;
}

async function startTracing(settings: TracingSettings): Promise<TracingHandles> {
  // Loaded on demand so a disabled SDK never pulls in the gRPC exporters
  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-grpc");
  const { OTLPLogExporter } = await import("@opentelemetry/exporter-logs-otlp-grpc");
  const { Resource } = await import("@opentelemetry/resources");
  const { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } = await import("@opentelemetry/semantic-conventions");
  const { getNodeAutoInstrumentations } = await import("@opentelemetry/auto-instrumentations-node");
  const { BatchLogRecordProcessor, LoggerProvider } = await import("@opentelemetry/sdk-logs");

  const resource = new Resource({
    [ATTR_SERVICE_NAME]: settings.serviceName,
    [ATTR_SERVICE_VERSION]: process.env.npm_package_version || "1.0.0",
    "deployment.environment": process.env.NODE_ENV || "development",
    "service.namespace": "soldmis",
  });

  const loggerProvider = new LoggerProvider({ resource });
  loggerProvider.addLogRecordProcessor(
    new BatchLogRecordProcessor(new OTLPLogExporter({ url: settings.collectorUrl }))
  );
  logs.setGlobalLoggerProvider(loggerProvider);

  const sdk = new NodeSDK({
    resource,
    traceExporter: new OTLPTraceExporter({ url: settings.collectorUrl }),
    instrumentations: getNodeAutoInstrumentations({
      "@opentelemetry/instrumentation-http": {
        headersToSpanAttributes: { server: { requestHeaders: ["x-correlation-id"] } },
      },
      // Report SQL text only; bound parameters carry caller input
      "@opentelemetry/instrumentation-pg": { enhancedDatabaseReporting: false },
      "@opentelemetry/instrumentation-fs": { enabled: false },
    }),
  });
  sdk.start();

  diag.info(`[OTel] ${settings.serviceName} exporting to ${settings.collectorUrl}`);
  return { sdk, loggerProvider };
}

const settings = tracingSettings();
diag.setLogger(new DiagConsoleLogger(), settings.diagLevel);

const handles: TracingHandles | null = settings.enabled ? await startTracing(settings) : null;

/**
 * Flush batched spans and log records, then stop the SDK. Safe to call when
 * the SDK is disabled. Export failures are reported, not thrown, so shutdown
 * carries on when the collector is already gone.
 */
export async function shutdownTracing(): Promise<void> {
  if (!handles) return;
  const results = await Promise.allSettled([handles.sdk.shutdown(), handles.loggerProvider.shutdown()]);
  for (const result of results) {
    if (result.status === "rejected") {
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      diag.error(`[OTel] shutdown failed: ${reason}`);
    }
  }
}
