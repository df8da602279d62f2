import "dotenv/config";
// ── OTel SDK must be imported before anything it instruments ──────────────
import { shutdownTracing } from "../../shared/observability/src/tracing.js";

import { configureRedis, disconnectRedis } from "../../shared/redis/src/index.js";
import { logInfo, logWarn, logError } from "../../shared/observability/src/index.js";
import { loadColumnConfig, type ColumnConfig } from "./column-config.js";
import { loadConfig } from "./config.js";
import { createPool, PgWarehouse } from "./db/pool.js";
import { findSoldStatusColumn } from "./reports/bookings.plugin.js";
import type { ReportContext } from "./reports/types.js";
import { SchemaResolver } from "./schema/schema-resolver.js";
import { createApp } from "./server.js";

const config = loadConfig();
const columns: ColumnConfig = loadColumnConfig(config.columnsPath, config.defaultDateColumn);
configureRedis(config.redisUrl);

const pool = createPool(config.db);
const warehouse = new PgWarehouse(pool, config.statementTimeout);

const ctx: ReportContext = {
  warehouse,
  schema: new SchemaResolver(warehouse),
  tables: config.tables,
  columns,
};

/**
 * Warm the sales schema and flag a missing sold-status column, since
 * `sold_only` defaults to true on /soldmis/bookings. A failure here is not
 * fatal: the schema is looked up again on the first request.
 */
async function preflight(): Promise<void> {
  try {
    const sales = await ctx.schema.resolve(config.tables.sales);
    if (!findSoldStatusColumn(sales, columns)) {
      logWarn("No sold-status column in sales table; sold_only=true will not filter bookings", {
        table: sales.table.table,
        candidates: columns.sold_status.columns.join(", "),
      });
    }
  } catch (err) {
    logError("Preflight schema lookup failed", err instanceof Error ? err : new Error(String(err)));
  }
}

async function main() {
  await preflight();

  const app = createApp({
    ctx,
    config,
    circuits: () => ({ warehouse: warehouse.getCircuitState() }),
  });

  app.listen(config.port, () => {
    logInfo("SoldMIS gateway running", {
      port: config.port,
      dataset: config.tables.sales.dataset,
      sales_table: config.tables.sales.table,
      payments_table: config.tables.payments.table,
      health_endpoint: `http://localhost:${config.port}/health`,
    });
  });
}

// Graceful shutdown; telemetry is flushed last so the close-down is exported too
async function shutdown(): Promise<void> {
  await disconnectRedis();
  await pool.end();
  await shutdownTracing();
  process.exit(0);
}

process.on("SIGINT", () => {
  shutdown().catch((err) => {
    logError("Shutdown failed", err instanceof Error ? err : new Error(String(err)));
    process.exit(1);
  });
});
process.on("SIGTERM", () => {
  shutdown().catch((err) => {
    logError("Shutdown failed", err instanceof Error ? err : new Error(String(err)));
    process.exit(1);
  });
});

main().catch((err) => {
  logError("Startup error", err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
