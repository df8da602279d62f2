import type { ColumnConfig } from "../column-config.js";
import type { GatewayConfig } from "../config.js";
import type { SchemaResolver } from "../schema/schema-resolver.js";
import type { Warehouse } from "../warehouse/types.js";
import type { QueryParams } from "./params.js";

/** What every report handler gets injected with. */
export interface ReportContext {
  warehouse: Warehouse;
  schema: SchemaResolver;
  tables: GatewayConfig["tables"];
  columns: ColumnConfig;
}

export interface ReportDefinition {
  /** Short name used for logs, spans and cache keys */
  name: string;
  /** Route path, e.g. /soldmis/summary */
  path: string;
  description: string;
}

/**
 * A self-contained report: its route definition plus the handler that
 * validates the query string, builds and runs one query and shapes the JSON.
 */
export interface ReportPlugin<T extends object = object> {
  definition: ReportDefinition;
  handler(query: QueryParams, ctx: ReportContext): Promise<T>;
}
