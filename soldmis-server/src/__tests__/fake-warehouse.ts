import { fileURLToPath } from "node:url";
import { loadColumnConfig, type ColumnConfig } from "../column-config.js";
import type { ParameterizedQuery } from "../query/sql.js";
import type { ReportContext } from "../reports/types.js";
import { SchemaResolver } from "../schema/schema-resolver.js";
import type { Row, TableRef, Warehouse } from "../warehouse/types.js";

export const COLUMNS_PATH = fileURLToPath(
  new URL("../../../database/schema/soldmis_columns.yml", import.meta.url)
);

export const TABLES = {
  sales: { dataset: "public", table: "sales" },
  payments: { dataset: "public", table: "payments" },
} satisfies ReportContext["tables"];

export const SALES_COLUMNS = [
  "BOOKING_DATE",
  "UNIT_NO",
  "CUSTOMER_NAME",
  "Cluster",
  "UNIT_TYPE",
  "SOURCE",
  "SALE_AGREEMENT_STATUS",
  "SALE_AGREEMENT",
  "GROSS_SOLD_SALE_VALUE",
  "PER_SFT_PRICE",
  "GROSS_AMOUNT_RECEIVED",
  "PENDING_DEMAND",
  "RECEIVABLES",
  "APPROVED_PRICE_INVENTORY_VALUE",
  "SOLD_UNSOLD_ID",
];

export const PAYMENTS_COLUMNS = ["DATE", "UNIT_NO", "PAYMENT_1", "PAYMENT_2", "PAYMENT_3"];

/**
 * In-process stand-in for the warehouse. Catalog lookups answer from a
 * fixed table → columns map; queries are recorded and answered by `respond`.
 */
export class FakeWarehouse implements Warehouse {
  readonly queries: ParameterizedQuery[] = [];
  readonly catalogLookups: TableRef[] = [];
  respond: (query: ParameterizedQuery) => Row[] = () => [];
  catalogError: Error | null = null;

  constructor(private readonly tables: Record<string, string[]>) {}

  async query(query: ParameterizedQuery): Promise<Row[]> {
    this.queries.push(query);
    return this.respond(query);
  }

  async listColumns(table: TableRef): Promise<string[]> {
    this.catalogLookups.push(table);
    if (this.catalogError) throw this.catalogError;
    return this.tables[table.table] ?? [];
  }

  get lastQuery(): ParameterizedQuery {
    const last = this.queries[this.queries.length - 1];
    if (!last) throw new Error("no query was issued");
    return last;
  }
}

export function loadTestColumns(): ColumnConfig {
  return loadColumnConfig(COLUMNS_PATH, "DATE");
}

export function createTestContext(
  tables: Record<string, string[]> = { sales: SALES_COLUMNS, payments: PAYMENTS_COLUMNS }
): { warehouse: FakeWarehouse; ctx: ReportContext } {
  const warehouse = new FakeWarehouse(tables);
  return {
    warehouse,
    ctx: {
      warehouse,
      schema: new SchemaResolver(warehouse),
      tables: TABLES,
      columns: loadTestColumns(),
    },
  };
}
