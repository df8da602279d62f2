import { buildFilterClause, type FilterParams } from "../query/filter-clause.js";
import { numericOrZero, numericValue } from "../query/expressions.js";
import { buildQuery } from "../query/query-builder.js";
import { sql } from "../query/sql.js";
import type { TableSchema } from "../schema/schema-resolver.js";
import type { ColumnConfig, SalesField } from "../column-config.js";
import { tableIdentifier } from "../warehouse/types.js";
import { dateRangePredicate, resolveDateColumn, salesNumeric, type BuiltReportQuery } from "./common.js";
import { parseDateRange, parseFilters, type DateRange } from "./params.js";
import { firstRow, toFloat, toInt } from "./rows.js";
import type { ReportPlugin } from "./types.js";

export interface SummaryTotals {
  bookings: number;
  gross_sale_value: number;
  sale_value: number;
  gross_amount_received: number;
  pending_demand: number;
  receivables: number;
  avg_per_sft_price: number;
}

export interface SummaryResponse {
  from: string;
  to: string;
  filters: FilterParams;
  date_col_used: string;
  totals: SummaryTotals;
}

export function buildSummaryQuery(
  schema: TableSchema,
  range: DateRange,
  filters: FilterParams,
  columns: ColumnConfig
): BuiltReportQuery {
  const dateColumn = resolveDateColumn(schema, columns.date_columns.sales);
  const filterClause = buildFilterClause(schema, filters, columns.filters);

  const sum = (field: SalesField) =>
    sql`SUM(${numericOrZero(salesNumeric(schema, columns, field))})`;

  const query = buildQuery({
    select: [
      { expr: sql`COUNT(1)`, alias: "bookings" },
      { expr: sum("gross_sale_value"), alias: "gross_sale_value" },
      { expr: sum("sale_value"), alias: "sale_value" },
      { expr: sum("gross_amount_received"), alias: "gross_amount_received" },
      { expr: sum("pending_demand"), alias: "pending_demand" },
      { expr: sum("receivables"), alias: "receivables" },
      // AVG skips rows whose price is blank or unparseable
      { expr: sql`AVG(${numericValue(salesNumeric(schema, columns, "per_sft_price"))})`, alias: "avg_per_sft_price" },
    ],
    from: { source: tableIdentifier(schema.table) },
    where: [dateRangePredicate(dateColumn, range), ...filterClause.predicates],
  });

  return { query, dateColumn: dateColumn.name, filters: filterClause.echo };
}

export const summaryReport: ReportPlugin<SummaryResponse> = {
  definition: {
    name: "summary",
    path: "/soldmis/summary",
    description: "Booking count and summed sale, gross, received, pending and receivable amounts for a date range.",
  },
  async handler(query, ctx): Promise<SummaryResponse> {
    const range = parseDateRange(query);
    const filters = parseFilters(query);
    const schema = await ctx.schema.resolve(ctx.tables.sales);

    const built = buildSummaryQuery(schema, range, filters, ctx.columns);
    const row = firstRow(await ctx.warehouse.query(built.query));

    return {
      from: range.from,
      to: range.to,
      filters: built.filters,
      date_col_used: built.dateColumn,
      totals: {
        bookings: toInt(row.bookings),
        gross_sale_value: toFloat(row.gross_sale_value),
        sale_value: toFloat(row.sale_value),
        gross_amount_received: toFloat(row.gross_amount_received),
        pending_demand: toFloat(row.pending_demand),
        receivables: toFloat(row.receivables),
        avg_per_sft_price: toFloat(row.avg_per_sft_price),
      },
    };
  },
};
