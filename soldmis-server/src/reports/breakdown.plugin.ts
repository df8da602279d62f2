import type { ColumnConfig, GroupByDimension, SalesField } from "../column-config.js";
import { asText, numericOrZero } from "../query/expressions.js";
import { buildFilterClause, type FilterParams } from "../query/filter-clause.js";
import { buildQuery, output } from "../query/query-builder.js";
import { literal, sql } from "../query/sql.js";
import { requireColumn } from "../schema/column-selector.js";
import type { TableSchema } from "../schema/schema-resolver.js";
import { tableIdentifier } from "../warehouse/types.js";
import {
  dateRangePredicate,
  resolveDateColumn,
  salesNumeric,
  type BuiltReportQuery,
} from "./common.js";
import { parseDateRange, parseFilters, parseGroupBy, type DateRange } from "./params.js";
import { toFloat, toInt, toText } from "./rows.js";
import type { ReportPlugin } from "./types.js";

export const UNKNOWN_GROUP = "UNKNOWN";

export interface BreakdownRow {
  key: string;
  bookings: number;
  sale_value: number;
  gross_amount_received: number;
  pending_demand: number;
  receivables: number;
}

export interface BreakdownResponse {
  from: string;
  to: string;
  group_by: GroupByDimension;
  filters: FilterParams;
  date_col_used: string;
  group_col_used: string;
  rows: BreakdownRow[];
}

export function buildBreakdownQuery(
  schema: TableSchema,
  range: DateRange,
  groupBy: GroupByDimension,
  filters: FilterParams,
  columns: ColumnConfig
): BuiltReportQuery & { groupColumn: string } {
  const dateColumn = resolveDateColumn(schema, columns.date_columns.sales);
  const groupColumn = requireColumn(schema, `group_by=${groupBy}`, columns.group_by[groupBy]);
  const filterClause = buildFilterClause(schema, filters, columns.filters);

  const sum = (field: SalesField) => sql`SUM(${numericOrZero(salesNumeric(schema, columns, field))})`;

  const query = buildQuery({
    select: [
      { expr: sql`COALESCE(${asText(groupColumn)}, ${literal(UNKNOWN_GROUP)})`, alias: "key" },
      { expr: sql`COUNT(1)`, alias: "bookings" },
      { expr: sum("sale_value"), alias: "sale_value" },
      { expr: sum("gross_amount_received"), alias: "gross_amount_received" },
      { expr: sum("pending_demand"), alias: "pending_demand" },
      { expr: sum("receivables"), alias: "receivables" },
    ],
    from: { source: tableIdentifier(schema.table) },
    where: [dateRangePredicate(dateColumn, range), ...filterClause.predicates],
    groupBy: [asText(groupColumn)],
    orderBy: [
      { expr: output("bookings"), direction: "DESC" },
      { expr: output("key"), direction: "ASC" },
    ],
  });

  return {
    query,
    dateColumn: dateColumn.name,
    groupColumn: groupColumn.name,
    filters: filterClause.echo,
  };
}

export const breakdownReport: ReportPlugin<BreakdownResponse> = {
  definition: {
    name: "breakdown",
    path: "/soldmis/breakdown",
    description: "Bookings and amounts grouped by one categorical dimension, most bookings first.",
  },
  async handler(query, ctx): Promise<BreakdownResponse> {
    const range = parseDateRange(query);
    const groupBy = parseGroupBy(query);
    const filters = parseFilters(query);
    const schema = await ctx.schema.resolve(ctx.tables.sales);

    const built = buildBreakdownQuery(schema, range, groupBy, filters, ctx.columns);
    const rows = await ctx.warehouse.query(built.query);

    return {
      from: range.from,
      to: range.to,
      group_by: groupBy,
      filters: built.filters,
      date_col_used: built.dateColumn,
      group_col_used: built.groupColumn,
      rows: rows.map((r) => ({
        key: toText(r.key ?? UNKNOWN_GROUP),
        bookings: toInt(r.bookings),
        sale_value: toFloat(r.sale_value),
        gross_amount_received: toFloat(r.gross_amount_received),
        pending_demand: toFloat(r.pending_demand),
        receivables: toFloat(r.receivables),
      })),
    };
  },
};
