import type { ColumnConfig, SalesField } from "../column-config.js";
import { asText, numericExpr, numericOrZero, textOrEmpty } from "../query/expressions.js";
import { buildFilterClause, type FilterParams } from "../query/filter-clause.js";
import { buildQuery, output } from "../query/query-builder.js";
import { sql } from "../query/sql.js";
import { requireColumn, resolveField } from "../schema/column-selector.js";
import type { TableSchema } from "../schema/schema-resolver.js";
import { tableIdentifier } from "../warehouse/types.js";
import { dateRangePredicate, resolveDateColumn, salesNumeric, type BuiltReportQuery } from "./common.js";
import {
  parseDateRange,
  parseFilters,
  parseLimit,
  parseMinReceivable,
  type DateRange,
} from "./params.js";
import { toFloat, toText } from "./rows.js";
import type { ReportPlugin } from "./types.js";

export const PAGE_LOCAL_TOTAL_NOTE =
  "total_receivables_in_list sums the returned rows only (after limit), not every unit above min_receivable.";

export interface ReceivableRow {
  unit_no: string;
  customer_name: string;
  cluster: string;
  unit_type: string;
  source: string;
  sale_agreement_status: string;
  receivables: number;
  pending_demand: number;
  gross_amount_received: number;
}

export interface ReceivablesResponse {
  from: string;
  to: string;
  filters: FilterParams;
  date_col_used: string;
  min_receivable: number;
  limit: number;
  total_receivables_in_list: number;
  rows: ReceivableRow[];
  notes: string;
}

export interface ReceivablesOptions {
  minReceivable: number;
  limit: number;
}

const TEXT_FIELDS = ["customer_name", "cluster", "unit_type", "source", "sale_agreement_status"] as const satisfies readonly SalesField[];

export function buildReceivablesQuery(
  schema: TableSchema,
  range: DateRange,
  filters: FilterParams,
  options: ReceivablesOptions,
  columns: ColumnConfig
): BuiltReportQuery {
  const dateColumn = resolveDateColumn(schema, columns.date_columns.sales);
  const unitColumn = requireColumn(schema, "unit_no", columns.sales_fields.unit_no);
  const receivablesColumn = requireColumn(schema, "receivables", columns.sales_fields.receivables);
  const filterClause = buildFilterClause(schema, filters, columns.filters);

  const receivables = numericOrZero(
    numericExpr({ kind: "resolved", field: "receivables", column: receivablesColumn })
  );

  const query = buildQuery({
    select: [
      { expr: asText(unitColumn), alias: "unit_no" },
      ...TEXT_FIELDS.map((field) => ({
        expr: textOrEmpty(resolveField(schema, field, columns.sales_fields[field])),
        alias: field,
      })),
      { expr: receivables, alias: "receivables" },
      { expr: numericOrZero(salesNumeric(schema, columns, "pending_demand")), alias: "pending_demand" },
      {
        expr: numericOrZero(salesNumeric(schema, columns, "gross_amount_received")),
        alias: "gross_amount_received",
      },
    ],
    from: { source: tableIdentifier(schema.table) },
    where: [
      dateRangePredicate(dateColumn, range),
      sql`${receivables} >= ${options.minReceivable}`,
      ...filterClause.predicates,
    ],
    orderBy: [{ expr: output("receivables"), direction: "DESC" }],
    limit: options.limit,
  });

  return { query, dateColumn: dateColumn.name, filters: filterClause.echo };
}

export const receivablesReport: ReportPlugin<ReceivablesResponse> = {
  definition: {
    name: "receivables",
    path: "/soldmis/receivables",
    description: "Units with receivables at or above a threshold, largest first, with the total of the returned page.",
  },
  async handler(query, ctx): Promise<ReceivablesResponse> {
    const range = parseDateRange(query);
    const filters = parseFilters(query);
    const options: ReceivablesOptions = {
      minReceivable: parseMinReceivable(query),
      limit: parseLimit(query),
    };
    const schema = await ctx.schema.resolve(ctx.tables.sales);

    const built = buildReceivablesQuery(schema, range, filters, options, ctx.columns);
    const rows: ReceivableRow[] = (await ctx.warehouse.query(built.query)).map((r) => ({
      unit_no: toText(r.unit_no),
      customer_name: toText(r.customer_name),
      cluster: toText(r.cluster),
      unit_type: toText(r.unit_type),
      source: toText(r.source),
      sale_agreement_status: toText(r.sale_agreement_status),
      receivables: toFloat(r.receivables),
      pending_demand: toFloat(r.pending_demand),
      gross_amount_received: toFloat(r.gross_amount_received),
    }));

    return {
      from: range.from,
      to: range.to,
      filters: built.filters,
      date_col_used: built.dateColumn,
      min_receivable: options.minReceivable,
      limit: options.limit,
      total_receivables_in_list: rows.reduce((total, row) => total + row.receivables, 0),
      rows,
      notes: PAGE_LOCAL_TOTAL_NOTE,
    };
  },
};
