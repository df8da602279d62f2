import { paymentColumnNames, type ColumnConfig } from "../column-config.js";
import { asText, numericExpr, numericOrZero, type NumericExpr } from "../query/expressions.js";
import { buildFilterClause, type FilterParams } from "../query/filter-clause.js";
import { buildQuery } from "../query/query-builder.js";
import { joinSql, sql, type SqlFragment } from "../query/sql.js";
import { requireColumn, resolveField } from "../schema/column-selector.js";
import type { TableSchema } from "../schema/schema-resolver.js";
import { tableIdentifier } from "../warehouse/types.js";
import { dateRangePredicate, resolveDateColumn, type BuiltReportQuery } from "./common.js";
import { parseDateRange, parseFilters, type DateRange } from "./params.js";
import { firstRow, toFloat, toInt } from "./rows.js";
import type { ReportPlugin } from "./types.js";

export interface PaymentIndexTotal {
  payment_index: number;
  total: number;
}

export interface PaymentsResponse {
  from: string;
  to: string;
  filters: FilterParams;
  date_col_used: string;
  totals: {
    payments_total: number;
    units_with_payments: number;
  };
  by_payment_index: PaymentIndexTotal[];
}

/** Numeric readers for PAYMENT_1..PAYMENT_n, absent columns reading as zero. */
export function paymentExpressions(schema: TableSchema, columns: ColumnConfig): NumericExpr[] {
  return paymentColumnNames(columns).map((name) => numericExpr(resolveField(schema, name, [name])));
}

/**
 * Sum of all present payment columns of one row. Zero when the table has
 * none of them.
 */
export function rowPaymentTotal(payments: readonly NumericExpr[], qualifier?: string): SqlFragment {
  const present = payments.filter((p) => p.kind === "safe-cast");
  if (present.length === 0) return sql`0`;
  return joinSql(present.map((p) => numericOrZero(p, qualifier)), " + ");
}

function indexAlias(index: number): string {
  return `payment_${index}`;
}

export function buildPaymentsQuery(
  schema: TableSchema,
  range: DateRange,
  filters: FilterParams,
  columns: ColumnConfig
): BuiltReportQuery {
  const dateColumn = resolveDateColumn(schema, columns.date_columns.payments);
  const unitColumn = requireColumn(schema, "unit_no", columns.payments_fields.unit_no);
  const filterClause = buildFilterClause(schema, filters, columns.filters);
  const payments = paymentExpressions(schema, columns);

  const present = payments.filter((p) => p.kind === "safe-cast");
  const anyPositive = joinSql(present.map((p) => sql`${numericOrZero(p)} > 0`), " OR ");
  const unitsWithPayments =
    present.length === 0
      ? sql`0`
      : sql`COUNT(DISTINCT CASE WHEN ${anyPositive} THEN ${asText(unitColumn)} END)`;

  const query = buildQuery({
    select: [
      { expr: sql`SUM(${rowPaymentTotal(payments)})`, alias: "payments_total" },
      { expr: unitsWithPayments, alias: "units_with_payments" },
      ...payments.map((p, i) => ({ expr: sql`SUM(${numericOrZero(p)})`, alias: indexAlias(i + 1) })),
    ],
    from: { source: tableIdentifier(schema.table) },
    where: [dateRangePredicate(dateColumn, range), ...filterClause.predicates],
  });

  return { query, dateColumn: dateColumn.name, filters: filterClause.echo };
}

export const paymentsReport: ReportPlugin<PaymentsResponse> = {
  definition: {
    name: "payments",
    path: "/soldmis/payments",
    description: "Payments received in a date range, in total and per payment index, with the count of paying units.",
  },
  async handler(query, ctx): Promise<PaymentsResponse> {
    const range = parseDateRange(query);
    const filters = parseFilters(query);
    const schema = await ctx.schema.resolve(ctx.tables.payments);

    const built = buildPaymentsQuery(schema, range, filters, ctx.columns);
    const row = firstRow(await ctx.warehouse.query(built.query));

    return {
      from: range.from,
      to: range.to,
      filters: built.filters,
      date_col_used: built.dateColumn,
      totals: {
        payments_total: toFloat(row.payments_total),
        units_with_payments: toInt(row.units_with_payments),
      },
      by_payment_index: paymentColumnNames(ctx.columns).map((_, i) => ({
        payment_index: i + 1,
        total: toFloat(row[indexAlias(i + 1)]),
      })),
    };
  },
};
