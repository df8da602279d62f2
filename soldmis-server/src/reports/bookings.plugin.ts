import type { ColumnConfig } from "../column-config.js";
import { asText, numericOrZero, textOrEmpty, upperText } from "../query/expressions.js";
import { buildFilterClause, type FilterParams } from "../query/filter-clause.js";
import {
  buildQuery,
  output,
  type CommonTableExpression,
  type JoinClause,
  type SelectItem,
} from "../query/query-builder.js";
import { identifier, sql, type SqlFragment } from "../query/sql.js";
import { pickColumn, requireColumn, resolveField } from "../schema/column-selector.js";
import type { ColumnRef, TableSchema } from "../schema/schema-resolver.js";
import { tableIdentifier } from "../warehouse/types.js";
import { dateRangePredicate, resolveDateColumn, salesNumeric, type BuiltReportQuery } from "./common.js";
import { paymentExpressions, rowPaymentTotal } from "./payments.plugin.js";
import { parseDateRange, parseFilters, parseLimit, parseSoldOnly, type DateRange } from "./params.js";
import { toFloat, toText } from "./rows.js";
import type { ReportPlugin } from "./types.js";

const SALES_ROWS = "sales_rows";
const PAYMENTS_AGG = "payments_agg";

export interface BookingRow {
  cluster: string;
  unit_no: string;
  customer_name: string;
  source: string;
  approved_price: number;
  gross_price: number;
  payments_received_in_period: number;
  discount: number;
}

export interface BookingsResponse {
  from: string;
  to: string;
  filters: FilterParams & { sold_only: boolean };
  date_col_used: string;
  sold_status_col_used: string | null;
  payments_joined: boolean;
  count: number;
  rows: BookingRow[];
}

export interface BookingsOptions {
  soldOnly: boolean;
  limit: number;
}

export interface BuiltBookingsQuery extends BuiltReportQuery {
  soldStatusColumn: string | null;
  paymentsJoined: boolean;
}

/** The sold-status column the bookings list filters on, if the table has one. */
export function findSoldStatusColumn(schema: TableSchema, columns: ColumnConfig): ColumnRef | undefined {
  return pickColumn(schema, columns.sold_status.columns);
}

/**
 * Per-unit payments received in the period, keyed by the upper-cased unit
 * number. Undefined when the payments table cannot be joined: no unit
 * column, no date column or no payment columns.
 */
function paymentsAggregate(
  payments: TableSchema,
  range: DateRange,
  columns: ColumnConfig
): CommonTableExpression | undefined {
  const unitColumn = pickColumn(payments, columns.payments_fields.unit_no);
  const dateColumn = pickColumn(payments, columns.date_columns.payments);
  const amounts = paymentExpressions(payments, columns);
  if (!unitColumn || !dateColumn || amounts.every((a) => a.kind === "zero")) return undefined;

  return {
    name: PAYMENTS_AGG,
    query: {
      select: [
        { expr: upperText(unitColumn), alias: "unit_key" },
        { expr: sql`SUM(${rowPaymentTotal(amounts)})`, alias: "payments_received_in_period" },
      ],
      from: { source: tableIdentifier(payments.table) },
      where: [dateRangePredicate(dateColumn, range)],
      groupBy: [upperText(unitColumn)],
    },
  };
}

export function buildBookingsQuery(
  sales: TableSchema,
  payments: TableSchema,
  range: DateRange,
  filters: FilterParams,
  options: BookingsOptions,
  columns: ColumnConfig
): BuiltBookingsQuery {
  const dateColumn = resolveDateColumn(sales, columns.date_columns.sales);
  const unitColumn = requireColumn(sales, "unit_no", columns.sales_fields.unit_no);
  const filterClause = buildFilterClause(sales, filters, columns.filters);
  const soldStatusColumn = findSoldStatusColumn(sales, columns);

  const salesWhere: SqlFragment[] = [dateRangePredicate(dateColumn, range)];
  if (options.soldOnly && soldStatusColumn) {
    salesWhere.push(sql`${upperText(soldStatusColumn)} = UPPER(${columns.sold_status.sold_value})`);
  }
  salesWhere.push(...filterClause.predicates);

  const text = (field: "cluster" | "customer_name" | "source") =>
    textOrEmpty(resolveField(sales, field, columns.sales_fields[field]));

  const salesRows: CommonTableExpression = {
    name: SALES_ROWS,
    query: {
      select: [
        { expr: text("cluster"), alias: "cluster" },
        { expr: asText(unitColumn), alias: "unit_no" },
        { expr: text("customer_name"), alias: "customer_name" },
        { expr: text("source"), alias: "source" },
        { expr: numericOrZero(salesNumeric(sales, columns, "approved_price")), alias: "approved_price" },
        { expr: numericOrZero(salesNumeric(sales, columns, "gross_price")), alias: "gross_price" },
      ],
      from: { source: tableIdentifier(sales.table) },
      where: salesWhere,
    },
  };

  const paymentsAgg = paymentsAggregate(payments, range, columns);
  const joins: JoinClause[] = paymentsAgg
    ? [
        {
          type: "LEFT",
          source: identifier(PAYMENTS_AGG),
          alias: "p",
          on: sql`UPPER(${output("unit_no", "s")}) = ${output("unit_key", "p")}`,
        },
      ]
    : [];

  const passThrough = ["cluster", "unit_no", "customer_name", "source", "approved_price", "gross_price"];
  const select: SelectItem[] = [
    ...passThrough.map((name) => ({ expr: output(name, "s"), alias: name })),
    {
      expr: paymentsAgg ? sql`COALESCE(${output("payments_received_in_period", "p")}, 0)` : sql`0`,
      alias: "payments_received_in_period",
    },
    { expr: sql`(${output("gross_price", "s")} - ${output("approved_price", "s")})`, alias: "discount" },
  ];

  const query = buildQuery({
    with: paymentsAgg ? [salesRows, paymentsAgg] : [salesRows],
    select,
    from: { source: identifier(SALES_ROWS), alias: "s" },
    joins,
    orderBy: [
      { expr: output("approved_price"), direction: "DESC" },
      { expr: output("unit_no"), direction: "ASC" },
    ],
    limit: options.limit,
  });

  return {
    query,
    dateColumn: dateColumn.name,
    filters: filterClause.echo,
    soldStatusColumn: soldStatusColumn ? soldStatusColumn.name : null,
    paymentsJoined: paymentsAgg !== undefined,
  };
}

export const bookingsReport: ReportPlugin<BookingsResponse> = {
  definition: {
    name: "bookings",
    path: "/soldmis/bookings",
    description: "Bookings in a date range with approved and gross price, discount and payments received in the period.",
  },
  async handler(query, ctx): Promise<BookingsResponse> {
    const range = parseDateRange(query);
    const filters = parseFilters(query);
    const options: BookingsOptions = {
      soldOnly: parseSoldOnly(query),
      limit: parseLimit(query),
    };
    const [sales, payments] = await Promise.all([
      ctx.schema.resolve(ctx.tables.sales),
      ctx.schema.resolve(ctx.tables.payments),
    ]);

    const built = buildBookingsQuery(sales, payments, range, filters, options, ctx.columns);
    const rows: BookingRow[] = (await ctx.warehouse.query(built.query)).map((r) => ({
      cluster: toText(r.cluster),
      unit_no: toText(r.unit_no),
      customer_name: toText(r.customer_name),
      source: toText(r.source),
      approved_price: toFloat(r.approved_price),
      gross_price: toFloat(r.gross_price),
      payments_received_in_period: toFloat(r.payments_received_in_period),
      discount: toFloat(r.discount),
    }));

    return {
      from: range.from,
      to: range.to,
      filters: { ...built.filters, sold_only: options.soldOnly },
      date_col_used: built.dateColumn,
      sold_status_col_used: built.soldStatusColumn,
      payments_joined: built.paymentsJoined,
      count: rows.length,
      rows,
    };
  },
};
