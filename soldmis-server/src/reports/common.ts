import { requireColumn, resolveField } from "../schema/column-selector.js";
import type { ColumnRef, TableSchema } from "../schema/schema-resolver.js";
import type { ColumnConfig, SalesField } from "../column-config.js";
import { numericExpr, type NumericExpr } from "../query/expressions.js";
import { sql, type ParameterizedQuery, type SqlFragment } from "../query/sql.js";
import type { FilterParams } from "../query/filter-clause.js";
import type { DateRange } from "./params.js";

/** A rendered report query plus what the response echoes about it */
export interface BuiltReportQuery {
  query: ParameterizedQuery;
  dateColumn: string;
  filters: FilterParams;
}

/**
 * Inclusive date range predicate. Both bounds are bound as `date`, so the
 * warehouse rejects a malformed date, and the column is compared by calendar
 * day whether it is stored as date, timestamp or text.
 */
export function dateRangePredicate(column: ColumnRef, range: DateRange): SqlFragment {
  return sql`CAST(${column} AS date) BETWEEN CAST(${range.from} AS date) AND CAST(${range.to} AS date)`;
}

export function resolveDateColumn(schema: TableSchema, candidates: readonly string[]): ColumnRef {
  return requireColumn(schema, "date", candidates);
}

/** Numeric reader for a sales field, zero when the table lacks it. */
export function salesNumeric(schema: TableSchema, columns: ColumnConfig, field: SalesField): NumericExpr {
  return numericExpr(resolveField(schema, field, columns.sales_fields[field]));
}
