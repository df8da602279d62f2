import type { FieldColumn } from "../schema/column-selector.js";
import { literal, qualify, sql, type Identifier, type SqlFragment } from "./sql.js";

// Plain decimal or scientific notation, optional sign. Blank strings do not match.
const NUMERIC_TEXT_PATTERN = "^[-+]?([0-9]+(\\.[0-9]*)?|\\.[0-9]+)([eE][-+]?[0-9]{1,4})?$";

/**
 * How a logical numeric field is read. Stored values are inconsistently
 * typed (numbers, numeric strings, blank strings), so a present column is
 * always read through text and only cast when the text is numeric.
 */
export type NumericExpr =
  | { kind: "zero"; field: string }
  | { kind: "safe-cast"; field: string; column: Identifier };

export function numericExpr(field: FieldColumn): NumericExpr {
  return field.kind === "resolved"
    ? { kind: "safe-cast", field: field.field, column: field.column }
    : { kind: "zero", field: field.field };
}

function ref(column: Identifier, qualifier?: string): Identifier {
  return qualifier === undefined ? column : qualify(column, qualifier);
}

/** Text form of a column: `CAST(col AS text)` */
export function asText(column: Identifier, qualifier?: string): SqlFragment {
  return sql`CAST(${ref(column, qualifier)} AS text)`;
}

/** `UPPER(CAST(col AS text))`, the left side of every case-insensitive match */
export function upperText(column: Identifier, qualifier?: string): SqlFragment {
  return sql`UPPER(${asText(column, qualifier)})`;
}

/** Numeric value or NULL when blank, unparseable or NULL. Absent fields read as 0. */
export function numericValue(expr: NumericExpr, qualifier?: string): SqlFragment {
  if (expr.kind === "zero") return sql`0`;
  const trimmed = sql`btrim(${asText(expr.column, qualifier)})`;
  return sql`CASE WHEN ${trimmed} ~ ${literal(NUMERIC_TEXT_PATTERN)} THEN CAST(${trimmed} AS numeric) END`;
}

/** Numeric value with NULL replaced by 0 */
export function numericOrZero(expr: NumericExpr, qualifier?: string): SqlFragment {
  if (expr.kind === "zero") return sql`0`;
  return sql`COALESCE(${numericValue(expr, qualifier)}, 0)`;
}

/** Text value with NULL (or an absent column) replaced by '' */
export function textOrEmpty(field: FieldColumn, qualifier?: string): SqlFragment {
  if (field.kind === "absent") return literal("");
  return sql`COALESCE(${asText(field.column, qualifier)}, ${literal("")})`;
}
