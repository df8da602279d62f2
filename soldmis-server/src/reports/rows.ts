import type { Row } from "../warehouse/types.js";

// pg returns NUMERIC and COUNT(*) (bigint) as strings; everything numeric
// goes through here so responses only ever carry finite numbers.

export function toFloat(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

export function toInt(value: unknown): number {
  return Math.trunc(toFloat(value));
}

export function toText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/** The single row of an aggregate query; an empty result reads as all-null. */
export function firstRow(rows: Row[]): Row {
  return rows[0] ?? {};
}
