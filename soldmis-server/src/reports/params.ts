import { z } from "zod";
import {
  FILTER_NAMES,
  GROUP_BY_DIMENSIONS,
  type GroupByDimension,
} from "../column-config.js";
import { InvalidParameterError, MissingParameterError } from "../errors.js";
import type { FilterParams } from "../query/filter-clause.js";

/** Parsed query string as Express hands it over */
export type QueryParams = Record<string, unknown>;

export interface DateRange {
  from: string;
  to: string;
}

export const LIMIT_DEFAULT = 200;
export const LIMIT_MAX = 1000;
export const MIN_RECEIVABLE_DEFAULT = 1;

// ── Zod schemas ────────────────────────────────────────────────────────────

const LimitSchema = z
  .string()
  .regex(/^[-+]?\d+$/, `limit must be an integer between 1 and ${LIMIT_MAX}`)
  .transform((value) => Math.max(1, Math.min(Number(value), LIMIT_MAX)));

const MinReceivableSchema = z
  .string()
  .regex(/^[-+]?(\d+(\.\d*)?|\.\d+)$/, "min_receivable must be a number")
  .transform((value) => Number(value));

const TRUE_VALUES = ["true", "1", "yes"];
const FALSE_VALUES = ["false", "0", "no"];

const SoldOnlySchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
    message: "sold_only must be one of true, false, 1, 0, yes, no",
  })
  .transform((value) => TRUE_VALUES.includes(value));

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, string>, value: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidParameterError(parsed.error.issues.map((issue) => issue.message).join(", "));
  }
  return parsed.data;
}

// ── Accessors ──────────────────────────────────────────────────────────────

/** A single, non-empty string value; repeated parameters are rejected. */
export function optionalParam(query: QueryParams, name: string): string | undefined {
  const value = query[name];
  if (value === undefined || value === "") return undefined;
  if (typeof value !== "string") {
    throw new InvalidParameterError(`Query param ${name} must be given once`);
  }
  return value;
}

export function requireParam(query: QueryParams, name: string): string {
  const value = optionalParam(query, name);
  if (value === undefined) {
    throw new MissingParameterError(`Missing query param: ${name}`);
  }
  return value;
}

/** Presence only: the warehouse rejects malformed dates. */
export function parseDateRange(query: QueryParams): DateRange {
  const from = optionalParam(query, "from");
  const to = optionalParam(query, "to");
  if (!from || !to) {
    throw new MissingParameterError("Missing required query params: from, to (YYYY-MM-DD)");
  }
  return { from, to };
}

export function parseFilters(query: QueryParams): FilterParams {
  const filters: FilterParams = {};
  for (const name of FILTER_NAMES) {
    const value = optionalParam(query, name);
    if (value !== undefined) filters[name] = value;
  }
  return filters;
}

/** Integer, clamped to 1..1000; defaults to 200. */
export function parseLimit(query: QueryParams): number {
  const value = optionalParam(query, "limit");
  return value === undefined ? LIMIT_DEFAULT : parseWith(LimitSchema, value);
}

export function parseMinReceivable(query: QueryParams): number {
  const value = optionalParam(query, "min_receivable");
  return value === undefined ? MIN_RECEIVABLE_DEFAULT : parseWith(MinReceivableSchema, value);
}

/** Defaults to true */
export function parseSoldOnly(query: QueryParams): boolean {
  const value = optionalParam(query, "sold_only");
  return value === undefined ? true : parseWith(SoldOnlySchema, value);
}

/** Case-insensitive match against the fixed dimensions; returns the canonical spelling. */
export function parseGroupBy(query: QueryParams): GroupByDimension {
  const value = requireParam(query, "group_by");
  const match = GROUP_BY_DIMENSIONS.find((d) => d.toUpperCase() === value.toUpperCase());
  if (!match) {
    throw new InvalidParameterError(`Invalid group_by. Use one of ${GROUP_BY_DIMENSIONS.join(", ")}`);
  }
  return match;
}
