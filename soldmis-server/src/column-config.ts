import { readFileSync, existsSync } from "fs";
import yaml from "js-yaml";
import { z } from "zod";
import { logger } from "../../shared/observability/src/logger.js";

// ── Fixed enumerations ─────────────────────────────────────────────────────

export const FILTER_NAMES = [
  "cluster",
  "source",
  "unit_type",
  "sale_agreement_status",
  "loan_status",
  "unit_no",
] as const;

export type FilterName = (typeof FILTER_NAMES)[number];

export const GROUP_BY_DIMENSIONS = [
  "Cluster",
  "UNIT_TYPE",
  "SOURCE",
  "SALE_AGREEMENT_STATUS",
  "LOAN_STATUS",
] as const;

export type GroupByDimension = (typeof GROUP_BY_DIMENSIONS)[number];

// ── YAML schema ────────────────────────────────────────────────────────────

const Candidates = z.array(z.string().min(1)).min(1, "candidate list cannot be empty");

const ColumnConfigSchema = z.object({
  date_columns: z.object({
    sales: Candidates,
    payments: Candidates,
  }),
  sales_fields: z.object({
    unit_no: Candidates,
    customer_name: Candidates,
    cluster: Candidates,
    unit_type: Candidates,
    source: Candidates,
    sale_agreement_status: Candidates,
    sale_value: Candidates,
    gross_sale_value: Candidates,
    per_sft_price: Candidates,
    gross_amount_received: Candidates,
    pending_demand: Candidates,
    receivables: Candidates,
    approved_price: Candidates,
    gross_price: Candidates,
  }),
  payments_fields: z.object({
    unit_no: Candidates,
  }),
  filters: z.object({
    cluster: Candidates,
    source: Candidates,
    unit_type: Candidates,
    sale_agreement_status: Candidates,
    loan_status: Candidates,
    unit_no: Candidates,
  }),
  group_by: z.object({
    Cluster: Candidates,
    UNIT_TYPE: Candidates,
    SOURCE: Candidates,
    SALE_AGREEMENT_STATUS: Candidates,
    LOAN_STATUS: Candidates,
  }),
  payment_columns: z.object({
    prefix: z.string().min(1),
    count: z.number().int().min(1).max(100),
  }),
  sold_status: z.object({
    columns: Candidates,
    sold_value: z.string().min(1),
  }),
});

export type ColumnConfig = z.infer<typeof ColumnConfigSchema>;
export type SalesField = keyof ColumnConfig["sales_fields"];

function withDefault(candidates: string[], fallback: string): string[] {
  const present = candidates.some((c) => c.toUpperCase() === fallback.toUpperCase());
  return present ? candidates : [...candidates, fallback];
}

/** Validate an already-parsed document and append the default date column. */
export function parseColumnConfig(doc: unknown, defaultDateColumn: string): ColumnConfig {
  const parsed = ColumnConfigSchema.safeParse(doc);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid column config: ${details}`);
  }
  const config = parsed.data;
  return {
    ...config,
    date_columns: {
      sales: withDefault(config.date_columns.sales, defaultDateColumn),
      payments: withDefault(config.date_columns.payments, defaultDateColumn),
    },
  };
}

/**
 * Load the candidate column lists from YAML. Read once at startup; edits
 * need a restart, same as warehouse schema changes.
 */
export function loadColumnConfig(configPath: string, defaultDateColumn: string): ColumnConfig {
  if (!existsSync(configPath)) {
    throw new Error(`Column config file not found at: ${configPath}`);
  }

  let doc: unknown;
  try {
    doc = yaml.load(readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new Error(`Failed to parse column config: ${error instanceof Error ? error.message : String(error)}`);
  }

  const config = parseColumnConfig(doc, defaultDateColumn);
  logger.info(`Column config loaded: ${configPath}`, {
    group_by: Object.keys(config.group_by).join(", "),
    payment_columns: config.payment_columns.count,
  });
  return config;
}

/** Physical names of the indexed payment columns, PAYMENT_1 first. */
export function paymentColumnNames(config: ColumnConfig): string[] {
  const { prefix, count } = config.payment_columns;
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`);
}
