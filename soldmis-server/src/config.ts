import { resolve } from "path";
import { z } from "zod";
import type { TableRef } from "./warehouse/types.js";

// ── Environment schema ─────────────────────────────────────────────────────

const EnvSchema = z.object({
  DB_HOST: z.string().default("localhost"),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USER: z.string().default("soldmis_reader"),
  DB_NAME: z.string().default("soldmis"),
  DB_PASSWORD: z.string().default(""),
  DB_SSL: z.enum(["true", "false"]).optional(),

  WAREHOUSE_DATASET: z.string().min(1, "WAREHOUSE_DATASET cannot be empty").default("public"),
  WAREHOUSE_STATEMENT_TIMEOUT: z
    .string()
    .regex(/^\d+(ms|s|min)?$/, "WAREHOUSE_STATEMENT_TIMEOUT must look like 30s, 500ms or 2min")
    .default("30s"),
  SALES_TABLE: z.string().min(1, "SALES_TABLE cannot be empty").default("sales"),
  PAYMENTS_TABLE: z.string().min(1, "PAYMENTS_TABLE cannot be empty").default("payments"),
  DATE_COL: z.string().min(1).default("DATE"),

  API_KEY: z.string().default(""),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120),

  REPORT_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(0),
  REDIS_URL: z.string().optional(),

  SOLDMIS_COLUMNS_PATH: z.string().optional(),
});

export interface GatewayConfig {
  db: {
    host: string;
    port: number;
    user: string;
    database: string;
    password: string;
    ssl: boolean;
  };
  statementTimeout: string;
  tables: {
    sales: TableRef;
    payments: TableRef;
  };
  /** Appended to every date-column candidate list */
  defaultDateColumn: string;
  /** Empty string disables the bearer-token gate */
  apiKey: string;
  port: number;
  rateLimitPerMinute: number;
  /** 0 disables the report response cache */
  reportCacheTtlSeconds: number;
  redisUrl?: string;
  columnsPath: string;
}

export const DEFAULT_COLUMNS_PATH = resolve(process.cwd(), "database/schema/soldmis_columns.yml");

/**
 * Validate the environment and build the gateway config.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    db: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      database: e.DB_NAME,
      password: e.DB_PASSWORD,
      ssl: e.DB_SSL === undefined ? e.DB_HOST !== "localhost" : e.DB_SSL === "true",
    },
    statementTimeout: e.WAREHOUSE_STATEMENT_TIMEOUT,
    tables: {
      sales: { dataset: e.WAREHOUSE_DATASET, table: e.SALES_TABLE },
      payments: { dataset: e.WAREHOUSE_DATASET, table: e.PAYMENTS_TABLE },
    },
    defaultDateColumn: e.DATE_COL,
    apiKey: e.API_KEY,
    port: e.PORT,
    rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
    reportCacheTtlSeconds: e.REPORT_CACHE_TTL_SECONDS,
    redisUrl: e.REDIS_URL || undefined,
    columnsPath: e.SOLDMIS_COLUMNS_PATH || DEFAULT_COLUMNS_PATH,
  };
}
