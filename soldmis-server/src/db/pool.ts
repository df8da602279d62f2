import pg from "pg";
import { logger } from "../../../shared/observability/src/logger.js";
import {
  CircuitBreaker,
  CircuitOpenError,
  type CircuitState,
} from "../../../shared/circuit-breaker/src/index.js";
import type { GatewayConfig } from "../config.js";
import { UpstreamQueryError } from "../errors.js";
import type { ParameterizedQuery } from "../query/sql.js";
import type { Row, TableRef, Warehouse } from "../warehouse/types.js";

const { Pool, DatabaseError } = pg;

// ── Database pool ──────────────────────────────────────────────────────────

export function createPool(config: GatewayConfig["db"]): pg.Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    database: config.database,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
  });

  logger.info("Initializing PG pool", {
    host: config.host,
    port: config.port,
    user: config.user,
    database: config.database,
  });

  pool.on("error", (err) => {
    logger.error("PG pool: unexpected error on idle client", {
      error: err.message,
    });
  });

  return pool;
}

/**
 * SQLSTATE class 22 (data exception) and 42 (syntax / undefined object) come
 * from what the request asked for, e.g. a malformed `from` date. The
 * warehouse is healthy in that case, so the breaker ignores them.
 */
function isWarehouseFailure(error: unknown): boolean {
  if (error instanceof DatabaseError && typeof error.code === "string") {
    return !error.code.startsWith("22") && !error.code.startsWith("42");
  }
  return true;
}

const CATALOG_SQL = `
  SELECT column_name
  FROM information_schema.columns
  WHERE table_schema = $1 AND table_name = $2
  ORDER BY ordinal_position
`;

/** The slice of `pg.PoolClient` a read-only transaction uses */
export interface TransactionClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[] }>;
  release(err?: Error | boolean): void;
}

/**
 * Run one statement in a read-only transaction and release the client.
 * When ROLLBACK itself fails the connection is unusable: the client is
 * released with that error so the pool discards it, and the statement's
 * own error is the one thrown.
 */
export async function runReadOnlyTransaction(
  client: TransactionClient,
  sql: string,
  params: unknown[],
  statementTimeout: string
): Promise<Row[]> {
  let releaseError: Error | undefined;
  try {
    await client.query("BEGIN TRANSACTION READ ONLY");
    await client.query(`SET LOCAL statement_timeout = '${statementTimeout}'`);
    const result = await client.query(sql, params);
    await client.query("COMMIT");
    return result.rows;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      logger.warn("ROLLBACK failed; discarding connection", { error: releaseError.message });
    }
    throw error;
  } finally {
    client.release(releaseError);
  }
}

// ── Warehouse over pg ──────────────────────────────────────────────────────

export class PgWarehouse implements Warehouse {
  private readonly breaker = new CircuitBreaker({
    name: "warehouse",
    failureThreshold: 5,
    resetTimeoutMs: 30_000,
    isFailure: isWarehouseFailure,
  });

  constructor(
    private readonly pool: pg.Pool,
    private readonly statementTimeout: string
  ) {}

  /** Current circuit breaker state, for the health endpoint */
  getCircuitState(): CircuitState {
    return this.breaker.getState();
  }

  async query(query: ParameterizedQuery): Promise<Row[]> {
    return this.executeReadOnlyQuery(query.sql, query.params);
  }

  async listColumns(table: TableRef): Promise<string[]> {
    const rows = await this.executeReadOnlyQuery(CATALOG_SQL, [table.dataset, table.table]);
    return rows
      .map((row) => row.column_name)
      .filter((name): name is string => typeof name === "string");
  }

  private async executeReadOnlyQuery(sql: string, params: unknown[]): Promise<Row[]> {
    try {
      return await this.breaker.execute(async () => {
        const client = await this.pool.connect();
        return runReadOnlyTransaction(client, sql, params, this.statementTimeout);
      });
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        throw new UpstreamQueryError("Warehouse temporarily unavailable", error, 503);
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error("Warehouse query failed", { error: message });
      throw new UpstreamQueryError(`Warehouse query failed: ${message}`, error);
    }
  }
}
