import { logger } from "../../../shared/observability/src/logger.js";
import { SchemaUnavailableError } from "../errors.js";
import { identifier, type Identifier } from "../query/sql.js";
import { tableKey, type TableRef, type Warehouse } from "../warehouse/types.js";

/** A column identifier that was found in the live schema of `table`. */
export interface ColumnRef extends Identifier {
  readonly table: string;
}

/**
 * Columns of one table as seen by the catalog. Lookups are
 * case-insensitive; the physical spelling is kept for quoting.
 */
export class TableSchema {
  private readonly byUpper: ReadonlyMap<string, string>;

  constructor(readonly table: TableRef, physicalNames: readonly string[]) {
    const byUpper = new Map<string, string>();
    for (const name of physicalNames) {
      const upper = name.toUpperCase();
      if (!byUpper.has(upper)) byUpper.set(upper, name);
    }
    this.byUpper = byUpper;
  }

  /** Upper-cased column names */
  get columns(): ReadonlySet<string> {
    return new Set(this.byUpper.keys());
  }

  has(name: string): boolean {
    return this.byUpper.has(name.toUpperCase());
  }

  column(name: string): ColumnRef | undefined {
    const physical = this.byUpper.get(name.toUpperCase());
    if (physical === undefined) return undefined;
    return { ...identifier(physical), table: this.table.table };
  }
}

/**
 * Process-wide cache of table schemas. One catalog query per table; entries
 * are never invalidated, so a warehouse schema change needs a restart.
 * Concurrent first lookups of the same table may both query the catalog.
 */
export class SchemaResolver {
  private readonly cache = new Map<string, TableSchema>();

  constructor(private readonly warehouse: Warehouse) {}

  async resolve(table: TableRef): Promise<TableSchema> {
    const key = tableKey(table);
    const cached = this.cache.get(key);
    if (cached) return cached;

    let names: string[];
    try {
      names = await this.warehouse.listColumns(table);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SchemaUnavailableError(`Schema lookup failed for ${key}: ${message}`, error);
    }

    if (names.length === 0) {
      throw new SchemaUnavailableError(`Table ${key} not found in warehouse catalog`);
    }

    const schema = new TableSchema(table, names);
    this.cache.set(key, schema);
    logger.info(`Schema cached for ${key}`, { columns: names.length });
    return schema;
  }
}
