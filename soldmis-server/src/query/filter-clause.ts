import { logger } from "../../../shared/observability/src/logger.js";
import { FILTER_NAMES, type ColumnConfig, type FilterName } from "../column-config.js";
import { pickColumn } from "../schema/column-selector.js";
import type { TableSchema } from "../schema/schema-resolver.js";
import { upperText } from "./expressions.js";
import { sql, type SqlFragment } from "./sql.js";

export type FilterParams = Partial<Record<FilterName, string>>;

export interface FilterClause {
  /** One equality predicate per applied filter; callers AND them into WHERE */
  predicates: SqlFragment[];
  /** Every requested filter, applied or not */
  echo: FilterParams;
  /** Requested filters with no backing column in this table */
  ignored: FilterName[];
}

/**
 * Build case-insensitive equality predicates for the requested filters.
 * A filter is applied only when one of its candidate columns exists; it is
 * echoed either way so callers can spot filters the table could not honour.
 */
export function buildFilterClause(
  schema: TableSchema,
  filters: FilterParams,
  candidates: ColumnConfig["filters"]
): FilterClause {
  const predicates: SqlFragment[] = [];
  const echo: FilterParams = {};
  const ignored: FilterName[] = [];

  for (const name of FILTER_NAMES) {
    const value = filters[name];
    if (!value) continue;

    echo[name] = value;
    const column = pickColumn(schema, candidates[name]);
    if (column) {
      predicates.push(sql`${upperText(column)} = UPPER(${value})`);
    } else {
      ignored.push(name);
    }
  }

  if (ignored.length > 0) {
    logger.debug(`Filters without a backing column in ${schema.table.table}`, {
      ignored: ignored.join(", "),
    });
  }

  return { predicates, echo, ignored };
}
