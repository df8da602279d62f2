import { identifier, type Identifier, type ParameterizedQuery } from "../query/sql.js";

/** A physical table: `dataset` is the warehouse schema the table lives in. */
export interface TableRef {
  dataset: string;
  table: string;
}

export type Row = Record<string, unknown>;

/**
 * The read-only surface the reports need from the warehouse: parameterized
 * queries and catalog introspection.
 */
export interface Warehouse {
  query(query: ParameterizedQuery): Promise<Row[]>;
  /** Column names of one table, in catalog order; empty when the table does not exist. */
  listColumns(table: TableRef): Promise<string[]>;
}

export function tableIdentifier(ref: TableRef): Identifier {
  return identifier(ref.table, ref.dataset);
}

export function tableKey(ref: TableRef): string {
  return `${ref.dataset}.${ref.table}`;
}
