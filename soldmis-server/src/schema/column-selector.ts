import { SchemaMismatchError } from "../errors.js";
import type { TableRef } from "../warehouse/types.js";
import type { ColumnRef, SchemaResolver, TableSchema } from "./schema-resolver.js";

/** A logical field either backed by a physical column or absent from this table. */
export type FieldColumn =
  | { kind: "resolved"; field: string; column: ColumnRef }
  | { kind: "absent"; field: string };

/**
 * First candidate present in the schema, in candidate order (not schema
 * order). Matching is case-insensitive.
 */
export function pickColumn(schema: TableSchema, candidates: readonly string[]): ColumnRef | undefined {
  for (const candidate of candidates) {
    const column = schema.column(candidate);
    if (column) return column;
  }
  return undefined;
}

export async function selectColumn(
  resolver: SchemaResolver,
  table: TableRef,
  candidates: readonly string[]
): Promise<ColumnRef | undefined> {
  return pickColumn(await resolver.resolve(table), candidates);
}

export function resolveField(schema: TableSchema, field: string, candidates: readonly string[]): FieldColumn {
  const column = pickColumn(schema, candidates);
  return column ? { kind: "resolved", field, column } : { kind: "absent", field };
}

/** Like pickColumn, but a missing column fails the request with SchemaMismatch. */
export function requireColumn(schema: TableSchema, field: string, candidates: readonly string[]): ColumnRef {
  const column = pickColumn(schema, candidates);
  if (!column) {
    throw new SchemaMismatchError(
      `No column for ${field} in table ${schema.table.table} (tried: ${candidates.join(", ")})`
    );
  }
  return column;
}
