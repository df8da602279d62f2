import type { ColumnConfig } from "../column-config.js";
import { NotFoundError } from "../errors.js";
import { upperText } from "../query/expressions.js";
import { buildQuery } from "../query/query-builder.js";
import { sql, type ParameterizedQuery } from "../query/sql.js";
import { requireColumn } from "../schema/column-selector.js";
import type { TableSchema } from "../schema/schema-resolver.js";
import { tableIdentifier, type Row } from "../warehouse/types.js";
import { requireParam } from "./params.js";
import type { ReportPlugin } from "./types.js";

export interface UnitResponse {
  unit_no: string;
  record: Row;
}

/** Exact, case-insensitive match on the unit identifier; first record only. */
export function buildUnitQuery(schema: TableSchema, unitNo: string, columns: ColumnConfig): ParameterizedQuery {
  const unitColumn = requireColumn(schema, "unit_no", columns.sales_fields.unit_no);
  return buildQuery({
    select: "*",
    from: { source: tableIdentifier(schema.table) },
    where: [sql`${upperText(unitColumn)} = UPPER(${unitNo})`],
    limit: 1,
  });
}

export const unitReport: ReportPlugin<UnitResponse> = {
  definition: {
    name: "unit",
    path: "/soldmis/unit",
    description: "The stored sales record for one unit number.",
  },
  async handler(query, ctx): Promise<UnitResponse> {
    const unitNo = requireParam(query, "unit_no");
    const schema = await ctx.schema.resolve(ctx.tables.sales);

    const rows = await ctx.warehouse.query(buildUnitQuery(schema, unitNo, ctx.columns));
    const record = rows[0];
    if (!record) {
      throw new NotFoundError(`Unit ${unitNo} not found`);
    }
    return { unit_no: unitNo, record };
  },
};
