import {
  sql,
  joinSql,
  identifier,
  render,
  SqlFragment,
  type Identifier,
  type ParameterizedQuery,
} from "./sql.js";

// ── Query model ────────────────────────────────────────────────────────────

export interface SelectItem {
  expr: SqlFragment;
  alias: string;
}

export interface FromClause {
  source: Identifier;
  alias?: string;
}

export interface JoinClause {
  type: "LEFT" | "INNER";
  source: Identifier;
  alias: string;
  on: SqlFragment;
}

export interface OrderItem {
  expr: SqlFragment;
  direction: "ASC" | "DESC";
}

export interface CommonTableExpression {
  name: string;
  query: SelectQuery;
}

/**
 * A single SELECT statement. Every report composes one of these and renders
 * it once; predicates in `where` are AND-ed.
 */
export interface SelectQuery {
  with?: CommonTableExpression[];
  /** `"*"` selects every stored column */
  select: SelectItem[] | "*";
  from: FromClause;
  joins?: JoinClause[];
  where?: SqlFragment[];
  groupBy?: SqlFragment[];
  orderBy?: OrderItem[];
  limit?: number;
}

// ── Helpers ────────────────────────────────────────────────────────────────

/** Reference an output column of the current query (ORDER BY) or of a CTE alias. */
export function output(alias: string, qualifier?: string): SqlFragment {
  return sql`${identifier(alias, qualifier)}`;
}

function selectList(select: SelectQuery["select"]): SqlFragment {
  if (select === "*") return sql`*`;
  return joinSql(
    select.map((item) => sql`${item.expr} AS ${identifier(item.alias)}`),
    ",\n  "
  );
}

function fromClause(from: FromClause): SqlFragment {
  return from.alias === undefined
    ? sql`${from.source}`
    : sql`${from.source} ${identifier(from.alias)}`;
}

function joinClause(join: JoinClause): SqlFragment {
  const keyword = join.type === "LEFT" ? sql`LEFT JOIN` : sql`INNER JOIN`;
  return sql`${keyword} ${join.source} ${identifier(join.alias)} ON ${join.on}`;
}

function orderItem(item: OrderItem): SqlFragment {
  return item.direction === "DESC" ? sql`${item.expr} DESC` : sql`${item.expr} ASC`;
}

// ── Builder ────────────────────────────────────────────────────────────────

export function buildSelect(query: SelectQuery): SqlFragment {
  const clauses: SqlFragment[] = [];

  if (query.with && query.with.length > 0) {
    const ctes = query.with.map(
      (cte) => sql`${identifier(cte.name)} AS (\n${buildSelect(cte.query)}\n)`
    );
    clauses.push(sql`WITH ${joinSql(ctes, ",\n")}`);
  }

  clauses.push(sql`SELECT\n  ${selectList(query.select)}`);
  clauses.push(sql`FROM ${fromClause(query.from)}`);

  for (const join of query.joins ?? []) {
    clauses.push(joinClause(join));
  }

  if (query.where && query.where.length > 0) {
    clauses.push(sql`WHERE ${joinSql(query.where, "\n  AND ")}`);
  }

  if (query.groupBy && query.groupBy.length > 0) {
    clauses.push(sql`GROUP BY ${joinSql(query.groupBy, ", ")}`);
  }

  if (query.orderBy && query.orderBy.length > 0) {
    clauses.push(sql`ORDER BY ${joinSql(query.orderBy.map(orderItem), ", ")}`);
  }

  if (query.limit !== undefined) {
    clauses.push(sql`LIMIT ${query.limit}`);
  }

  return joinSql(clauses, "\n");
}

export function buildQuery(query: SelectQuery): ParameterizedQuery {
  return render(buildSelect(query));
}
