/**
 * SQL fragments with bound parameters and quoted identifiers.
 *
 * Values interpolated into the `sql` tag become `$n` parameters. Identifiers
 * only enter a fragment as `Identifier` objects, which come from a resolved
 * table schema, the configured table names or internal output aliases.
 * Nothing a caller sends is ever spliced in as text.
 */

// ── Types ──────────────────────────────────────────────────────────────────

export interface Identifier {
  readonly kind: "identifier";
  readonly name: string;
  /** Table, schema or CTE alias the name is qualified with */
  readonly qualifier?: string;
}

type SqlPart =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "param"; readonly value: ParamValue }
  | Identifier;

export type ParamValue = string | number | boolean | null;

export class SqlFragment {
  constructor(readonly parts: readonly SqlPart[]) {}
}

export type SqlValue = SqlFragment | Identifier | ParamValue;

/** Result of rendering a fragment — SQL with `$n` placeholders and matching values */
export interface ParameterizedQuery {
  sql: string;
  params: ParamValue[];
}

// ── Construction ───────────────────────────────────────────────────────────

function toParts(value: SqlValue): SqlPart[] {
  if (value instanceof SqlFragment) return [...value.parts];
  if (value !== null && typeof value === "object") return [value];
  return [{ kind: "param", value }];
}

export function sql(strings: TemplateStringsArray, ...values: SqlValue[]): SqlFragment {
  const parts: SqlPart[] = [];
  strings.forEach((text, i) => {
    if (text) parts.push({ kind: "text", text });
    if (i < values.length) parts.push(...toParts(values[i]));
  });
  return new SqlFragment(parts);
}

export function identifier(name: string, qualifier?: string): Identifier {
  return qualifier === undefined ? { kind: "identifier", name } : { kind: "identifier", name, qualifier };
}

/** Re-qualify an identifier, e.g. a schema column referenced through a table alias. */
export function qualify(id: Identifier, qualifier: string): Identifier {
  return { kind: "identifier", name: id.name, qualifier };
}

/**
 * A string literal for internal constants (patterns, placeholder labels).
 * Caller-supplied values must go through parameters instead.
 */
export function literal(value: string): SqlFragment {
  return new SqlFragment([{ kind: "text", text: `'${value.replace(/'/g, "''")}'` }]);
}

export function joinSql(fragments: readonly SqlFragment[], separator: string): SqlFragment {
  const parts: SqlPart[] = [];
  fragments.forEach((fragment, i) => {
    if (i > 0) parts.push({ kind: "text", text: separator });
    parts.push(...fragment.parts);
  });
  return new SqlFragment(parts);
}

// ── Rendering ──────────────────────────────────────────────────────────────

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function renderIdentifier(id: Identifier): string {
  const name = quoteIdentifier(id.name);
  return id.qualifier === undefined ? name : `${quoteIdentifier(id.qualifier)}.${name}`;
}

export function render(fragment: SqlFragment): ParameterizedQuery {
  const params: ParamValue[] = [];
  let text = "";
  for (const part of fragment.parts) {
    switch (part.kind) {
      case "text":
        text += part.text;
        break;
      case "param":
        params.push(part.value);
        text += `$${params.length}`;
        break;
      case "identifier":
        text += renderIdentifier(part);
        break;
    }
  }
  return { sql: text, params };
}
