/**
 * Query Engine
 *
 * Join, filter, group, aggregate, filter groups, project, sort and limit over
 * in-memory tables. Every failure is a QueryError naming the offending clause.
 */

import { QueryError } from '../core/errors.js';
import type { Cell, ColumnSchema, Row, StatisticOp } from '../core/types.js';
import { compileFilter } from './filter-expression.js';
import { assertApplicable, computeStatistic, resultType } from './statistics.js';

export interface AggregateSpec {
  /** Omitted only for count, which then counts rows */
  column?: string;
  op: StatisticOp;
  as?: string;
}

export interface OrderSpec {
  column: string;
  direction?: 'asc' | 'desc';
}

export type JoinHow = 'inner' | 'left';

export interface JoinSpec {
  /** Dataset name; used in clauses and to suffix clashing column names */
  name: string;
  table: QueryTable;
  leftOn: string;
  rightOn: string;
  /** Defaults to left: unmatched left rows are kept with nulls */
  how?: JoinHow;
  /** Right-hand columns to bring in; all but the key when omitted */
  columns?: string[];
}

export interface QuerySpec {
  joins?: JoinSpec[];
  filter?: string;
  groupBy?: string[];
  aggregate?: AggregateSpec[];
  /** Filter over the grouped output, e.g. on an aggregate */
  having?: string;
  columns?: string[];
  orderBy?: OrderSpec[];
  limit?: number;
}

export interface QueryTable {
  columns: readonly ColumnSchema[];
  rows: readonly Row[];
}

export interface QueryOutput {
  columns: ColumnSchema[];
  rows: Row[];
}

export function findColumn(schema: readonly ColumnSchema[], name: string, clause: string): ColumnSchema {
  const column = schema.find(c => c.name === name) ?? schema.find(c => c.name.toLowerCase() === name.toLowerCase());
  if (!column) {
    throw new QueryError(`Unknown column '${name}'`, clause);
  }
  return column;
}

function joinKey(cell: Cell): string | null {
  return cell === null ? null : `${typeof cell}:${String(cell)}`;
}

/**
 * Join a right-hand table onto the current one by key equality. A left row
 * matching several right rows is repeated once per match; null keys never
 * match.
 */
export function joinTable(left: QueryTable, join: JoinSpec): QueryTable {
  const clause = `join ${join.name} on ${join.leftOn} = ${join.rightOn}`;
  const leftKey = findColumn(left.columns, join.leftOn, clause);
  const rightKey = findColumn(join.table.columns, join.rightOn, clause);
  if (leftKey.type !== rightKey.type) {
    throw new QueryError(
      `Join keys differ in type: '${leftKey.name}' is ${leftKey.type}, '${rightKey.name}' is ${rightKey.type}`,
      clause
    );
  }

  const picked = join.columns
    ? join.columns.map(name => findColumn(join.table.columns, name, `${clause} columns ${name}`))
    : join.table.columns;
  const taken = new Set(left.columns.map(c => c.name));
  const added = picked
    .filter(column => column.name !== rightKey.name)
    .map(column => ({
      source: column.name,
      schema: {
        name: taken.has(column.name) ? `${column.name}_${join.name}` : column.name,
        type: column.type,
      } satisfies ColumnSchema,
    }));
  for (const { schema } of added) {
    if (taken.has(schema.name)) {
      throw new QueryError(`Duplicate output column '${schema.name}'`, clause);
    }
    taken.add(schema.name);
  }

  const index = new Map<string, Row[]>();
  for (const row of join.table.rows) {
    const key = joinKey(row[rightKey.name] ?? null);
    if (key === null) continue;
    const matches = index.get(key);
    if (matches) {
      matches.push(row);
    } else {
      index.set(key, [row]);
    }
  }

  const how = join.how ?? 'left';
  const rows: Row[] = [];
  for (const row of left.rows) {
    const key = joinKey(row[leftKey.name] ?? null);
    const matches = key === null ? undefined : index.get(key);
    if (!matches) {
      if (how === 'left') {
        const merged: Record<string, Cell> = { ...row };
        for (const { schema } of added) merged[schema.name] = null;
        rows.push(merged);
      }
      continue;
    }
    for (const match of matches) {
      const merged: Record<string, Cell> = { ...row };
      for (const { source, schema } of added) merged[schema.name] = match[source] ?? null;
      rows.push(merged);
    }
  }

  return { columns: [...left.columns, ...added.map(a => a.schema)], rows };
}

function aggregateName(spec: AggregateSpec): string {
  if (spec.as) return spec.as;
  return spec.column ? `${spec.op}_${spec.column}` : spec.op;
}

interface ResolvedAggregate {
  name: string;
  op: StatisticOp;
  source?: ColumnSchema;
}

function resolveAggregates(schema: readonly ColumnSchema[], specs: readonly AggregateSpec[]): ResolvedAggregate[] {
  return specs.map(spec => {
    const clause = `aggregate ${spec.op}(${spec.column ?? '*'})`;
    if (spec.column === undefined) {
      if (spec.op !== 'count') {
        throw new QueryError(`${spec.op} needs a column`, clause);
      }
      return { name: aggregateName(spec), op: spec.op };
    }
    const source = findColumn(schema, spec.column, clause);
    assertApplicable(source, spec.op, clause);
    return { name: aggregateName({ ...spec, column: source.name }), op: spec.op, source };
  });
}

function groupRows(
  schema: readonly ColumnSchema[],
  rows: readonly Row[],
  groupBy: readonly string[],
  aggregateSpecs: readonly AggregateSpec[]
): QueryOutput {
  const keys = groupBy.map(name => findColumn(schema, name, `group_by ${name}`));
  const aggregates = resolveAggregates(
    schema,
    aggregateSpecs.length > 0 ? aggregateSpecs : [{ op: 'count', as: 'count' }]
  );

  const columns: ColumnSchema[] = [
    ...keys,
    ...aggregates.map((agg): ColumnSchema => ({
      name: agg.name,
      type: agg.source ? resultType(agg.op, agg.source.type) : 'number',
    })),
  ];
  const names = new Set<string>();
  for (const column of columns) {
    if (names.has(column.name)) {
      throw new QueryError(`Duplicate output column '${column.name}'`, `aggregate as ${column.name}`);
    }
    names.add(column.name);
  }

  // Insertion order of the first row in each group
  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    const key = JSON.stringify(keys.map(k => row[k.name] ?? null));
    const members = groups.get(key);
    if (members) {
      members.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  // Aggregating without grouping always yields one row, even over no input
  if (keys.length === 0 && groups.size === 0) {
    groups.set('[]', []);
  }

  const output: Row[] = [];
  for (const members of groups.values()) {
    const row: Record<string, Cell> = {};
    for (const key of keys) {
      row[key.name] = members[0]?.[key.name] ?? null;
    }
    for (const agg of aggregates) {
      const source = agg.source;
      row[agg.name] = source
        ? computeStatistic(members.map(m => m[source.name] ?? null), agg.op)
        : members.length;
    }
    output.push(row);
  }

  return { columns, rows: output };
}

function project(schema: readonly ColumnSchema[], rows: readonly Row[], names: readonly string[]): QueryOutput {
  const columns = names.map(name => findColumn(schema, name, `columns ${name}`));
  return {
    columns,
    rows: rows.map(row => {
      const projected: Record<string, Cell> = {};
      for (const column of columns) {
        projected[column.name] = row[column.name] ?? null;
      }
      return projected;
    }),
  };
}

function compareCells(a: Cell, b: Cell): number {
  // Nulls sort last regardless of direction
  if (a === null || b === null) return a === b ? 0 : a === null ? 1 : -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return String(a).localeCompare(String(b));
}

function sortRows(output: QueryOutput, orderBy: readonly OrderSpec[]): Row[] {
  const keys = orderBy.map(spec => ({
    column: findColumn(output.columns, spec.column, `order_by ${spec.column}`),
    descending: spec.direction === 'desc',
  }));

  return [...output.rows].sort((a, b) => {
    for (const { column, descending } of keys) {
      const left = a[column.name] ?? null;
      const right = b[column.name] ?? null;
      if (left === null || right === null) {
        const nulls = compareCells(left, right);
        if (nulls !== 0) return nulls;
        continue;
      }
      const result = compareCells(left, right);
      if (result !== 0) return descending ? -result : result;
    }
    return 0;
  });
}

/**
 * Run a query. Rows of the input table are never modified.
 */
export function runQuery(input: QueryTable, spec: QuerySpec): QueryOutput {
  const table = (spec.joins ?? []).reduce(joinTable, input);
  const predicate = compileFilter(spec.filter, table.columns);
  const groupBy = spec.groupBy ?? [];
  const aggregate = spec.aggregate ?? [];
  const grouping = groupBy.length > 0 || aggregate.length > 0;

  if (grouping && spec.columns && spec.columns.length > 0) {
    throw new QueryError('columns cannot be combined with group_by or aggregate', 'columns');
  }
  if (!grouping && spec.having !== undefined) {
    throw new QueryError('having needs group_by or aggregate', `having ${spec.having}`);
  }
  if (spec.limit !== undefined && (!Number.isInteger(spec.limit) || spec.limit < 0)) {
    throw new QueryError('limit must be a non-negative integer', `limit ${spec.limit}`);
  }

  const filtered = table.rows.filter(predicate);

  let output: QueryOutput;
  if (grouping) {
    output = groupRows(table.columns, filtered, groupBy, aggregate);
    if (spec.having !== undefined) {
      const keep = compileFilter(spec.having, output.columns);
      output = { columns: output.columns, rows: output.rows.filter(keep) };
    }
  } else if (spec.columns && spec.columns.length > 0) {
    output = project(table.columns, filtered, spec.columns);
  } else {
    output = { columns: [...table.columns], rows: [...filtered] };
  }

  if (spec.orderBy && spec.orderBy.length > 0) {
    output = { columns: output.columns, rows: sortRows(output, spec.orderBy) };
  }
  if (spec.limit !== undefined) {
    output = { columns: output.columns, rows: output.rows.slice(0, spec.limit) };
  }

  return output;
}
