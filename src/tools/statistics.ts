/**
 * Descriptive statistics over a single column.
 */

import { QueryError } from '../core/errors.js';
import type { Cell, ColumnSchema, ColumnType, StatisticOp } from '../core/types.js';

export const STATISTIC_OPS = ['sum', 'mean', 'count', 'min', 'max', 'distinct_count'] as const satisfies readonly StatisticOp[];

/**
 * Type of the value an op produces for a column of the given type.
 */
export function resultType(op: StatisticOp, columnType: ColumnType): ColumnType {
  return op === 'min' || op === 'max' ? columnType : 'number';
}

export function assertApplicable(column: ColumnSchema, op: StatisticOp, clause: string): void {
  if ((op === 'sum' || op === 'mean') && column.type !== 'number') {
    throw new QueryError(`${op} needs a numeric column, '${column.name}' is ${column.type}`, clause);
  }
  if ((op === 'min' || op === 'max') && column.type === 'boolean') {
    throw new QueryError(`${op} needs a numeric or string column, '${column.name}' is boolean`, clause);
  }
}

function extreme<T extends number | string>(values: readonly T[], pick: 'min' | 'max'): T | null {
  let best: T | null = null;
  for (const value of values) {
    if (best === null || (pick === 'min' ? value < best : value > best)) {
      best = value;
    }
  }
  return best;
}

/**
 * Compute an op over column values. Nulls are ignored; an empty input yields
 * 0 for sum, count and distinct_count and null for the rest.
 */
export function computeStatistic(values: readonly Cell[], op: StatisticOp): number | string | null {
  const present = values.filter((v): v is Exclude<Cell, null> => v !== null);

  switch (op) {
    case 'count':
      return present.length;
    case 'distinct_count':
      return new Set(present).size;
    case 'sum':
      return present.reduce<number>((sum, v) => (typeof v === 'number' ? sum + v : sum), 0);
    case 'mean': {
      const numbers = present.filter((v): v is number => typeof v === 'number');
      if (numbers.length === 0) return null;
      return numbers.reduce((sum, v) => sum + v, 0) / numbers.length;
    }
    case 'min':
    case 'max': {
      // Columns are homogeneous, so at most one of these is non-empty
      const numbers = present.filter((v): v is number => typeof v === 'number');
      if (numbers.length > 0) return extreme(numbers, op);
      return extreme(present.filter((v): v is string => typeof v === 'string'), op);
    }
  }
}
