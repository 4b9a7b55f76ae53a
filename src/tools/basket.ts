/**
 * Market Basket
 *
 * Items bought together with a target item: baskets (orders) are groups of
 * line rows sharing a basket column value.
 */

import { NotFoundError, QueryError } from '../core/errors.js';
import type { Cell, ColumnSchema, Row } from '../core/types.js';
import { round } from '../datasets/profiler.js';
import { findColumn, type QueryOutput, type QueryTable } from './query.js';

export interface CoOccurrenceSpec {
  basketColumn: string;
  itemColumn: string;
  item: string | number;
  limit?: number;
}

export interface CoOccurrenceOutput extends QueryOutput {
  /** Baskets containing the target item */
  targetBaskets: number;
}

function matchesItem(cell: Cell, column: ColumnSchema, item: string | number): boolean {
  if (cell === null) return false;
  if (column.type === 'number') {
    return typeof cell === 'number' && cell === Number(item);
  }
  return String(cell).toLowerCase() === String(item).toLowerCase();
}

/**
 * Count, for every other item, the baskets it shares with the target item.
 * Rows are ordered by that count, most frequent first.
 */
export function coOccurrence(table: QueryTable, spec: CoOccurrenceSpec): CoOccurrenceOutput {
  const clause = `co_occurrence ${spec.itemColumn} = ${spec.item}`;
  const basket = findColumn(table.columns, spec.basketColumn, `basket_column ${spec.basketColumn}`);
  const item = findColumn(table.columns, spec.itemColumn, `item_column ${spec.itemColumn}`);
  if (item.type === 'number' && !Number.isFinite(Number(spec.item))) {
    throw new QueryError(`'${item.name}' is number, got '${spec.item}'`, clause);
  }
  if (item.name === 'baskets' || item.name === 'share') {
    throw new QueryError(`Item column may not be named '${item.name}'`, clause);
  }
  const limit = spec.limit ?? 10;
  if (!Number.isInteger(limit) || limit < 0) {
    throw new QueryError('limit must be a non-negative integer', `limit ${limit}`);
  }

  const targetBaskets = new Set<string>();
  for (const row of table.rows) {
    const basketValue = row[basket.name] ?? null;
    if (basketValue !== null && matchesItem(row[item.name] ?? null, item, spec.item)) {
      targetBaskets.add(String(basketValue));
    }
  }
  if (targetBaskets.size === 0) {
    throw new NotFoundError('item', String(spec.item));
  }

  // Item key -> first seen value and the target baskets it appears in
  const partners = new Map<string, { value: Cell; baskets: Set<string> }>();
  for (const row of table.rows) {
    const basketValue = row[basket.name] ?? null;
    const itemValue = row[item.name] ?? null;
    if (basketValue === null || itemValue === null) continue;
    if (!targetBaskets.has(String(basketValue)) || matchesItem(itemValue, item, spec.item)) continue;

    const key = `${typeof itemValue}:${String(itemValue)}`;
    const partner = partners.get(key);
    if (partner) {
      partner.baskets.add(String(basketValue));
    } else {
      partners.set(key, { value: itemValue, baskets: new Set([String(basketValue)]) });
    }
  }

  const rows: Row[] = [...partners.values()]
    .sort((a, b) => b.baskets.size - a.baskets.size || String(a.value).localeCompare(String(b.value)))
    .slice(0, limit)
    .map(partner => ({
      [item.name]: partner.value,
      baskets: partner.baskets.size,
      share: round(partner.baskets.size / targetBaskets.size),
    }));

  return {
    columns: [item, { name: 'baskets', type: 'number' }, { name: 'share', type: 'number' }],
    rows,
    targetBaskets: targetBaskets.size,
  };
}
