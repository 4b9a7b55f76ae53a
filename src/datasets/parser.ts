/**
 * Tabular Parser
 *
 * Turns raw CSV, JSON or XLSX bytes into typed columns and frozen rows.
 */

import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import path from 'path';
import { ParseError } from '../core/errors.js';
import type { Cell, ColumnSchema, ColumnType, Row } from '../core/types.js';

export interface ParsedTable {
  schema: ColumnSchema[];
  rows: Row[];
}

type RawCell = string | number | boolean | null;

// ============================================
// HELPERS
// ============================================

function isBlank(value: RawCell): boolean {
  return value === null || (typeof value === 'string' && value.trim() === '');
}

// Plain decimal only: Number() would also read 0x1A, 0b11 and 0o7
const DECIMAL = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function parseNumber(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

function isBooleanText(value: string): boolean {
  const lower = value.trim().toLowerCase();
  return lower === 'true' || lower === 'false';
}

export function inferColumnType(values: readonly RawCell[]): ColumnType {
  const present = values.filter(v => !isBlank(v));
  if (present.length === 0) return 'string';

  if (present.every(v => typeof v === 'number' || (typeof v === 'string' && parseNumber(v) !== null))) {
    return 'number';
  }
  if (present.every(v => typeof v === 'boolean' || (typeof v === 'string' && isBooleanText(v)))) {
    return 'boolean';
  }
  return 'string';
}

function coerce(value: RawCell, type: ColumnType): Cell {
  if (isBlank(value)) return null;

  switch (type) {
    case 'number':
      return typeof value === 'number' ? value : parseNumber(String(value));
    case 'boolean':
      return typeof value === 'boolean' ? value : String(value).trim().toLowerCase() === 'true';
    case 'string':
      return typeof value === 'string' ? value : String(value);
  }
}

function uniqueHeaders(header: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((raw, index) => {
    const base = raw.trim() === '' ? `column_${index + 1}` : raw.trim();
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}_${count + 1}`;
  });
}

/**
 * Build typed, frozen rows from a header and positional records.
 */
export function buildTable(header: readonly string[], records: readonly (readonly RawCell[])[]): ParsedTable {
  const names = uniqueHeaders(header);
  const schema: ColumnSchema[] = names.map((name, index) => ({
    name,
    type: inferColumnType(records.map(record => record[index] ?? null)),
  }));

  const rows = records.map(record => {
    const row: Record<string, Cell> = {};
    schema.forEach((column, index) => {
      row[column.name] = coerce(record[index] ?? null, column.type);
    });
    return Object.freeze(row);
  });

  return { schema: schema.map(column => Object.freeze(column)), rows };
}

function toRawCell(value: unknown): RawCell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

// ============================================
// FORMAT PARSERS
// ============================================

export function parseCsv(content: Buffer, fileName: string): ParsedTable {
  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (error) {
    throw new ParseError(fileName, error instanceof Error ? error.message : String(error));
  }

  if (!Array.isArray(records) || records.length === 0) {
    throw new ParseError(fileName, 'no header row');
  }

  const lines = records.map(record => (Array.isArray(record) ? record.map(toRawCell) : []));
  const [header, ...body] = lines;
  return buildTable(header.map(cell => String(cell ?? '')), body);
}

export function parseJson(content: Buffer, fileName: string): ParsedTable {
  let data: unknown;
  try {
    data = JSON.parse(content.toString('utf8'));
  } catch (error) {
    throw new ParseError(fileName, error instanceof Error ? error.message : String(error));
  }

  if (!Array.isArray(data)) {
    throw new ParseError(fileName, 'expected an array of row objects');
  }

  const objects: Record<string, unknown>[] = [];
  for (const item of data) {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      throw new ParseError(fileName, 'expected an array of row objects');
    }
    objects.push({ ...item });
  }

  const header: string[] = [];
  for (const item of objects) {
    for (const key of Object.keys(item)) {
      if (!header.includes(key)) header.push(key);
    }
  }

  return buildTable(header, objects.map(item => header.map(key => toRawCell(item[key]))));
}

export function parseXlsx(content: Buffer, fileName: string): ParsedTable {
  let records: unknown[][];
  try {
    const workbook = XLSX.read(content, { type: 'buffer' });
    const firstSheet = workbook.SheetNames[0];
    if (firstSheet === undefined) {
      throw new Error('workbook has no sheets');
    }
    records = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[firstSheet], {
      header: 1,
      defval: null,
      blankrows: false,
    });
  } catch (error) {
    throw new ParseError(fileName, error instanceof Error ? error.message : String(error));
  }

  if (records.length === 0) {
    throw new ParseError(fileName, 'no header row');
  }

  const [header, ...body] = records;
  return buildTable(
    header.map(cell => String(toRawCell(cell) ?? '')),
    body.map(record => record.map(toRawCell))
  );
}

export function parseTable(content: Buffer, fileName: string): ParsedTable {
  switch (path.extname(fileName).toLowerCase()) {
    case '.csv':
      return parseCsv(content, fileName);
    case '.json':
      return parseJson(content, fileName);
    case '.xlsx':
      return parseXlsx(content, fileName);
    default:
      throw new ParseError(fileName, 'unsupported file type (expected .csv, .json or .xlsx)');
  }
}
