/**
 * Dataset Module Tests
 *
 * Parsing, profiling and the fingerprint-checked provider cache
 */

import { describe, it, expect, vi } from 'vitest';
import { createHash } from 'crypto';
import * as XLSX from 'xlsx';
import { buildTable, parseTable } from '../src/datasets/parser.js';
import { profileDataset, summarizeNumbers } from '../src/datasets/profiler.js';
import { DatasetProvider } from '../src/datasets/provider.js';
import {
  InMemoryDatasetSource,
  identifierFromFileName,
  mimeTypeFor,
  type DatasetSource,
  type FetchOptions,
  type SourceEntry,
} from '../src/datasets/source.js';
import {
  NotFoundError,
  ParseError,
  SessionCancelledError,
  SourceUnavailableError,
  TimeoutError,
} from '../src/core/errors.js';
import { ORDERS_CSV, PRODUCTS_JSON, datasetFrom, deferred, silentLogger } from './setup.js';

function md5(content: string): string {
  return createHash('md5').update(content).digest('hex');
}

/** Holds every download until the gate opens; counts downloads whose signal was aborted */
class GatedSource extends InMemoryDatasetSource {
  readonly gate = deferred();
  abortedFetches = 0;

  override async fetchRaw(entry: SourceEntry, options: FetchOptions = {}): Promise<Buffer> {
    await this.gate.promise;
    if (options.signal?.aborted) {
      this.abortedFetches++;
      throw new SourceUnavailableError(this.name, 'aborted');
    }
    return super.fetchRaw(entry);
  }
}

function createProvider(source: DatasetSource, overrides: { maxRetries?: number; timeoutMs?: number } = {}) {
  const sleep = vi.fn(async (_ms: number) => {});
  const provider = new DatasetProvider(source, {
    maxRetries: overrides.maxRetries ?? 3,
    timeoutMs: overrides.timeoutMs ?? 1000,
    retryBaseDelayMs: 10,
    logger: silentLogger(),
    sleep,
  });
  return { provider, sleep };
}

describe('Parser', () => {
  it('should infer column types from CSV', () => {
    const table = parseTable(Buffer.from(ORDERS_CSV), 'orders.csv');
    expect(table.schema).toEqual([
      { name: 'order_id', type: 'number' },
      { name: 'customer', type: 'string' },
      { name: 'category', type: 'string' },
      { name: 'status', type: 'string' },
      { name: 'quantity', type: 'number' },
      { name: 'price', type: 'number' },
      { name: 'amount', type: 'number' },
      { name: 'order_date', type: 'string' },
      { name: 'gift', type: 'boolean' },
    ]);
    expect(table.rows[6]).toEqual({
      order_id: 1007,
      customer: 'frank',
      category: 'Home',
      status: 'delivered',
      quantity: 1,
      price: null,
      amount: null,
      order_date: '2024-02-11',
      gift: false,
    });
  });

  it('should keep hex, binary and octal codes as strings', () => {
    const table = parseTable(Buffer.from('sku,qty\n0x1A,1\n0b11,2\n0o7,3\n'), 'codes.csv');
    expect(table.schema).toEqual([
      { name: 'sku', type: 'string' },
      { name: 'qty', type: 'number' },
    ]);
    expect(table.rows.map(row => row.sku)).toEqual(['0x1A', '0b11', '0o7']);
  });

  it('should read signed and exponent decimals as numbers', () => {
    const table = parseTable(Buffer.from('delta\n-3\n+2.5\n1e3\n.5\n'), 'deltas.csv');
    expect(table.schema).toEqual([{ name: 'delta', type: 'number' }]);
    expect(table.rows.map(row => row.delta)).toEqual([-3, 2.5, 1000, 0.5]);
  });

  it('should freeze parsed rows', () => {
    const table = parseTable(Buffer.from(ORDERS_CSV), 'orders.csv');
    expect(Object.isFrozen(table.rows[0])).toBe(true);
  });

  it('should strip a byte order mark', () => {
    const table = parseTable(Buffer.from('\uFEFFid,name\n1,a\n'), 'bom.csv');
    expect(table.schema.map(c => c.name)).toEqual(['id', 'name']);
  });

  it('should parse JSON arrays of objects, merging keys', () => {
    const content = JSON.stringify([{ sku: 'A', price: 3 }, { sku: 'B', stock: 4 }]);
    const table = parseTable(Buffer.from(content), 'items.json');
    expect(table.schema.map(c => c.name)).toEqual(['sku', 'price', 'stock']);
    expect(table.rows[1]).toEqual({ sku: 'B', price: null, stock: 4 });
  });

  it('should parse the first sheet of an XLSX workbook', () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['department', 'revenue'],
        ['Books', 120],
        ['Home', 80.5],
      ]),
      'Sheet1'
    );
    const content: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

    const table = parseTable(content, 'departments.xlsx');
    expect(table.schema).toEqual([
      { name: 'department', type: 'string' },
      { name: 'revenue', type: 'number' },
    ]);
    expect(table.rows).toEqual([
      { department: 'Books', revenue: 120 },
      { department: 'Home', revenue: 80.5 },
    ]);
  });

  it('should make header names unique', () => {
    const table = buildTable(['amount', 'amount', ''], [[1, 2, 3]]);
    expect(table.schema.map(c => c.name)).toEqual(['amount', 'amount_2', 'column_3']);
  });

  it('should reject unreadable files', () => {
    expect(() => parseTable(Buffer.from('x'), 'notes.txt')).toThrow(ParseError);
    expect(() => parseTable(Buffer.from('{"a": 1}'), 'object.json')).toThrow('expected an array of row objects');
    expect(() => parseTable(Buffer.from(''), 'empty.csv')).toThrow('no header row');
  });
});

describe('Sources', () => {
  it('should derive identifiers and mime types from file names', () => {
    expect(identifierFromFileName('orders.csv')).toBe('orders');
    expect(mimeTypeFor('Products.JSON')).toBe('application/json');
    expect(mimeTypeFor('notes.txt')).toBe('application/octet-stream');
  });

  it('should list in-memory files sorted by identifier', async () => {
    const source = new InMemoryDatasetSource({ 'products.json': PRODUCTS_JSON, 'orders.csv': ORDERS_CSV });
    const entries = await source.list();
    expect(entries.map(e => e.identifier)).toEqual(['orders', 'products']);
    expect(entries[0].mimeType).toBe('text/csv');
  });
});

describe('Profiler', () => {
  it('should summarize numbers', () => {
    expect(summarizeNumbers([])).toBeUndefined();
    expect(summarizeNumbers([4, 1, 3, 2])).toEqual({ min: 1, max: 4, mean: 2.5, median: 2.5, std: 1.291 });
    expect(summarizeNumbers([5])?.std).toBe(0);
  });

  it('should profile every column', () => {
    const profile = profileDataset(datasetFrom('orders.csv', ORDERS_CSV));

    expect(profile.datasetId).toBe('orders');
    expect(profile.rowCount).toBe(7);
    expect(profile.columnCount).toBe(9);
    expect(profile.sampleRows).toHaveLength(5);

    const price = profile.columns.find(c => c.name === 'price');
    expect(price).toEqual({
      name: 'price',
      type: 'number',
      nullCount: 1,
      distinctCount: 6,
      numeric: { min: 12.5, max: 899, mean: 191.9167, median: 35, std: 350.1186 },
    });

    const category = profile.columns.find(c => c.name === 'category');
    expect(category?.topValues).toEqual([
      { value: 'Electronics', count: 3 },
      { value: 'Books', count: 2 },
      { value: 'Home', count: 2 },
    ]);
  });

  it('should flag data quality issues', () => {
    const profile = profileDataset(datasetFrom('orders.csv', ORDERS_CSV));
    expect(profile.issues).toEqual([
      { type: 'high_cardinality', column: 'order_date', uniqueRatio: 1, severity: 'medium' },
    ]);

    const duplicated = profileDataset(datasetFrom('dupes.csv', 'sku,qty,note\nA,1,\nA,1,\nB,1,\n'));
    expect(duplicated.issues).toEqual([
      { type: 'high_missing_values', columns: ['note'], severity: 'high' },
      { type: 'duplicate_rows', count: 1, percentage: 33.33, severity: 'medium' },
      { type: 'zero_variance', column: 'qty', severity: 'low' },
    ]);
  });
});

describe('correlations', () => {
  it('should rank numeric column pairs by absolute strength', () => {
    const profile = profileDataset(datasetFrom('trend.csv', 'x,label,y,z\n1,a,1,4\n2,b,3,3\n3,c,2,2\n4,d,4,1\n'));

    expect(profile.correlations).toEqual([
      { column1: 'x', column2: 'z', correlation: -1 },
      { column1: 'x', column2: 'y', correlation: 0.8 },
      { column1: 'y', column2: 'z', correlation: -0.8 },
    ]);
  });

  it('should use rows where both values are present and skip constant columns', () => {
    const profile = profileDataset(datasetFrom('gaps.csv', 'a,b,c,d\n1,2,6,5\n2,4,4,5\n3,6,2,5\n4,,0,5\n'));

    expect(profile.correlations).toEqual([
      { column1: 'a', column2: 'b', correlation: 1 },
      { column1: 'a', column2: 'c', correlation: -1 },
      { column1: 'b', column2: 'c', correlation: -1 },
    ]);
  });

  it('should keep the fifteen strongest pairs', () => {
    const header = ['c1', 'c2', 'c3', 'c4', 'c5', 'c6', 'c7'];
    const rows = [1, 2, 3].map(r => header.map((_, k) => r ** (k + 1)).join(','));
    const profile = profileDataset(datasetFrom('powers.csv', `${header.join(',')}\n${rows.join('\n')}\n`));

    expect(profile.correlations).toHaveLength(15);
    const strengths = profile.correlations.map(c => Math.abs(c.correlation));
    expect(strengths).toEqual([...strengths].sort((a, b) => b - a));
  });

  it('should report none for a single numeric column', () => {
    expect(profileDataset(datasetFrom('dupes.csv', 'sku,qty\nA,1\nB,2\n')).correlations).toEqual([]);
  });
});

describe('DatasetProvider', () => {
  it('should load and fingerprint a dataset', async () => {
    const source = new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV });
    const { provider } = createProvider(source);

    const dataset = await provider.load('orders');
    expect(dataset.identifier).toBe('orders');
    expect(dataset.rows).toHaveLength(7);
    expect(dataset.fingerprint).toBe(md5(ORDERS_CSV));
    expect(Object.isFrozen(dataset.rows)).toBe(true);
  });

  it('should return the cached dataset while the content is unchanged', async () => {
    const source = new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV });
    const { provider } = createProvider(source);

    const first = await provider.load('orders');
    const second = await provider.load('orders');
    expect(second).toBe(first);
  });

  it('should reload when the remote content changes', async () => {
    const source = new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV });
    const { provider } = createProvider(source);

    const first = await provider.load('orders');
    const updated = `${ORDERS_CSV}1008,gina,Books,delivered,1,9,9,2024-02-12,false\n`;
    source.put('orders.csv', updated);
    const second = await provider.load('orders');

    expect(second).not.toBe(first);
    expect(second.rows).toHaveLength(8);
    expect(second.fingerprint).toBe(md5(updated));
  });

  it('should skip the download when the source reports a matching checksum', async () => {
    class ChecksumSource extends InMemoryDatasetSource {
      override async resolve(identifier: string): Promise<SourceEntry | null> {
        const entry = await super.resolve(identifier);
        return entry ? { ...entry, checksum: md5(ORDERS_CSV) } : null;
      }
    }
    const source = new ChecksumSource({ 'orders.csv': ORDERS_CSV });
    const { provider } = createProvider(source);

    const first = await provider.load('orders');
    const second = await provider.load('orders');
    expect(second).toBe(first);
    expect(source.fetchCount).toBe(1);
  });

  it('should share one in-flight load between concurrent callers', async () => {
    const source = new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV });
    const { provider } = createProvider(source);

    const [a, b, c] = await Promise.all([provider.load('orders'), provider.load('orders'), provider.load('orders')]);
    expect(b).toBe(a);
    expect(c).toBe(a);
    expect(source.fetchCount).toBe(1);
    expect(provider.getStats()).toEqual({ cached: 1, inFlight: 0 });
  });

  it('should keep a shared load running when one caller aborts', async () => {
    const source = new GatedSource({ 'orders.csv': ORDERS_CSV });
    const { provider } = createProvider(source);
    const first = new AbortController();
    const second = new AbortController();

    const firstLoad = provider.load('orders', first.signal);
    const secondLoad = provider.load('orders', second.signal);
    first.abort(new SessionCancelledError('session-a'));

    await expect(firstLoad).rejects.toBeInstanceOf(SessionCancelledError);
    source.gate.resolve();

    const dataset = await secondLoad;
    expect(dataset.rows).toHaveLength(7);
    expect(source.fetchCount).toBe(1);
    expect(source.abortedFetches).toBe(0);
    expect(provider.peek('orders')).toBe(dataset);
  });

  it('should reject at once for a caller whose signal is already aborted', async () => {
    const source = new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV });
    const { provider } = createProvider(source);
    const controller = new AbortController();
    controller.abort(new SessionCancelledError('session-a'));

    await expect(provider.load('orders', controller.signal)).rejects.toBeInstanceOf(SessionCancelledError);
  });

  it('should not cache a load that was invalidated while in flight', async () => {
    const source = new GatedSource({ 'orders.csv': ORDERS_CSV });
    const { provider } = createProvider(source);

    const pending = provider.load('orders');
    provider.invalidate('orders');
    source.gate.resolve();

    const stale = await pending;
    expect(stale.rows).toHaveLength(7);
    expect(provider.peek('orders')).toBeUndefined();

    const fresh = await provider.load('orders');
    expect(fresh).not.toBe(stale);
    expect(source.fetchCount).toBe(2);
    expect(provider.peek('orders')).toBe(fresh);
  });

  it('should fetch again after invalidate', async () => {
    const source = new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV });
    const { provider } = createProvider(source);

    const first = await provider.load('orders');
    expect(provider.invalidate('orders')).toBe(true);
    expect(provider.invalidate('orders')).toBe(false);
    expect(provider.peek('orders')).toBeUndefined();

    const second = await provider.load('orders');
    expect(second).not.toBe(first);
    expect(second.fingerprint).toBe(first.fingerprint);
  });

  it('should throw NotFoundError for unknown identifiers', async () => {
    const source = new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV });
    const { provider } = createProvider(source);

    await expect(provider.load('customers')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should retry transient source failures with backoff', async () => {
    const source = new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV });
    const { provider, sleep } = createProvider(source);
    source.failNext(2);

    const dataset = await provider.load('orders');
    expect(dataset.rows).toHaveLength(7);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should give up after the retry limit', async () => {
    const source = new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV });
    const { provider, sleep } = createProvider(source, { maxRetries: 1 });
    source.failNext(5);

    await expect(provider.load('orders')).rejects.toBeInstanceOf(SourceUnavailableError);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(provider.getStats().inFlight).toBe(0);
  });

  it('should time out slow sources', async () => {
    const hanging: DatasetSource = {
      name: 'hanging',
      list: async () => [],
      resolve: async identifier => ({ fileId: '1', identifier, name: `${identifier}.csv`, mimeType: 'text/csv' }),
      fetchRaw: () => new Promise<Buffer>(() => {}),
    };
    const { provider } = createProvider(hanging, { maxRetries: 0, timeoutMs: 20 });

    await expect(provider.load('orders')).rejects.toBeInstanceOf(TimeoutError);
  });

  it('should list dataset summaries', async () => {
    const source = new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV, 'products.json': PRODUCTS_JSON });
    const { provider } = createProvider(source);

    expect(await provider.list()).toEqual([
      { identifier: 'orders', name: 'orders.csv', mimeType: 'text/csv' },
      { identifier: 'products', name: 'products.json', mimeType: 'application/json' },
    ]);
  });
});
