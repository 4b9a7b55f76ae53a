/**
 * Google Drive Source Tests
 *
 * Runs the source against an in-process stand-in for the Drive v3 files
 * resource: paged listings, downloads and exports, and error statuses.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Readable } from 'stream';
import type { drive_v3 } from 'googleapis';
import { GoogleDriveDatasetSource, type DriveFiles } from '../src/datasets/google-drive.js';
import { NotFoundError, RateLimitError, SourceUnavailableError } from '../src/core/errors.js';
import type { SourceEntry } from '../src/datasets/source.js';
import { silentLogger } from './setup.js';

const SHEET = 'application/vnd.google-apps.spreadsheet';
const FOLDER = 'application/vnd.google-apps.folder';

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

class StubDriveFiles implements DriveFiles {
  pages: drive_v3.Schema$FileList[] = [];
  contents = new Map<string, string>();
  failure: Error | undefined;
  listCalls: drive_v3.Params$Resource$Files$List[] = [];
  getCalls: drive_v3.Params$Resource$Files$Get[] = [];
  exportCalls: drive_v3.Params$Resource$Files$Export[] = [];

  async list(params: drive_v3.Params$Resource$Files$List): Promise<{ data: drive_v3.Schema$FileList }> {
    this.listCalls.push(params);
    if (this.failure) throw this.failure;
    const page = params.pageToken ? Number(params.pageToken) : 0;
    return { data: this.pages[page] ?? {} };
  }

  async get(params: drive_v3.Params$Resource$Files$Get): Promise<{ data: Readable }> {
    this.getCalls.push(params);
    return this.content(params.fileId);
  }

  async export(params: drive_v3.Params$Resource$Files$Export): Promise<{ data: Readable }> {
    this.exportCalls.push(params);
    return this.content(params.fileId);
  }

  private content(fileId: string | undefined): { data: Readable } {
    if (this.failure) throw this.failure;
    const content = this.contents.get(fileId ?? '');
    if (content === undefined) throw httpError(404, 'File not found');
    return { data: Readable.from(Buffer.from(content, 'utf8')) };
  }
}

const ORDERS_ENTRY: SourceEntry = {
  fileId: 'f1',
  identifier: 'orders',
  name: 'orders.csv',
  mimeType: 'text/csv',
  checksum: 'abc123',
};

const PRODUCTS_ENTRY: SourceEntry = {
  fileId: 'f2',
  identifier: 'Products',
  name: 'Products.csv',
  mimeType: SHEET,
};

describe('GoogleDriveDatasetSource', () => {
  let files: StubDriveFiles;
  let source: GoogleDriveDatasetSource;

  beforeEach(() => {
    files = new StubDriveFiles();
    source = new GoogleDriveDatasetSource(files, 'folder-1', silentLogger());
  });

  describe('list', () => {
    it('should follow page tokens and skip folders', async () => {
      files.pages = [
        {
          files: [
            { id: 'f1', name: 'orders.csv', mimeType: 'text/csv', md5Checksum: 'abc123' },
            { id: 'd1', name: 'archive', mimeType: FOLDER },
          ],
          nextPageToken: '1',
        },
        { files: [{ id: 'f2', name: 'Products', mimeType: SHEET }] },
      ];

      const entries = await source.list();

      expect(entries).toEqual([ORDERS_ENTRY, PRODUCTS_ENTRY]);
      expect(files.listCalls).toHaveLength(2);
      expect(files.listCalls[0]).toMatchObject({ q: "'folder-1' in parents and trashed=false", pageSize: 100 });
      expect(files.listCalls[0].pageToken).toBeUndefined();
      expect(files.listCalls[1].pageToken).toBe('1');
    });

    it('should skip files without an id or name', async () => {
      files.pages = [{ files: [{ name: 'orphan.csv' }, { id: 'f9' }, { id: 'f1', name: 'orders.csv', mimeType: 'text/csv' }] }];

      const entries = await source.list();

      expect(entries.map(entry => entry.fileId)).toEqual(['f1']);
    });
  });

  describe('resolve', () => {
    it('should pick the entry whose identifier matches exactly', async () => {
      files.pages = [
        {
          files: [
            { id: 'f7', name: 'orders_2023.csv', mimeType: 'text/csv' },
            { id: 'f1', name: 'orders.csv', mimeType: 'text/csv', md5Checksum: 'abc123' },
          ],
        },
      ];

      expect(await source.resolve('orders')).toEqual(ORDERS_ENTRY);
      expect(files.listCalls[0].q).toBe("'folder-1' in parents and trashed=false and name contains 'orders'");
    });

    it('should return null when no name matches', async () => {
      files.pages = [{ files: [{ id: 'f7', name: 'orders_2023.csv', mimeType: 'text/csv' }] }];
      expect(await source.resolve('orders')).toBeNull();
    });

    it('should escape quotes in the name query', async () => {
      await source.resolve("o'brien");
      expect(files.listCalls[0].q).toBe("'folder-1' in parents and trashed=false and name contains 'o\\'brien'");
    });
  });

  describe('fetchRaw', () => {
    it('should download uploaded files as media', async () => {
      files.contents.set('f1', 'order_id\n1\n');

      const content = await source.fetchRaw(ORDERS_ENTRY);

      expect(content.toString('utf8')).toBe('order_id\n1\n');
      expect(files.getCalls).toEqual([{ fileId: 'f1', alt: 'media', supportsAllDrives: true }]);
      expect(files.exportCalls).toEqual([]);
    });

    it('should export native spreadsheets as CSV', async () => {
      files.contents.set('f2', 'sku\nP-1\n');

      const content = await source.fetchRaw(PRODUCTS_ENTRY);

      expect(content.toString('utf8')).toBe('sku\nP-1\n');
      expect(files.exportCalls).toEqual([{ fileId: 'f2', mimeType: 'text/csv' }]);
      expect(files.getCalls).toEqual([]);
    });
  });

  describe('error mapping', () => {
    it('should map 404 to NotFoundError', async () => {
      await expect(source.fetchRaw(ORDERS_ENTRY)).rejects.toThrow('dataset not found: orders');

      files.failure = httpError(404, 'Folder not found');
      await expect(source.list()).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should map 429 to RateLimitError', async () => {
      files.failure = httpError(429, 'Too Many Requests');
      const error = await source.list().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ retryable: true, message: 'google-drive rate limited' });
    });

    it('should map 403, 5xx and status-less failures to SourceUnavailableError', async () => {
      for (const failure of [
        httpError(403, 'User rate limit exceeded'),
        httpError(503, 'Backend Error'),
        new Error('socket hang up'),
      ]) {
        files.failure = failure;
        const error = await source.fetchRaw(ORDERS_ENTRY).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(SourceUnavailableError);
        expect(error).toMatchObject({
          message: `google-drive unavailable: download orders.csv: ${failure.message}`,
        });
      }
    });

    it('should wrap other client errors without marking them retryable', async () => {
      files.failure = httpError(400, 'Bad Request');
      const error = await source.list().catch((e: unknown) => e);
      expect(error).not.toBeInstanceOf(SourceUnavailableError);
      expect(error).toMatchObject({ retryable: false, message: 'google-drive list folder: Bad Request' });
    });
  });
});
