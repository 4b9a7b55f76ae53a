/**
 * Dataset Sources
 *
 * A source is a remote folder-like store of tabular files. The provider only
 * needs to list its entries, resolve one by dataset identifier and fetch the
 * raw bytes. Identifiers are file names without their extension.
 */

import { createHash } from 'crypto';
import path from 'path';
import { SourceUnavailableError } from '../core/errors.js';

export interface SourceEntry {
  /** Source-specific handle (Drive file id, map key, ...) */
  fileId: string;
  identifier: string;
  name: string;
  mimeType: string;
  /** MD5 of the remote content when the source reports one without a download */
  checksum?: string;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface DatasetSource {
  readonly name: string;
  list(options?: FetchOptions): Promise<SourceEntry[]>;
  resolve(identifier: string, options?: FetchOptions): Promise<SourceEntry | null>;
  fetchRaw(entry: SourceEntry, options?: FetchOptions): Promise<Buffer>;
}

export function identifierFromFileName(fileName: string): string {
  return path.parse(fileName).name;
}

export function md5(content: Buffer | string): string {
  return createHash('md5').update(content).digest('hex');
}

const MIME_BY_EXTENSION: Record<string, string> = {
  '.csv': 'text/csv',
  '.json': 'application/json',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

export function mimeTypeFor(fileName: string): string {
  return MIME_BY_EXTENSION[path.extname(fileName).toLowerCase()] ?? 'application/octet-stream';
}

// =============================================================================
// IN-MEMORY SOURCE
// =============================================================================

interface StoredFile {
  fileId: string;
  name: string;
  content: Buffer;
}

/**
 * Source backed by a map of file name to content. Used for local datasets and
 * as the stand-in for a remote folder in tests; `failNext` injects transient
 * failures.
 */
export class InMemoryDatasetSource implements DatasetSource {
  readonly name = 'memory';
  private files = new Map<string, StoredFile>();
  private pendingFailures = 0;
  private nextId = 1;
  fetchCount = 0;

  constructor(files: Record<string, string | Buffer> = {}) {
    for (const [name, content] of Object.entries(files)) {
      this.put(name, content);
    }
  }

  put(fileName: string, content: string | Buffer): void {
    const identifier = identifierFromFileName(fileName);
    const existing = this.files.get(identifier);
    this.files.set(identifier, {
      fileId: existing?.fileId ?? `mem-${this.nextId++}`,
      name: fileName,
      content: typeof content === 'string' ? Buffer.from(content, 'utf8') : content,
    });
  }

  remove(identifier: string): boolean {
    return this.files.delete(identifier);
  }

  failNext(times = 1): void {
    this.pendingFailures += times;
  }

  async list(): Promise<SourceEntry[]> {
    this.maybeFail();
    return [...this.files.entries()]
      .map(([identifier, file]) => this.toEntry(identifier, file))
      .sort((a, b) => a.identifier.localeCompare(b.identifier));
  }

  async resolve(identifier: string): Promise<SourceEntry | null> {
    this.maybeFail();
    const file = this.files.get(identifier);
    return file ? this.toEntry(identifier, file) : null;
  }

  async fetchRaw(entry: SourceEntry): Promise<Buffer> {
    this.maybeFail();
    this.fetchCount++;
    const file = this.files.get(entry.identifier);
    if (!file) {
      throw new SourceUnavailableError(this.name, `file ${entry.name} disappeared`);
    }
    return Buffer.from(file.content);
  }

  private toEntry(identifier: string, file: StoredFile): SourceEntry {
    return {
      fileId: file.fileId,
      identifier,
      name: file.name,
      mimeType: mimeTypeFor(file.name),
    };
  }

  private maybeFail(): void {
    if (this.pendingFailures > 0) {
      this.pendingFailures--;
      throw new SourceUnavailableError(this.name, 'injected failure');
    }
  }
}
