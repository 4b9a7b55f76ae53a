/**
 * Dataset Provider
 *
 * Lazy, fingerprint-checked cache of parsed datasets in front of a remote
 * source:
 * - Every load re-checks the remote fingerprint; cached datasets are returned
 *   only while it matches
 * - At most one in-flight load per identifier; concurrent callers share it,
 *   and a caller whose signal aborts stops waiting without cancelling the load
 * - Source calls are bounded by a timeout and retried with backoff
 */

import type { Dataset, DatasetSummary, Logger } from '../core/types.js';
import { NotFoundError } from '../core/errors.js';
import { raceAbort, withRetry, withTimeout, sleep } from '../core/retry.js';
import { getLogger } from '../logging/logger.js';
import { parseTable } from './parser.js';
import { md5, type DatasetSource, type SourceEntry } from './source.js';

export interface DatasetProviderOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  logger?: Logger;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface DatasetReader {
  load(identifier: string, signal?: AbortSignal): Promise<Dataset>;
  list(signal?: AbortSignal): Promise<DatasetSummary[]>;
}

export class DatasetProvider implements DatasetReader {
  private cache = new Map<string, Dataset>();
  private inFlight = new Map<string, Promise<Dataset>>();
  /** Bumped by invalidate so loads started earlier do not repopulate the cache */
  private generations = new Map<string, number>();
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly source: DatasetSource,
    options: DatasetProviderOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.logger = options.logger ?? getLogger();
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Load a dataset, reusing the cached copy when the remote content is unchanged.
   */
  load(identifier: string, signal?: AbortSignal): Promise<Dataset> {
    let pending = this.inFlight.get(identifier);
    if (!pending) {
      // The shared load belongs to the provider, not to the first caller
      pending = this.loadFresh(identifier).finally(() => {
        this.inFlight.delete(identifier);
      });
      this.inFlight.set(identifier, pending);
    }
    return raceAbort(pending, signal);
  }

  /**
   * Drop the cached copy; the next load fetches from the source.
   */
  invalidate(identifier: string): boolean {
    this.generations.set(identifier, this.generation(identifier) + 1);
    const removed = this.cache.delete(identifier);
    if (removed) {
      this.logger.debug('dataset_invalidated', { dataset_id: identifier });
    }
    return removed;
  }

  async list(signal?: AbortSignal): Promise<DatasetSummary[]> {
    const entries = await this.call('list', s => this.source.list({ signal: s }), signal);
    return entries.map(entry => ({
      identifier: entry.identifier,
      name: entry.name,
      mimeType: entry.mimeType,
    }));
  }

  /** Cached copy without touching the source, if any */
  peek(identifier: string): Dataset | undefined {
    return this.cache.get(identifier);
  }

  getStats(): { cached: number; inFlight: number } {
    return { cached: this.cache.size, inFlight: this.inFlight.size };
  }

  private generation(identifier: string): number {
    return this.generations.get(identifier) ?? 0;
  }

  private async loadFresh(identifier: string): Promise<Dataset> {
    const startTime = Date.now();
    const generation = this.generation(identifier);
    const entry = await this.call(`resolve ${identifier}`, s => this.source.resolve(identifier, { signal: s }));
    if (!entry) {
      this.cache.delete(identifier);
      throw new NotFoundError('dataset', identifier);
    }

    const cached = this.cache.get(identifier);
    if (cached && entry.checksum !== undefined && entry.checksum === cached.fingerprint) {
      this.logger.debug('dataset_cache_hit', { dataset_id: identifier, fingerprint: cached.fingerprint });
      return cached;
    }

    const raw = await this.call(`fetch ${identifier}`, s => this.source.fetchRaw(entry, { signal: s }));
    const fingerprint = md5(raw);
    if (cached && cached.fingerprint === fingerprint) {
      this.logger.debug('dataset_cache_hit', { dataset_id: identifier, fingerprint });
      return cached;
    }

    const dataset = this.build(entry, raw, fingerprint);
    const invalidated = generation !== this.generation(identifier);
    if (!invalidated) {
      this.cache.set(identifier, dataset);
    }
    this.logger.info('dataset_loaded', {
      dataset_id: identifier,
      rows: dataset.rows.length,
      fingerprint,
      replaced: cached?.fingerprint,
      cached: !invalidated,
      duration_ms: Date.now() - startTime,
    });
    return dataset;
  }

  private build(entry: SourceEntry, raw: Buffer, fingerprint: string): Dataset {
    const table = parseTable(raw, entry.name);
    return Object.freeze({
      identifier: entry.identifier,
      name: entry.name,
      mimeType: entry.mimeType,
      schema: Object.freeze(table.schema),
      rows: Object.freeze(table.rows),
      fingerprint,
      loadedAt: new Date(),
    });
  }

  private call<T>(label: string, operation: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(
      () => withTimeout(operation, this.timeoutMs, `${this.source.name} ${label}`, signal),
      {
        maxRetries: this.maxRetries,
        baseDelayMs: this.retryBaseDelayMs,
        label: `${this.source.name} ${label}`,
        logger: this.logger,
        signal,
        sleep: this.sleep,
      }
    );
  }
}
