/**
 * Google Drive Dataset Source (Drive API v3)
 *
 * Lists the tabular files of one Drive folder and downloads their content.
 * Drive reports an md5Checksum for uploaded files, which lets the provider
 * detect unchanged content without a download. Google-native spreadsheets
 * carry no checksum and are exported as CSV.
 *
 * Errors are mapped onto the agent taxonomy: 404 -> null / NotFoundError,
 * 429 -> RateLimitError, 5xx and network failures -> SourceUnavailableError.
 * Retries happen in the DatasetProvider.
 */

import { google, type drive_v3 } from 'googleapis';
import type { Readable } from 'stream';
import { NotFoundError, RateLimitError, SourceUnavailableError, wrapError } from '../core/errors.js';
import type { DriveConfig } from '../config/index.js';
import type { Logger } from '../core/types.js';
import { getLogger } from '../logging/logger.js';
import { identifierFromFileName, type DatasetSource, type FetchOptions, type SourceEntry } from './source.js';

const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
const GOOGLE_SHEET_MIME_TYPE = 'application/vnd.google-apps.spreadsheet';

/** Drive API scope the source needs; the OAuth flow that grants it is external */
export const DRIVE_READONLY_SCOPE = 'https://www.googleapis.com/auth/drive.readonly';

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const candidate = 'status' in error ? error.status : 'code' in error ? error.code : undefined;
  const status = Number(candidate);
  return Number.isInteger(status) && status >= 100 ? status : undefined;
}

function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * The part of `drive_v3.Resource$Files` the source calls; a Drive client's
 * `files` resource satisfies it.
 */
export interface DriveFiles {
  list(
    params: drive_v3.Params$Resource$Files$List,
    options: { signal?: AbortSignal }
  ): Promise<{ data: drive_v3.Schema$FileList }>;
  get(
    params: drive_v3.Params$Resource$Files$Get,
    options: { responseType: 'stream'; signal?: AbortSignal }
  ): Promise<{ data: Readable }>;
  export(
    params: drive_v3.Params$Resource$Files$Export,
    options: { responseType: 'stream'; signal?: AbortSignal }
  ): Promise<{ data: Readable }>;
}

export function createDriveClient(config: DriveConfig): drive_v3.Drive {
  const oauth2Client = new google.auth.OAuth2(config.clientId, config.clientSecret);
  oauth2Client.setCredentials({ refresh_token: config.refreshToken });
  return google.drive({ version: 'v3', auth: oauth2Client });
}

export class GoogleDriveDatasetSource implements DatasetSource {
  readonly name = 'google-drive';
  private logger: Logger;

  constructor(
    private readonly files: DriveFiles,
    private readonly folderId: string,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger();
  }

  static fromConfig(config: DriveConfig, logger?: Logger): GoogleDriveDatasetSource {
    return new GoogleDriveDatasetSource(createDriveClient(config).files, config.folderId, logger);
  }

  async list(options: FetchOptions = {}): Promise<SourceEntry[]> {
    return this.listFiles(`'${escapeQueryValue(this.folderId)}' in parents and trashed=false`, options);
  }

  async resolve(identifier: string, options: FetchOptions = {}): Promise<SourceEntry | null> {
    // Drive cannot match on a name prefix exactly, so filter the listing
    const entries = await this.listFiles(
      `'${escapeQueryValue(this.folderId)}' in parents and trashed=false and name contains '${escapeQueryValue(identifier)}'`,
      options
    );
    return entries.find(entry => entry.identifier === identifier) ?? null;
  }

  async fetchRaw(entry: SourceEntry, options: FetchOptions = {}): Promise<Buffer> {
    try {
      const response =
        entry.mimeType === GOOGLE_SHEET_MIME_TYPE
          ? await this.files.export(
              { fileId: entry.fileId, mimeType: 'text/csv' },
              { responseType: 'stream', signal: options.signal }
            )
          : await this.files.get(
              { fileId: entry.fileId, alt: 'media', supportsAllDrives: true },
              { responseType: 'stream', signal: options.signal }
            );
      const content = await readStream(response.data);
      this.logger.debug('drive_file_downloaded', { file: entry.name, bytes: content.length });
      return content;
    } catch (error) {
      throw this.mapError(error, `download ${entry.name}`, entry.identifier);
    }
  }

  private async listFiles(q: string, options: FetchOptions): Promise<SourceEntry[]> {
    const entries: SourceEntry[] = [];
    let pageToken: string | undefined;

    try {
      do {
        const response = await this.files.list(
          {
            q,
            fields: 'nextPageToken, files(id, name, mimeType, md5Checksum)',
            pageSize: 100,
            pageToken,
            supportsAllDrives: true,
            includeItemsFromAllDrives: true,
          },
          { signal: options.signal }
        );

        for (const file of response.data.files ?? []) {
          if (!file.id || !file.name || file.mimeType === FOLDER_MIME_TYPE) continue;
          const isSheet = file.mimeType === GOOGLE_SHEET_MIME_TYPE;
          entries.push({
            fileId: file.id,
            identifier: identifierFromFileName(file.name),
            // Native sheets are exported as CSV and parsed as such
            name: isSheet ? `${file.name}.csv` : file.name,
            mimeType: file.mimeType ?? 'application/octet-stream',
            checksum: file.md5Checksum ?? undefined,
          });
        }
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (error) {
      throw this.mapError(error, 'list folder', this.folderId);
    }

    return entries;
  }

  private mapError(error: unknown, operation: string, identifier: string): Error {
    const status = statusOf(error);
    const message = error instanceof Error ? error.message : String(error);

    if (status === 404) {
      return new NotFoundError('dataset', identifier);
    }
    if (status === 429) {
      return new RateLimitError(this.name);
    }
    if (status === undefined || status >= 500 || status === 408 || status === 403) {
      // 403 covers Drive's userRateLimitExceeded / quota responses
      this.logger.warn('drive_request_failed', { operation, status, error: message });
      return new SourceUnavailableError(this.name, `${operation}: ${message}`, status);
    }
    return wrapError(error, `${this.name} ${operation}`);
  }
}
