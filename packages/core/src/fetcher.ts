/**
 * Document fetchers: return the raw markup or text of a job posting.
 *
 * Every failure is surfaced as a DocumentFetchError so callers can treat
 * timeout, missing document and network trouble the same way.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { TimeoutError, withTimeout } from './timeout';

export type FetchFailureKind = 'timeout' | 'not_found' | 'network';

export class DocumentFetchError extends Error {
  readonly kind: FetchFailureKind;
  readonly source: string;

  constructor(kind: FetchFailureKind, source: string, message: string) {
    super(message);
    this.name = 'DocumentFetchError';
    this.kind = kind;
    this.source = source;
  }
}

export interface DocumentFetcher {
  fetch(source: string): Promise<string>;
}

export const DEFAULT_FETCH_TIMEOUT_MS = 15000;

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export function isHttpSource(source: string): boolean {
  return /^https?:\/\//i.test(source.trim());
}

export class HttpDocumentFetcher implements DocumentFetcher {
  constructor(private timeoutMs: number = DEFAULT_FETCH_TIMEOUT_MS) {}

  async fetch(url: string): Promise<string> {
    try {
      return await withTimeout(`GET ${url}`, this.timeoutMs, async (signal) => {
        const response = await fetch(url, {
          headers: { 'User-Agent': USER_AGENT, Accept: 'text/html,text/plain;q=0.9,*/*;q=0.8' },
          redirect: 'follow',
          signal,
        });
        if (response.status === 404 || response.status === 410) {
          throw new DocumentFetchError('not_found', url, `Posting not found (${response.status})`);
        }
        if (!response.ok) {
          throw new DocumentFetchError('network', url, `HTTP ${response.status} for ${url}`);
        }
        return response.text();
      });
    } catch (err) {
      throw toFetchError(url, err);
    }
  }
}

export class FileDocumentFetcher implements DocumentFetcher {
  constructor(private baseDir: string = process.cwd()) {}

  async fetch(source: string): Promise<string> {
    const filePath = path.resolve(this.baseDir, source.replace(/^file:\/\//i, ''));
    try {
      return await readFile(filePath, 'utf-8');
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code === 'ENOENT' || code === 'EISDIR') {
        throw new DocumentFetchError('not_found', source, `No posting file at ${filePath}`);
      }
      throw toFetchError(source, err);
    }
  }
}

/**
 * Route http(s) sources to the HTTP fetcher and everything else to the file fetcher.
 */
export function createDocumentFetcher(options?: {
  timeoutMs?: number;
  baseDir?: string;
}): DocumentFetcher {
  const http = new HttpDocumentFetcher(options?.timeoutMs);
  const file = new FileDocumentFetcher(options?.baseDir);
  return {
    fetch: (source) => (isHttpSource(source) ? http.fetch(source) : file.fetch(source)),
  };
}

function toFetchError(source: string, err: unknown): DocumentFetchError {
  if (err instanceof DocumentFetchError) return err;
  if (err instanceof TimeoutError) {
    return new DocumentFetchError('timeout', source, err.message);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new DocumentFetchError('network', source, message);
}
