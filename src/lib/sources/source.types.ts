/**
 * Source Types
 */

export type SourceFormat = 'auto' | 'json' | 'text';

/**
 * A subscription endpoint
 */
export interface SourceRef {
  url: string;
  /** Forces a decoding strategy; `auto` sniffs the payload */
  format?: SourceFormat;
}

/**
 * Body of a successfully retrieved source
 */
export interface RawPayload {
  source: SourceRef;
  body: string;
  contentType?: string;
  fetchedAt: number;
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface SourceFetcherOptions {
  timeout?: number;
  retries?: number;
  retryBackoffBase?: number;
  userAgent?: string;
  fetchImpl?: FetchFn;
}
