/**
 * Source Fetcher
 * Retrieves subscription payloads; a failing source is logged and skipped
 */

import type { Logger } from '../logger';
import {
  SourceUnavailableError,
  classifySourceFailure,
  describeError,
} from '../errors';
import { retryWithBackoff } from '../utils/retry';
import { FetchFn, RawPayload, SourceFetcherOptions, SourceRef } from './source.types';

const DEFAULT_TIMEOUT = 5000;
const DEFAULT_USER_AGENT = 'singbox-proxy-curator/1.0';

export class SourceFetcher {
  private readonly logger: Logger;
  private readonly timeout: number;
  private readonly retries: number;
  private readonly retryBackoffBase: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchFn;

  constructor(logger: Logger, options: SourceFetcherOptions = {}) {
    this.logger = logger;
    this.timeout = options.timeout || DEFAULT_TIMEOUT;
    this.retries = options.retries ?? 0;
    this.retryBackoffBase = options.retryBackoffBase ?? 1000;
    this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetchImpl || ((url, init) => fetch(url, init));
  }

  /**
   * Fetch every source concurrently; only successful payloads are returned, in source order
   */
  async fetchAll(sources: SourceRef[]): Promise<RawPayload[]> {
    const payloads = await Promise.all(sources.map((source) => this.fetchOne(source)));
    return payloads.filter((payload): payload is RawPayload => payload !== null);
  }

  /**
   * Fetch a single source, returning null when it is unavailable
   */
  async fetchOne(source: SourceRef): Promise<RawPayload | null> {
    try {
      const payload = await retryWithBackoff(() => this.retrieve(source), {
        retries: this.retries,
        baseDelay: this.retryBackoffBase,
        shouldRetry: isRetryable,
        onRetry: (attempt, delay, error) => {
          this.logger.warn('Retrying source', {
            url: source.url,
            attempt,
            delay,
            error: describeError(error),
          });
        },
      });

      this.logger.info('Fetched source', {
        url: source.url,
        bytes: Buffer.byteLength(payload.body, 'utf8'),
      });
      return payload;
    } catch (error) {
      const failure =
        error instanceof SourceUnavailableError
          ? error
          : new SourceUnavailableError(source.url, classifySourceFailure(error), describeError(error), undefined, {
              cause: error,
            });

      this.logger.error('Source unavailable', {
        url: failure.url,
        reason: failure.reason,
        statusCode: failure.statusCode,
        error: failure.message,
      });
      return null;
    }
  }

  private async retrieve(source: SourceRef): Promise<RawPayload> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchImpl(source.url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json, text/plain, */*',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new SourceUnavailableError(
          source.url,
          'status',
          `HTTP ${response.status}`,
          response.status
        );
      }

      const body = await response.text();
      return {
        source,
        body,
        contentType: response.headers.get('content-type') || undefined,
        fetchedAt: Date.now(),
      };
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        throw error;
      }
      const reason = controller.signal.aborted ? 'timeout' : classifySourceFailure(error);
      const message = reason === 'timeout' ? `Request timed out after ${this.timeout}ms` : describeError(error);
      throw new SourceUnavailableError(source.url, reason, message, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Client errors other than rate limiting are not worth another attempt
 */
function isRetryable(error: unknown): boolean {
  if (!(error instanceof SourceUnavailableError) || error.reason !== 'status') {
    return true;
  }
  const status = error.statusCode ?? 0;
  return status === 429 || status >= 500;
}
