/**
 * Format Parser
 * Sniffs a payload's encoding and converts it into descriptors.
 * JSON documents, line lists and base64-wrapped line lists are supported;
 * malformed entries are logged and skipped one at a time.
 */

import type { Logger } from '../logger';
import { describeError } from '../errors';
import { ProxyDescriptor } from '../proxy/proxy.types';
import { RawPayload } from '../sources/source.types';
import { formatHint } from '../sources/source.utils';
import { extractEntries, normalizeEntry } from './json.normalizer';
import { isIgnorableLine, parseLine } from './line.parser';
import { ParseResult, ParseStats } from './parsing.types';
import { decodeBase64, parseEndpoint } from './parsing.utils';

export class FormatParser {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Parse one payload into descriptors
   */
  parse(payload: RawPayload): ProxyDescriptor[] {
    const body = payload.body.replace(/^\uFEFF/, '').trim();
    const url = payload.source.url;

    if (!body) {
      this.logger.warn('Empty payload', { url });
      return [];
    }

    const hint = formatHint(payload.source);
    const looksJson = body.startsWith('{') || body.startsWith('[');

    const forced = payload.source.format;

    if (forced !== 'text' && (forced === 'json' || looksJson)) {
      const document = this.tryParseJson(body);
      if (document.ok) {
        return this.parseJsonDocument(document.value, url);
      }
      if (hint === 'json') {
        this.logger.warn('Invalid JSON payload', { url, error: document.error });
        return [];
      }
    }

    return this.parseText(body, url);
  }

  /**
   * Parse every payload; each payload is independent of the others
   */
  parseAll(payloads: RawPayload[]): ProxyDescriptor[] {
    return payloads.flatMap((payload) => this.parse(payload));
  }

  private parseJsonDocument(document: unknown, url: string): ProxyDescriptor[] {
    const entries = extractEntries(document);
    if (!entries) {
      this.logger.warn('JSON payload contains no proxy entries', { url });
      return [];
    }

    return this.collect(
      entries.map((entry) => normalizeEntry(entry, url)),
      url,
      'json'
    );
  }

  private parseText(body: string, url: string): ProxyDescriptor[] {
    let format: ParseStats['format'] = 'text';
    let lines = body.split(/\r?\n/);

    if (!lines.some(isEntryLike)) {
      const decoded = decodeBase64(body);
      if (decoded && decoded.includes('://')) {
        format = 'base64';
        lines = decoded.split(/\r?\n/);
      }
    }

    return this.collect(
      lines.map((line) => (isIgnorableLine(line) ? null : parseLine(line, url))),
      url,
      format
    );
  }

  private collect(
    results: Array<ParseResult<ProxyDescriptor> | null>,
    url: string,
    format: ParseStats['format']
  ): ProxyDescriptor[] {
    const descriptors: ProxyDescriptor[] = [];
    const stats: ParseStats = { format, descriptors: 0, malformed: 0, skipped: 0 };

    results.forEach((result, index) => {
      if (result === null) {
        stats.skipped++;
        return;
      }
      if (!result.ok) {
        stats.malformed++;
        this.logger.warn('Skipping malformed entry', {
          url,
          index,
          entry: result.error.entry,
          error: result.error.message,
        });
        return;
      }
      descriptors.push(result.value);
    });

    stats.descriptors = descriptors.length;
    this.logger.info('Parsed payload', { url, ...stats });
    return descriptors;
  }

  private tryParseJson(body: string): { ok: true; value: unknown } | { ok: false; error: string } {
    try {
      return { ok: true, value: JSON.parse(body) };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }
}

function isEntryLike(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.includes('://') || parseEndpoint(trimmed) !== null;
}
