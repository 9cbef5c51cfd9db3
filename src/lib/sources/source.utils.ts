/**
 * Source list parsing
 */

import { SourceFormat, SourceRef } from './source.types';

const FORMATS: readonly SourceFormat[] = ['auto', 'json', 'text'];

function isSourceFormat(value: string): value is SourceFormat {
  return FORMATS.some((format) => format === value);
}

/**
 * Parse `url[|format],url[|format]` into source references
 */
export function parseSourceRefs(value: string): SourceRef[] {
  const refs: SourceRef[] = [];

  for (const item of value.split(',')) {
    const [rawUrl, rawFormat] = item.split('|').map((part) => part.trim());
    if (!rawUrl) {
      continue;
    }
    const format = rawFormat ? rawFormat.toLowerCase() : '';
    refs.push(isSourceFormat(format) ? { url: rawUrl, format } : { url: rawUrl });
  }

  return refs;
}

/**
 * Format implied by the URL path suffix, used when the payload itself is ambiguous
 */
export function formatHint(source: SourceRef): SourceFormat {
  if (source.format && source.format !== 'auto') {
    return source.format;
  }

  const lower = urlPath(source.url).toLowerCase();
  if (lower.endsWith('.json')) return 'json';
  if (lower.endsWith('.txt')) return 'text';
  return 'auto';
}

function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split(/[?#]/, 1)[0];
  }
}
