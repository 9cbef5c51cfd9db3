/**
 * Parsing helpers for base64, percent-encoding and host:port pairs
 */

import { isValidPort } from '../proxy/proxy.utils';
import { Endpoint } from './parsing.types';

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

/**
 * Decode standard or URL-safe base64, repairing missing padding.
 * Returns null when the input is not base64.
 */
export function decodeBase64(input: string): string | null {
  const compact = input.replace(/\s+/g, '');
  if (!compact || !BASE64_PATTERN.test(compact)) {
    return null;
  }

  const standard = compact.replace(/-/g, '+').replace(/_/g, '/').replace(/=+$/, '');
  if (standard.length % 4 === 1) {
    return null;
  }
  const padded = standard.padEnd(Math.ceil(standard.length / 4) * 4, '=');
  return Buffer.from(padded, 'base64').toString('utf8');
}

export function safeDecodeURIComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Parse `host:port` or `[ipv6]:port`
 */
export function parseEndpoint(value: string): Endpoint | null {
  const match = /^\[([0-9A-Fa-f:.]+)\]:(\d{1,5})$/.exec(value) || /^([^\s:/?#[\]@]+):(\d{1,5})$/.exec(value);
  if (!match) {
    return null;
  }

  const port = parseInt(match[2], 10);
  return isValidPort(port) ? { host: match[1], port } : null;
}

/**
 * Split a trailing `#fragment` off a URI, returning the decoded fragment
 */
export function splitFragment(uri: string): { rest: string; fragment?: string } {
  const index = uri.indexOf('#');
  if (index === -1) {
    return { rest: uri };
  }
  const fragment = safeDecodeURIComponent(uri.slice(index + 1)).trim();
  return { rest: uri.slice(0, index), fragment: fragment || undefined };
}

export function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value !== 'string') return undefined;
  const lower = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(lower)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(lower)) return false;
  return undefined;
}

export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function toText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed || undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
