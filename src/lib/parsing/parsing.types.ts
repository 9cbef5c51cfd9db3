/**
 * Parsing Types
 */

import { MalformedEntryError } from '../errors';

/**
 * Per-entry outcome; a failed entry never aborts its siblings
 */
export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: MalformedEntryError };

export function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

export function fail<T>(message: string, entry: string): ParseResult<T> {
  return { ok: false, error: new MalformedEntryError(message, entry) };
}

/**
 * Protocol-agnostic fields gathered from a URI or JSON object before
 * they are narrowed to one descriptor variant
 */
export interface DescriptorFields {
  name?: string;
  password?: string;
  method?: string;
  uuid?: string;
  alterId?: number;
  upMbps?: number;
  downMbps?: number;
  network?: string;
  path?: string;
  hostHeader?: string;
  serviceName?: string;
  tls?: boolean;
  sni?: string;
  insecure?: boolean;
  flow?: string;
  username?: string;
  version?: string;
}

/**
 * Endpoint part shared by every descriptor
 */
export interface Endpoint {
  host: string;
  port: number;
}

/**
 * Summary of one payload, logged by the parser
 */
export interface ParseStats {
  format: 'json' | 'text' | 'base64';
  descriptors: number;
  malformed: number;
  skipped: number;
}
