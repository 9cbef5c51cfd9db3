/**
 * JSON Normalizer
 * Turns sing-box, clash and ad-hoc JSON proxy objects into descriptors
 */

import { ProxyDescriptor } from '../proxy/proxy.types';
import { normalizeProtocol } from '../proxy/proxy.utils';
import { buildDescriptor } from './descriptor.builder';
import { isIgnorableLine, parseLine } from './line.parser';
import { DescriptorFields, ParseResult, fail } from './parsing.types';
import { isRecord, toBoolean, toNumber, toText } from './parsing.utils';

/**
 * Outbound types that route traffic but are not proxy endpoints
 */
const NON_PROXY_TYPES = new Set(['selector', 'urltest', 'direct', 'block', 'dns']);

const HOST_KEYS = ['server', 'host', 'address', 'add'] as const;
const PORT_KEYS = ['port', 'server_port'] as const;

function pick(record: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined && record[key] !== null) {
      return record[key];
    }
  }
  return undefined;
}

/**
 * Whether a JSON object has host and port fields of its own
 */
function looksLikeDescriptor(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && pick(value, HOST_KEYS) !== undefined && pick(value, PORT_KEYS) !== undefined;
}

/**
 * Extract the list of candidate entries from a parsed JSON document
 */
export function extractEntries(document: unknown): unknown[] | null {
  if (Array.isArray(document)) {
    return document;
  }
  if (!isRecord(document)) {
    return null;
  }
  if (Array.isArray(document.outbounds)) {
    return document.outbounds;
  }
  if (Array.isArray(document.proxies)) {
    return document.proxies;
  }
  if (looksLikeDescriptor(document)) {
    return [document];
  }
  return null;
}

/**
 * Normalize one JSON entry. Returns null for entries that are not proxies
 * (routing outbounds, blank strings) and should be skipped silently.
 */
export function normalizeEntry(value: unknown, source: string): ParseResult<ProxyDescriptor> | null {
  if (typeof value === 'string') {
    return isIgnorableLine(value) ? null : parseLine(value, source);
  }

  const entry = safeSerialize(value);
  if (!isRecord(value)) {
    return fail('Entry is not an object', entry);
  }

  const type = toText(value.type) ?? toText(value.protocol);
  if (type && NON_PROXY_TYPES.has(type.toLowerCase())) {
    return null;
  }
  if (!type) {
    return fail('Missing proxy type', entry);
  }

  const protocol = normalizeProtocol(type);
  if (!protocol) {
    return fail(`Unsupported protocol "${type}"`, entry);
  }

  const host = toText(pick(value, HOST_KEYS));
  const port = toNumber(pick(value, PORT_KEYS));
  if (!host || port === undefined) {
    return fail('Missing server address', entry);
  }

  return buildDescriptor(protocol, { host, port }, collectFields(value), source, entry);
}

function collectFields(value: Record<string, unknown>): DescriptorFields {
  const transport = isRecord(value.transport) ? value.transport : undefined;
  const tls = value.tls;
  const headers = transport && isRecord(transport.headers) ? transport.headers : undefined;

  return {
    name: toText(pick(value, ['tag', 'name', 'ps'])),
    password: toText(value.password),
    method: toText(pick(value, ['method', 'cipher'])),
    uuid: toText(pick(value, ['uuid', 'id'])),
    alterId: toNumber(pick(value, ['alter_id', 'alterId', 'aid'])),
    upMbps: toNumber(pick(value, ['up_mbps', 'up'])),
    downMbps: toNumber(pick(value, ['down_mbps', 'down'])),
    network: transport ? toText(transport.type) : toText(pick(value, ['network', 'net'])),
    path: transport ? toText(transport.path) : toText(value.path),
    hostHeader: headers ? toText(headers.Host) : undefined,
    serviceName: transport ? toText(transport.service_name) : undefined,
    tls: isRecord(tls) ? toBoolean(tls.enabled) ?? true : tls === 'tls' || toBoolean(tls),
    sni: isRecord(tls) ? toText(tls.server_name) : toText(pick(value, ['sni', 'servername'])),
    insecure: isRecord(tls) ? toBoolean(tls.insecure) : toBoolean(pick(value, ['insecure', 'skip-cert-verify'])),
    flow: toText(value.flow),
    username: toText(value.username),
    version: toText(value.version),
  };
}

function safeSerialize(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
