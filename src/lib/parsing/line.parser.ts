/**
 * Line Parser
 * Parses one share link or `host:port` line into a descriptor
 *
 * Supported shapes:
 * - ss://BASE64(method:password)@host:port#tag (SIP002) and the legacy
 *   ss://BASE64(method:password@host:port)#tag
 * - vmess://BASE64(JSON) as produced by v2rayN
 * - scheme://[userinfo@]host:port[?query][#tag] for the other protocols
 * - host:port, read as a plain HTTP proxy
 */

import { ProxyDescriptor, ProxyProtocol } from '../proxy/proxy.types';
import { normalizeProtocol } from '../proxy/proxy.utils';
import { buildDescriptor } from './descriptor.builder';
import { DescriptorFields, ParseResult, fail } from './parsing.types';
import {
  decodeBase64,
  isRecord,
  parseEndpoint,
  safeDecodeURIComponent,
  splitFragment,
  toBoolean,
  toNumber,
  toText,
} from './parsing.utils';

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;

/**
 * Whether a text line is a comment or blank and carries no entry
 */
export function isIgnorableLine(line: string): boolean {
  const trimmed = line.trim();
  return !trimmed || trimmed.startsWith('#') || trimmed.startsWith('//');
}

export function parseLine(line: string, source: string): ParseResult<ProxyDescriptor> {
  const entry = line.trim();
  const schemeMatch = SCHEME_PATTERN.exec(entry);

  if (!schemeMatch) {
    const endpoint = parseEndpoint(entry);
    return endpoint
      ? buildDescriptor(ProxyProtocol.HTTP, endpoint, {}, source, entry)
      : fail('Unrecognized line', entry);
  }

  const scheme = schemeMatch[1].toLowerCase();
  const body = entry.slice(schemeMatch[0].length);

  if (scheme === 'ss') {
    return parseShadowsocks(body, source, entry);
  }
  if (scheme === 'vmess') {
    return parseVmess(body, source, entry);
  }

  const protocol = normalizeProtocol(scheme);
  if (!protocol) {
    return fail(`Unsupported protocol "${scheme}"`, entry);
  }
  return parseUri(protocol, scheme, body, source, entry);
}

function parseShadowsocks(body: string, source: string, entry: string): ParseResult<ProxyDescriptor> {
  const { rest, fragment } = splitFragment(body);
  const at = rest.lastIndexOf('@');

  let credentials: string;
  let address: string;

  if (at === -1) {
    // Legacy form: the whole authority is base64 encoded
    const decoded = decodeBase64(rest);
    const innerAt = decoded ? decoded.lastIndexOf('@') : -1;
    if (!decoded || innerAt === -1) {
      return fail('Invalid shadowsocks link', entry);
    }
    credentials = decoded.slice(0, innerAt);
    address = decoded.slice(innerAt + 1);
  } else {
    const userinfo = safeDecodeURIComponent(rest.slice(0, at));
    const decoded = decodeBase64(userinfo);
    credentials = decoded && decoded.includes(':') ? decoded : userinfo;
    address = stripPathAndQuery(rest.slice(at + 1));
  }

  const separator = credentials.indexOf(':');
  if (separator <= 0) {
    return fail('Invalid shadowsocks credentials', entry);
  }

  const endpoint = parseEndpoint(address);
  if (!endpoint) {
    return fail('Invalid shadowsocks address', entry);
  }

  return buildDescriptor(
    ProxyProtocol.SHADOWSOCKS,
    endpoint,
    {
      method: credentials.slice(0, separator),
      password: credentials.slice(separator + 1),
      name: fragment,
    },
    source,
    entry
  );
}

function parseVmess(body: string, source: string, entry: string): ParseResult<ProxyDescriptor> {
  const { rest, fragment } = splitFragment(body);
  const decoded = decodeBase64(rest);

  if (decoded === null) {
    // Some subscriptions publish vmess in the plain URI form
    return rest.includes('@')
      ? parseUri(ProxyProtocol.VMESS, 'vmess', body, source, entry)
      : fail('Invalid vmess payload', entry);
  }

  let config: unknown;
  try {
    config = JSON.parse(decoded);
  } catch {
    return fail('Invalid vmess JSON', entry);
  }
  if (!isRecord(config)) {
    return fail('Invalid vmess JSON', entry);
  }

  const host = toText(config.add);
  const port = toNumber(config.port);
  if (!host || port === undefined) {
    return fail('Missing vmess address', entry);
  }

  const network = toText(config.net);
  return buildDescriptor(
    ProxyProtocol.VMESS,
    { host, port },
    {
      name: toText(config.ps) ?? fragment,
      uuid: toText(config.id),
      alterId: toNumber(config.aid),
      network,
      path: toText(config.path),
      hostHeader: toText(config.host),
      serviceName: network === 'grpc' ? toText(config.path) : undefined,
      tls: toText(config.tls) === 'tls' ? true : undefined,
      sni: toText(config.sni),
      insecure: toBoolean(config.allowInsecure) || undefined,
    },
    source,
    entry
  );
}

function parseUri(
  protocol: ProxyProtocol,
  scheme: string,
  body: string,
  source: string,
  entry: string
): ParseResult<ProxyDescriptor> {
  const { rest, fragment } = splitFragment(body);
  const queryIndex = rest.indexOf('?');
  const query = new URLSearchParams(queryIndex === -1 ? '' : rest.slice(queryIndex + 1));
  const authority = stripPathAndQuery(rest);

  const at = authority.lastIndexOf('@');
  const userinfo = at === -1 ? undefined : authority.slice(0, at);
  const endpoint = parseEndpoint(at === -1 ? authority : authority.slice(at + 1));
  if (!endpoint) {
    return fail('Invalid address', entry);
  }

  const fields: DescriptorFields = {
    name: fragment,
    sni: query.get('sni') || query.get('peer') || undefined,
    insecure: toBoolean(query.get('insecure') ?? query.get('allowInsecure') ?? undefined) || undefined,
    ...credentialFields(protocol, scheme, userinfo),
  };

  if (protocol === ProxyProtocol.HYSTERIA2) {
    fields.password = fields.password ?? (query.get('auth') || undefined);
    fields.upMbps = toNumber(query.get('upmbps') ?? query.get('up'));
    fields.downMbps = toNumber(query.get('downmbps') ?? query.get('down'));
  }

  if (scheme === 'https') {
    fields.tls = true;
  }

  if (protocol === ProxyProtocol.VMESS || protocol === ProxyProtocol.VLESS) {
    const security = query.get('security');
    fields.network = query.get('type') || undefined;
    fields.path = query.get('path') || undefined;
    fields.hostHeader = query.get('host') || undefined;
    fields.serviceName = query.get('serviceName') || undefined;
    fields.tls = security === 'tls' || security === 'reality' ? true : undefined;
    fields.flow = query.get('flow') || undefined;
  }

  return buildDescriptor(protocol, endpoint, fields, source, entry);
}

function credentialFields(protocol: ProxyProtocol, scheme: string, userinfo?: string): DescriptorFields {
  const raw = userinfo === undefined ? undefined : safeDecodeURIComponent(userinfo);
  const [user, ...restParts] = raw === undefined ? [] : raw.split(':');
  const secret = restParts.length ? restParts.join(':') : undefined;

  switch (protocol) {
    case ProxyProtocol.TROJAN:
    case ProxyProtocol.HYSTERIA2:
      return { password: raw || undefined };
    case ProxyProtocol.TUIC:
      return { uuid: user || undefined, password: secret };
    case ProxyProtocol.VMESS:
    case ProxyProtocol.VLESS:
      return { uuid: raw || undefined };
    case ProxyProtocol.SOCKS:
      return {
        username: user || undefined,
        password: secret,
        version: scheme === 'socks' ? undefined : scheme.replace('socks', ''),
      };
    case ProxyProtocol.HTTP:
      return { username: user || undefined, password: secret };
    default:
      return {};
  }
}

function stripPathAndQuery(value: string): string {
  const end = value.search(/[/?]/);
  return end === -1 ? value : value.slice(0, end);
}
