/**
 * Proxy Utilities
 * Protocol normalization and descriptor identity helpers
 */

import { ProxyDescriptor, ProxyProtocol } from './proxy.types';

/**
 * Protocols preferred over plaintext HTTP proxies
 */
export const DEFAULT_MODERN_PROTOCOLS: readonly ProxyProtocol[] = [
  ProxyProtocol.HYSTERIA2,
  ProxyProtocol.SHADOWSOCKS,
  ProxyProtocol.VMESS,
  ProxyProtocol.TUIC,
  ProxyProtocol.TROJAN,
];

/**
 * Order used to pick the selector default and to lay out protocol groups
 */
export const DEFAULT_PROTOCOL_PRIORITY: readonly ProxyProtocol[] = [
  ProxyProtocol.HYSTERIA2,
  ProxyProtocol.SHADOWSOCKS,
  ProxyProtocol.VMESS,
];

const PROTOCOL_ALIASES: Record<string, ProxyProtocol> = {
  hysteria2: ProxyProtocol.HYSTERIA2,
  hy2: ProxyProtocol.HYSTERIA2,
  shadowsocks: ProxyProtocol.SHADOWSOCKS,
  ss: ProxyProtocol.SHADOWSOCKS,
  vmess: ProxyProtocol.VMESS,
  vless: ProxyProtocol.VLESS,
  tuic: ProxyProtocol.TUIC,
  trojan: ProxyProtocol.TROJAN,
  http: ProxyProtocol.HTTP,
  https: ProxyProtocol.HTTP,
  socks: ProxyProtocol.SOCKS,
  socks5: ProxyProtocol.SOCKS,
  socks4: ProxyProtocol.SOCKS,
  socks4a: ProxyProtocol.SOCKS,
};

/**
 * Map a protocol name or URI scheme to a known protocol (case-insensitive)
 */
export function normalizeProtocol(value: string): ProxyProtocol | null {
  const key = value.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(PROTOCOL_ALIASES, key) ? PROTOCOL_ALIASES[key] : null;
}

/**
 * Parse a comma-separated protocol list, ignoring unknown names
 */
export function parseProtocolList(value: string): ProxyProtocol[] {
  const protocols: ProxyProtocol[] = [];
  for (const part of value.split(',')) {
    const protocol = normalizeProtocol(part);
    if (protocol && !protocols.includes(protocol)) {
      protocols.push(protocol);
    }
  }
  return protocols;
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

/**
 * Identity of an endpoint: (protocol, host, port), host compared case-insensitively
 */
export function descriptorKey(descriptor: ProxyDescriptor): string {
  return `${descriptor.protocol}|${descriptor.host.toLowerCase()}|${descriptor.port}`;
}

/**
 * Drop repeated endpoints, keeping the first occurrence
 */
export function dedupeDescriptors(descriptors: ProxyDescriptor[]): {
  unique: ProxyDescriptor[];
  duplicates: number;
} {
  const seen = new Set<string>();
  const unique: ProxyDescriptor[] = [];

  for (const descriptor of descriptors) {
    const key = descriptorKey(descriptor);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(descriptor);
  }

  return { unique, duplicates: descriptors.length - unique.length };
}

/**
 * Host and port as shown in logs (IPv6 hosts bracketed)
 */
export function formatEndpoint(descriptor: Pick<ProxyDescriptor, 'host' | 'port'>): string {
  const host = descriptor.host.includes(':') ? `[${descriptor.host}]` : descriptor.host;
  return `${host}:${descriptor.port}`;
}
