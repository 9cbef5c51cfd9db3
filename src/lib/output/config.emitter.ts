/**
 * Config Emitter
 * Renders a selection table as a sing-box configuration and persists it
 */

import type { Logger } from '../logger';
import {
  ProbeResult,
  ProxyDescriptor,
  ProxyProtocol,
  SelectionTable,
  TransportNetwork,
} from '../proxy/proxy.types';
import { DEFAULT_PROTOCOL_PRIORITY } from '../proxy/proxy.utils';
import { ConfigWriter } from './config.writer';
import {
  ProxyOutbound,
  SelectorOutbound,
  SingBoxConfig,
  SingBoxOutbound,
  SingBoxTls,
  SingBoxTransport,
} from './singbox.types';

export const SELECTOR_TAG = 'proxy';
export const DEFAULT_SHADOWSOCKS_METHOD = '2022-blake3-aes-256-gcm';
export const DEFAULT_HYSTERIA2_MBPS = 100;
export const DEFAULT_VMESS_TRANSPORT: SingBoxTransport = { type: 'grpc' };

export interface ConfigEmitterOptions {
  outputPath?: string;
  /** `log.level` written into the document */
  logLevel?: string;
  /** Protocol order used to pick the selector default */
  priority?: readonly ProxyProtocol[];
  writer?: ConfigWriter;
}

export function outboundTag(protocol: ProxyProtocol, index: number): string {
  return `${protocol}-${index}`;
}

export class ConfigEmitter {
  private readonly logger: Logger;
  private readonly outputPath: string;
  private readonly logLevel: string;
  private readonly priority: readonly ProxyProtocol[];
  private readonly writer: ConfigWriter;

  constructor(logger: Logger, options: ConfigEmitterOptions = {}) {
    this.logger = logger;
    this.outputPath = options.outputPath || 'sing-box-config.json';
    this.logLevel = options.logLevel || 'info';
    this.priority = options.priority || DEFAULT_PROTOCOL_PRIORITY;
    this.writer = options.writer || new ConfigWriter(logger);
  }

  /**
   * Build the document for a selection. An empty selection yields only the
   * direct and block outbounds.
   */
  build(table: SelectionTable): SingBoxConfig {
    const proxies: ProxyOutbound[] = [];

    for (const [protocol, results] of table) {
      results.forEach((result, index) => {
        proxies.push(this.toOutbound(result, outboundTag(protocol, index)));
      });
    }

    const outbounds: SingBoxOutbound[] = [];
    const selector = this.buildSelector(table, proxies);
    if (selector) {
      outbounds.push(selector);
    }
    outbounds.push(...proxies, { type: 'direct', tag: 'direct' }, { type: 'block', tag: 'block' });

    return { log: { level: this.logLevel }, outbounds };
  }

  /**
   * Build the document and persist it. A write failure propagates as PersistenceError.
   */
  async emit(table: SelectionTable): Promise<SingBoxConfig> {
    const config = this.build(table);
    await this.writer.write(this.outputPath, config);

    this.logger.info('Configuration written', {
      path: this.outputPath,
      outbounds: config.outbounds.length,
    });
    return config;
  }

  private buildSelector(table: SelectionTable, proxies: ProxyOutbound[]): SelectorOutbound | null {
    if (proxies.length === 0) {
      return null;
    }

    const preferred = this.priority.find((protocol) => (table.get(protocol)?.length ?? 0) > 0);
    return {
      type: 'selector',
      tag: SELECTOR_TAG,
      outbounds: proxies.map((proxy) => proxy.tag),
      default: preferred ? outboundTag(preferred, 0) : proxies[0].tag,
    };
  }

  private toOutbound(result: ProbeResult, tag: string): ProxyOutbound {
    const d: ProxyDescriptor = result.descriptor;
    const base = { server: d.host, port: d.port, tag };

    switch (d.protocol) {
      case ProxyProtocol.HYSTERIA2:
        return {
          type: 'hysteria2',
          ...base,
          up_mbps: d.upMbps ?? DEFAULT_HYSTERIA2_MBPS,
          down_mbps: d.downMbps ?? DEFAULT_HYSTERIA2_MBPS,
          password: d.password ?? '',
          tls: buildTls(d.sni, d.insecure),
        };

      case ProxyProtocol.SHADOWSOCKS:
        return {
          type: 'shadowsocks',
          ...base,
          method: d.method ?? DEFAULT_SHADOWSOCKS_METHOD,
          password: d.password ?? '',
        };

      case ProxyProtocol.VMESS: {
        const transport = d.network === undefined ? { ...DEFAULT_VMESS_TRANSPORT } : buildTransport(d.network, d);
        return {
          type: 'vmess',
          ...base,
          uuid: d.uuid ?? '',
          ...(d.alterId !== undefined ? { alter_id: d.alterId } : {}),
          ...(transport ? { transport } : {}),
          ...(d.tls ? { tls: buildTls(d.sni, d.insecure) } : {}),
        };
      }

      case ProxyProtocol.VLESS: {
        const transport = d.network === undefined ? null : buildTransport(d.network, d);
        return {
          type: 'vless',
          ...base,
          uuid: d.uuid ?? '',
          ...(d.flow ? { flow: d.flow } : {}),
          ...(transport ? { transport } : {}),
          ...(d.tls ? { tls: buildTls(d.sni, undefined) } : {}),
        };
      }

      case ProxyProtocol.TUIC:
        return {
          type: 'tuic',
          ...base,
          uuid: d.uuid ?? '',
          password: d.password ?? '',
          tls: buildTls(d.sni, d.insecure),
        };

      case ProxyProtocol.TROJAN:
        return {
          type: 'trojan',
          ...base,
          password: d.password ?? '',
          tls: buildTls(d.sni, d.insecure),
        };

      case ProxyProtocol.HTTP:
        return {
          type: 'http',
          ...base,
          ...credentials(d.username, d.password),
          ...(d.tls ? { tls: buildTls(d.sni, d.insecure) } : {}),
        };

      case ProxyProtocol.SOCKS:
        return {
          type: 'socks',
          ...base,
          version: d.version ?? '5',
          ...credentials(d.username, d.password),
        };
    }
  }
}

function buildTls(serverName: string | undefined, insecure: boolean | undefined): SingBoxTls {
  return {
    enabled: true,
    ...(serverName ? { server_name: serverName } : {}),
    ...(insecure ? { insecure: true } : {}),
  };
}

/**
 * sing-box has no transport object for plain TCP
 */
function buildTransport(
  network: TransportNetwork,
  d: { path?: string; hostHeader?: string; serviceName?: string }
): SingBoxTransport | null {
  const path = d.path ? { path: d.path } : {};

  switch (network) {
    case 'tcp':
      return null;
    case 'ws':
      return { type: 'ws', ...path, ...(d.hostHeader ? { headers: { Host: d.hostHeader } } : {}) };
    case 'grpc':
      return { type: 'grpc', ...(d.serviceName ? { service_name: d.serviceName } : {}) };
    case 'http':
      return { type: 'http', ...path, ...(d.hostHeader ? { host: [d.hostHeader] } : {}) };
    case 'httpupgrade':
      return { type: 'httpupgrade', ...path, ...(d.hostHeader ? { host: d.hostHeader } : {}) };
    case 'quic':
      return { type: 'quic' };
  }
}

function credentials(username?: string, password?: string): { username?: string; password?: string } {
  return {
    ...(username ? { username } : {}),
    ...(password ? { password } : {}),
  };
}
