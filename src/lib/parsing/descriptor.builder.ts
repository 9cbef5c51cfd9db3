/**
 * Descriptor Builder
 * Narrows loosely collected fields to the variant of one protocol
 */

import { ProxyDescriptor, ProxyProtocol, TransportNetwork } from '../proxy/proxy.types';
import { isValidPort } from '../proxy/proxy.utils';
import { DescriptorFields, Endpoint, ParseResult, fail, ok } from './parsing.types';

const NETWORK_ALIASES: Record<string, TransportNetwork> = {
  tcp: 'tcp',
  raw: 'tcp',
  ws: 'ws',
  websocket: 'ws',
  grpc: 'grpc',
  gun: 'grpc',
  http: 'http',
  h2: 'http',
  quic: 'quic',
  httpupgrade: 'httpupgrade',
};

const SOCKS_VERSIONS = ['4', '4a', '5'] as const;
type SocksVersion = (typeof SOCKS_VERSIONS)[number];

function isSocksVersion(value: string): value is SocksVersion {
  return SOCKS_VERSIONS.some((version) => version === value);
}

function resolveNetwork(raw: string | undefined, entry: string): ParseResult<TransportNetwork | undefined> {
  if (raw === undefined) {
    return ok(undefined);
  }
  const network = NETWORK_ALIASES[raw.toLowerCase()];
  return network ? ok(network) : fail(`Unsupported transport "${raw}"`, entry);
}

/**
 * Build a frozen descriptor for `protocol`, keeping only the fields that protocol accepts
 */
export function buildDescriptor(
  protocol: ProxyProtocol,
  endpoint: Endpoint,
  fields: DescriptorFields,
  source: string,
  entry: string
): ParseResult<ProxyDescriptor> {
  const host = endpoint.host.trim();
  if (!host) {
    return fail('Missing host', entry);
  }
  if (!isValidPort(endpoint.port)) {
    return fail(`Invalid port ${endpoint.port}`, entry);
  }

  const base = { host, port: endpoint.port, source, name: fields.name };
  let descriptor: ProxyDescriptor;

  switch (protocol) {
    case ProxyProtocol.HYSTERIA2:
      descriptor = {
        ...base,
        protocol,
        password: fields.password,
        upMbps: fields.upMbps,
        downMbps: fields.downMbps,
        sni: fields.sni,
        insecure: fields.insecure,
      };
      break;

    case ProxyProtocol.SHADOWSOCKS:
      descriptor = { ...base, protocol, method: fields.method, password: fields.password };
      break;

    case ProxyProtocol.VMESS:
    case ProxyProtocol.VLESS: {
      const network = resolveNetwork(fields.network, entry);
      if (!network.ok) {
        return network;
      }
      const transport = {
        uuid: fields.uuid,
        network: network.value,
        path: fields.path,
        hostHeader: fields.hostHeader,
        serviceName: fields.serviceName,
        tls: fields.tls,
      };
      descriptor =
        protocol === ProxyProtocol.VMESS
          ? {
              ...base,
              ...transport,
              protocol,
              alterId: fields.alterId,
              sni: fields.sni,
              insecure: fields.insecure,
            }
          : { ...base, ...transport, protocol, flow: fields.flow, sni: fields.sni };
      break;
    }

    case ProxyProtocol.TUIC:
      descriptor = {
        ...base,
        protocol,
        uuid: fields.uuid,
        password: fields.password,
        sni: fields.sni,
        insecure: fields.insecure,
      };
      break;

    case ProxyProtocol.TROJAN:
      descriptor = {
        ...base,
        protocol,
        password: fields.password,
        sni: fields.sni,
        insecure: fields.insecure,
      };
      break;

    case ProxyProtocol.HTTP:
      descriptor = {
        ...base,
        protocol,
        username: fields.username,
        password: fields.password,
        tls: fields.tls,
        sni: fields.sni,
        insecure: fields.insecure,
      };
      break;

    case ProxyProtocol.SOCKS: {
      const version = fields.version?.toLowerCase();
      if (version !== undefined && !isSocksVersion(version)) {
        return fail(`Unsupported socks version "${fields.version}"`, entry);
      }
      descriptor = {
        ...base,
        protocol,
        username: fields.username,
        password: fields.password,
        version,
      };
      break;
    }

    default:
      return fail('Unsupported protocol', entry);
  }

  return ok(Object.freeze(descriptor));
}
