/**
 * Proxy Types
 * Normalized proxy descriptors and probe results shared by every pipeline stage
 */

/**
 * Proxy protocol enumeration (values match sing-box outbound types)
 */
export enum ProxyProtocol {
  HYSTERIA2 = 'hysteria2',
  SHADOWSOCKS = 'shadowsocks',
  VMESS = 'vmess',
  VLESS = 'vless',
  TUIC = 'tuic',
  TROJAN = 'trojan',
  HTTP = 'http',
  SOCKS = 'socks',
}

/**
 * Stream transports understood by vmess/vless outbounds
 */
export type TransportNetwork = 'tcp' | 'ws' | 'grpc' | 'http' | 'quic' | 'httpupgrade';

/**
 * Fields every descriptor carries
 */
interface BaseDescriptor {
  host: string;
  port: number;
  /** URL of the subscription that produced this descriptor */
  source: string;
  /** Display name from the subscription (`#tag`, `ps`, `name`) */
  name?: string;
}

export interface Hysteria2Descriptor extends BaseDescriptor {
  protocol: ProxyProtocol.HYSTERIA2;
  password?: string;
  upMbps?: number;
  downMbps?: number;
  sni?: string;
  insecure?: boolean;
}

export interface ShadowsocksDescriptor extends BaseDescriptor {
  protocol: ProxyProtocol.SHADOWSOCKS;
  method?: string;
  password?: string;
}

export interface VmessDescriptor extends BaseDescriptor {
  protocol: ProxyProtocol.VMESS;
  uuid?: string;
  alterId?: number;
  network?: TransportNetwork;
  path?: string;
  hostHeader?: string;
  serviceName?: string;
  tls?: boolean;
  sni?: string;
  insecure?: boolean;
}

export interface VlessDescriptor extends BaseDescriptor {
  protocol: ProxyProtocol.VLESS;
  uuid?: string;
  flow?: string;
  network?: TransportNetwork;
  path?: string;
  hostHeader?: string;
  serviceName?: string;
  tls?: boolean;
  sni?: string;
}

export interface TuicDescriptor extends BaseDescriptor {
  protocol: ProxyProtocol.TUIC;
  uuid?: string;
  password?: string;
  sni?: string;
  insecure?: boolean;
}

export interface TrojanDescriptor extends BaseDescriptor {
  protocol: ProxyProtocol.TROJAN;
  password?: string;
  sni?: string;
  insecure?: boolean;
}

export interface HttpDescriptor extends BaseDescriptor {
  protocol: ProxyProtocol.HTTP;
  username?: string;
  password?: string;
  /** Set for `https://` proxies */
  tls?: boolean;
  sni?: string;
  insecure?: boolean;
}

export interface SocksDescriptor extends BaseDescriptor {
  protocol: ProxyProtocol.SOCKS;
  username?: string;
  password?: string;
  version?: '4' | '4a' | '5';
}

/**
 * One candidate proxy endpoint. Only the fields valid for its protocol exist.
 */
export type ProxyDescriptor =
  | Hysteria2Descriptor
  | ShadowsocksDescriptor
  | VmessDescriptor
  | VlessDescriptor
  | TuicDescriptor
  | TrojanDescriptor
  | HttpDescriptor
  | SocksDescriptor;

/**
 * Outcome of a successful probe
 */
export interface ProbeResult {
  descriptor: ProxyDescriptor;
  latency: number; // milliseconds
  throughput: number; // estimator-defined units, >= 0
  score: number;
  testedAt: number; // epoch milliseconds
}

/**
 * Ranked, truncated probe results per protocol
 */
export type SelectionTable = Map<ProxyProtocol, ProbeResult[]>;
